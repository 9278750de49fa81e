import fs from 'fs';
import { Node as JsonNode, ParseError, parseTree, printParseErrorCode } from 'jsonc-parser';
import { Scalar, Section, SectionValue, isScalar, isSection, sectionFromEntries } from '../types/section';
import { CantParseError, describeError } from '../utils/errors';

/**
 * Anything that can produce a configuration tree. Concrete on-disk grammars
 * plug in here.
 */
export interface SectionParser {
  parse(): Section;
  describe?(): string;
}

export function isSectionParser(value: unknown): value is SectionParser {
  return typeof value === 'object' && value !== null && 'parse' in value && typeof value.parse === 'function';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Validates an untyped nested value (decoded JSON, a literal) into a section.
 * Only scalars, lists of scalars and nested objects are accepted.
 */
export function toSection(value: unknown, origin: string, path: string = ''): Section {
  if (isSection(value)) {
    return value;
  }
  if (!isPlainObject(value)) {
    throw new CantParseError(origin, path, `expected a mapping, got ${describeValue(value)}`);
  }

  return sectionFromEntries(
    Object.entries(value).map(([key, child]): [string, SectionValue] => [
      key,
      toSectionValue(child, origin, path ? `${path}.${key}` : key)
    ])
  );
}

function toSectionValue(value: unknown, origin: string, path: string): SectionValue {
  if (isScalar(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    const items: Scalar[] = value.map((item, index) => {
      if (!isScalar(item)) {
        throw new CantParseError(origin, `${path}[${index}]`, `list items must be scalars, got ${describeValue(item)}`);
      }
      return item;
    });
    return items;
  }
  return toSection(value, origin, path);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list';
  return typeof value;
}

/**
 * Parses JSON text straight into a section. Key order is document order,
 * including integer-like keys that a plain object would move to the front.
 */
export function parseJsonSection(text: string, origin: string): Section {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, { disallowComments: true, allowTrailingComma: false });

  if (errors.length > 0 || root === undefined) {
    const first = errors[0];
    const reason = first
      ? `${printParseErrorCode(first.error)} at offset ${first.offset}`
      : 'empty document';
    throw new CantParseError(origin, '', `invalid JSON: ${reason}`);
  }

  return nodeToSection(root, origin, '');
}

function nodeToSection(node: JsonNode, origin: string, path: string): Section {
  if (node.type !== 'object') {
    throw new CantParseError(origin, path, `expected a mapping, got ${describeNode(node)}`);
  }

  const entries: [string, SectionValue][] = [];
  for (const property of node.children ?? []) {
    const [keyNode, valueNode] = property.children ?? [];
    const key: unknown = keyNode?.value;
    if (valueNode === undefined || typeof key !== 'string') {
      throw new CantParseError(origin, path, 'malformed property');
    }
    entries.push([key, nodeToValue(valueNode, origin, path ? `${path}.${key}` : key)]);
  }
  return sectionFromEntries(entries);
}

function nodeToValue(node: JsonNode, origin: string, path: string): SectionValue {
  if (node.type === 'array') {
    return (node.children ?? []).map((item, index): Scalar => {
      const value: unknown = item.value;
      if (!isScalar(value)) {
        throw new CantParseError(origin, `${path}[${index}]`, `list items must be scalars, got ${describeNode(item)}`);
      }
      return value;
    });
  }

  const value: unknown = node.value;
  if (isScalar(value)) {
    return value;
  }
  return nodeToSection(node, origin, path);
}

function describeNode(node: JsonNode): string {
  switch (node.type) {
    case 'array':
      return 'a list';
    case 'null':
      return 'null';
    default:
      return node.type;
  }
}

/** Reads one JSON document whose top level is an object. */
export class JsonFileParser implements SectionParser {
  constructor(readonly filePath: string) {}

  parse(): Section {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      throw new CantParseError(this.filePath, '', `cannot read file: ${describeError(error)}`, error);
    }

    return parseJsonSection(text, this.filePath);
  }

  describe(): string {
    return `json:${this.filePath}`;
  }
}
