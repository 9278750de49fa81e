import { AttributeValue, Handle, HandleAttributes, isHandle, isHandleList } from './types';

/**
 * Typed reads over a factory's attribute record. Every unexpected or
 * ill-typed attribute throws, and the builder reports it against the section.
 */
export class AttributeReader {
  private readonly consumed = new Set<string>(['name']);

  constructor(private readonly attributes: HandleAttributes) {}

  get name(): string {
    return this.attributes.name;
  }

  /** Optional string attribute. */
  string(key: string): string | undefined {
    const value = this.take(key);
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      throw new TypeError(`attribute '${key}' must be a string, got ${describe(value)}`);
    }
    return value;
  }

  requiredString(key: string): string {
    const value = this.string(key);
    if (value === undefined) {
      throw new TypeError(`missing required attribute '${key}'`);
    }
    return value;
  }

  // numeric strings count too, text formats such as INI only have strings
  number(key: string): number | undefined {
    const value = this.take(key);
    if (value === undefined) return undefined;
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
      throw new TypeError(`attribute '${key}' must be a number, got ${describe(value)}`);
    }
    return parsed;
  }

  /** Optional child handle, as built from a nested section. */
  handle(key: string): Handle | undefined {
    const value = this.take(key);
    if (value === undefined) return undefined;
    if (!isHandle(value)) {
      throw new TypeError(`attribute '${key}' must be a constructed handle, got ${describe(value)}`);
    }
    return value;
  }

  /** Child handle list; empty when absent. */
  handles(key: string): readonly Handle[] {
    const value = this.take(key);
    if (value === undefined) return [];
    if (!isHandleList(value)) {
      throw new TypeError(`attribute '${key}' must be a list of constructed handles, got ${describe(value)}`);
    }
    return value;
  }

  /** Throws when the record holds a key no read asked for. */
  done(): void {
    const unexpected = Object.keys(this.attributes).filter(key => !this.consumed.has(key));
    if (unexpected.length > 0) {
      throw new TypeError(`unexpected attribute(s): ${unexpected.join(', ')}`);
    }
  }

  private take(key: string): AttributeValue | undefined {
    this.consumed.add(key);
    return Object.prototype.hasOwnProperty.call(this.attributes, key) ? this.attributes[key] : undefined;
  }
}

function describe(value: AttributeValue): string {
  if (Array.isArray(value)) return 'a list';
  if (value instanceof Map) return 'a section';
  if (isHandle(value)) return `handle '${value.name}'`;
  return `${typeof value} ${JSON.stringify(value)}`;
}
