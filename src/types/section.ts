export type Scalar = string | number | boolean;

export type SectionValue = Scalar | readonly Scalar[] | Section;

/**
 * One node of the configuration tree. Key order is insertion order and
 * decides construction order, so sections are maps rather than plain objects.
 */
export type Section = ReadonlyMap<string, SectionValue>;

/** Plain-object form of a section, as written in code or decoded from JSON. */
export interface SectionObject {
  [key: string]: Scalar | readonly Scalar[] | SectionObject;
}

export const EMPTY_SECTION: Section = new Map<string, SectionValue>();

export function isSection(value: unknown): value is Section {
  return value instanceof Map;
}

export function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export function isScalarList(value: unknown): value is readonly Scalar[] {
  return Array.isArray(value) && value.every(isScalar);
}

/**
 * Builds a section from a plain object, keeping the object's key order.
 * Integer-like keys follow JavaScript's own ordering rules; build from
 * entries when such keys must keep a custom order.
 */
export function section(obj: SectionObject): Section {
  return sectionFromEntries(
    Object.entries(obj).map(([key, value]) => [key, toSectionValue(value)])
  );
}

export function sectionFromEntries(entries: Iterable<readonly [string, SectionValue]>): Section {
  return new Map(entries);
}

function toSectionValue(value: Scalar | readonly Scalar[] | SectionObject): SectionValue {
  if (isScalar(value) || isScalarList(value)) {
    return value;
  }
  return section(value);
}

/** Plain-object snapshot, for logs and debugging. */
export function sectionToObject(node: Section): SectionObject {
  const out: SectionObject = {};
  for (const [key, value] of node) {
    out[key] = isSection(value) ? sectionToObject(value) : value;
  }
  return out;
}
