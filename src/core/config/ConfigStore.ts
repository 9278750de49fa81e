import { inject, injectable } from 'inversify';
import { SERVICE_IDENTIFIERS } from '../container/identifiers';
import { EMPTY_SECTION, Section, SectionObject, SectionValue, isSection, sectionToObject } from '../../types/section';
import type { Logger } from '../../utils/logger';

/**
 * Holds the merged configuration tree of one fixture.
 *
 * Sources are merged in the order they arrive; later sources win. Two sections
 * under the same key merge key-by-key, anything else replaces the old value
 * wholesale, dropping whatever was nested under it.
 */
@injectable()
export class ConfigStore {
  private current: Section = EMPTY_SECTION;
  private readonly logger: Logger;

  constructor(@inject(SERVICE_IDENTIFIERS.LOGGER) logger: Logger) {
    this.logger = logger.child('config');
  }

  get root(): Section {
    return this.current;
  }

  get isEmpty(): boolean {
    return this.current.size === 0;
  }

  /** Merge a tree over the stored one. Later values win; existing keys keep their position. */
  merge(tree: Section): this {
    this.current = mergeSections(this.current, tree);
    this.logger.debug('Configuration merged', {
      mergedKeys: Array.from(tree.keys()),
      topLevelKeys: Array.from(this.current.keys())
    });
    return this;
  }

  /** Forget everything merged so far. */
  clear(): void {
    this.current = EMPTY_SECTION;
    this.logger.debug('Configuration cleared');
  }

  /** Plain-object copy of the merged tree, for logging and tests. */
  toObject(): SectionObject {
    return sectionToObject(this.current);
  }
}

/**
 * Returns a new section; neither input is modified. A replaced key keeps its
 * position in `base`, new keys are appended in `overlay` order.
 */
export function mergeSections(base: Section, overlay: Section): Section {
  const merged = new Map<string, SectionValue>(base);

  for (const [key, value] of overlay) {
    const existing = merged.get(key);
    if (existing !== undefined && isSection(existing) && isSection(value)) {
      merged.set(key, mergeSections(existing, value));
    } else {
      merged.set(key, value);
    }
  }

  return merged;
}
