import type { Handle } from '../../handles/types';
import { NoDeviceError, UnknownDeviceNameError } from '../../utils/errors';

/**
 * Ordered top-level handles of one build. A rebuild produces a new graph,
 * which also starts with an empty name cache.
 */
export class HandleGraph {
  private readonly byNameCache = new Map<string, Handle>();

  constructor(readonly handles: readonly Handle[] = []) {}

  static empty(): HandleGraph {
    return new HandleGraph([]);
  }

  get size(): number {
    return this.handles.length;
  }

  get isEmpty(): boolean {
    return this.handles.length === 0;
  }

  names(): string[] {
    return this.handles.map(handle => handle.name);
  }

  /** Top-level handle by position. Throws `NoDeviceError` when out of range. */
  at(index: number): Handle {
    if (!Number.isInteger(index) || index < 0 || index >= this.handles.length) {
      throw new NoDeviceError(index, this.handles.length);
    }
    return this.handles[index];
  }

  /** Top-level handle by name. Hits are cached for the lifetime of the graph. */
  byName(name: string): Handle {
    const cached = this.byNameCache.get(name);
    if (cached) {
      return cached;
    }

    const found = this.handles.find(handle => handle.name === name);
    if (!found) {
      throw new UnknownDeviceNameError(name, this.names());
    }

    this.byNameCache.set(name, found);
    return found;
  }

  /** Names resolved so far through `byName`. */
  cachedNames(): string[] {
    return Array.from(this.byNameCache.keys());
  }
}
