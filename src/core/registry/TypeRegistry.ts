import { inject, injectable } from 'inversify';
import { SERVICE_IDENTIFIERS } from '../container/identifiers';
import type { HandleFactory } from '../../handles/types';
import { UnknownTypeError } from '../../utils/errors';
import type { Logger } from '../../utils/logger';

/**
 * Maps the `type` tag of a config section to the factory building its handle.
 */
@injectable()
export class TypeRegistry {
  private factories = new Map<string, HandleFactory>();
  private readonly logger: Logger;

  constructor(@inject(SERVICE_IDENTIFIERS.LOGGER) logger: Logger) {
    this.logger = logger.child('registry');
  }

  /** Register a factory under a type tag, replacing any earlier one. */
  register(tag: string, factory: HandleFactory): this {
    const replaced = this.factories.has(tag);
    this.factories.set(tag, factory);

    this.logger.debug(replaced ? 'Type factory replaced' : 'Type factory registered', { tag });

    return this;
  }

  /** Register several factories at once. */
  registerAll(factories: Readonly<Record<string, HandleFactory>>): this {
    Object.entries(factories).forEach(([tag, factory]) => this.register(tag, factory));
    return this;
  }

  /**
   * Find the factory for a tag.
   * Throws `UnknownTypeError` naming the known tags when there is none.
   */
  lookup(tag: string): HandleFactory {
    const factory = this.factories.get(tag);
    if (!factory) {
      throw new UnknownTypeError(tag, this.tags());
    }
    return factory;
  }

  /** Whether a factory is registered for the tag. */
  has(tag: string): boolean {
    return this.factories.has(tag);
  }

  /** Registered tags, in registration order. */
  tags(): string[] {
    return Array.from(this.factories.keys());
  }
}
