import { inject, injectable } from 'inversify';
import { SERVICE_IDENTIFIERS } from '../container/identifiers';
import { HandleGraph } from './HandleGraph';
import { TypeRegistry } from '../registry/TypeRegistry';
import type { AttributeValue, Handle, HandleAttributes, HandleFactory } from '../../handles/types';
import { Section, isSection } from '../../types/section';
import {
  ConstructionError,
  EmptyConfigError,
  MissingTypeError,
  UnknownTypeError,
  describeError
} from '../../utils/errors';
import type { Logger } from '../../utils/logger';

// Keys the builder interprets; everything else is handed to the factory as is.
const TYPE_KEY = 'type';
const CONNS_KEY = 'conns';
const BCC_KEY = 'bcc';
const BCTRL_KEY = 'bctrl';
const NAME_KEY = 'name';

const RESERVED_KEYS: ReadonlySet<string> = new Set([TYPE_KEY, CONNS_KEY, BCC_KEY, BCTRL_KEY, NAME_KEY]);

/**
 * Turns a merged configuration tree into handles.
 *
 * The source section is only read, never modified, so building the same
 * tree twice yields two structurally equal graphs.
 */
@injectable()
export class ObjectGraphBuilder {
  private readonly logger: Logger;

  constructor(
    @inject(SERVICE_IDENTIFIERS.TYPE_REGISTRY) private readonly registry: TypeRegistry,
    @inject(SERVICE_IDENTIFIERS.LOGGER) logger: Logger
  ) {
    this.logger = logger.child('builder');
  }

  /**
   * Builds one handle per top-level section, in key order.
   *
   * When any section fails, every handle constructed so far that no parent
   * owns yet gets a best-effort `closeAll()` before the error propagates.
   */
  build(root: Section, registry: TypeRegistry = this.registry): HandleGraph {
    if (root.size === 0) {
      throw new EmptyConfigError();
    }

    const unowned: Handle[] = [];
    try {
      for (const [name, value] of root) {
        if (!isSection(value)) {
          throw new ConstructionError(name, name, `top-level entry must be a section, got ${typeof value}`);
        }
        this.construct(name, value, registry, name, unowned);
      }
    } catch (error) {
      this.discard(unowned);
      throw error;
    }

    this.logger.debug('Graph built', { devices: unowned.map(h => h.name) });
    return new HandleGraph(unowned);
  }

  /**
   * Builds the handle of one section and, recursively, its connections and
   * backup controller. Children built before a failure are closed again.
   */
  parseSection(
    name: string,
    section: Section,
    registry: TypeRegistry = this.registry,
    path: string = name
  ): Handle {
    const unowned: Handle[] = [];
    try {
      return this.construct(name, section, registry, path, unowned);
    } catch (error) {
      this.discard(unowned);
      throw error;
    }
  }

  /**
   * Pushes the new handle onto `unowned`. Children pushed while building it
   * are taken off again once the factory has accepted them.
   */
  private construct(
    name: string,
    section: Section,
    registry: TypeRegistry,
    path: string,
    unowned: Handle[]
  ): Handle {
    this.logger.debug('Parsing section', { path, keys: Array.from(section.keys()) });

    const tag = section.get(TYPE_KEY);
    if (typeof tag !== 'string') {
      throw new MissingTypeError(name, path);
    }

    let factory: HandleFactory;
    try {
      factory = registry.lookup(tag);
    } catch (error) {
      if (error instanceof UnknownTypeError) {
        throw new UnknownTypeError(error.tag, error.knownTags, path);
      }
      throw error;
    }

    const attributes: Record<string, AttributeValue> = {};
    for (const [key, value] of section) {
      if (!RESERVED_KEYS.has(key)) {
        attributes[key] = value;
      }
    }

    const mark = unowned.length;

    const conns = section.get(CONNS_KEY);
    if (conns !== undefined) {
      attributes[CONNS_KEY] = this.parseConns(conns, registry, `${path}.${CONNS_KEY}`, unowned);
    }

    const backup = this.parseBackupController(section, registry, path, unowned);
    if (backup) {
      attributes[BCC_KEY] = backup;
    }

    const finalAttributes: HandleAttributes = { ...attributes, [NAME_KEY]: name };

    this.logger.debug('Constructing handle', {
      path,
      type: tag,
      attributes: Object.keys(finalAttributes)
    });

    let handle: Handle;
    try {
      handle = factory(name, finalAttributes);
    } catch (error) {
      throw new ConstructionError(name, path, describeError(error), error);
    }

    unowned.splice(mark);
    unowned.push(handle);
    return handle;
  }

  private parseConns(value: AttributeValue, registry: TypeRegistry, path: string, unowned: Handle[]): Handle[] {
    if (!isSection(value)) {
      throw new ConstructionError(CONNS_KEY, path, `'${CONNS_KEY}' must be a section of connection sections`);
    }

    const handles: Handle[] = [];
    for (const [childName, child] of value) {
      if (!isSection(child)) {
        throw new ConstructionError(childName, `${path}.${childName}`, 'connection entry must be a section');
      }
      handles.push(this.construct(childName, child, registry, `${path}.${childName}`, unowned));
    }
    return handles;
  }

  /**
   * `bctrl` supersedes the deprecated `bcc`; both end up as attribute `bcc`.
   * A `bcc` handle that `bctrl` replaced is closed again.
   */
  private parseBackupController(
    section: Section,
    registry: TypeRegistry,
    path: string,
    unowned: Handle[]
  ): Handle | undefined {
    let backup: Handle | undefined;

    const bcc = section.get(BCC_KEY);
    if (bcc !== undefined) {
      this.logger.warn(`DEPRECATED: use '${BCTRL_KEY}' instead of '${BCC_KEY}'`, { path });
      backup = this.parseChild(BCC_KEY, bcc, registry, `${path}.${BCC_KEY}`, unowned);
    }

    const bctrl = section.get(BCTRL_KEY);
    if (bctrl !== undefined) {
      const superseded = backup;
      backup = this.parseChild(BCTRL_KEY, bctrl, registry, `${path}.${BCTRL_KEY}`, unowned);
      if (superseded) {
        unowned.splice(unowned.indexOf(superseded), 1);
        this.discard([superseded]);
      }
    }

    return backup;
  }

  private parseChild(
    name: string,
    value: AttributeValue,
    registry: TypeRegistry,
    path: string,
    unowned: Handle[]
  ): Handle {
    if (!isSection(value)) {
      throw new ConstructionError(name, path, `'${name}' must be a section`);
    }
    return this.construct(name, value, registry, path, unowned);
  }

  private discard(handles: readonly Handle[]): void {
    for (const handle of handles) {
      try {
        handle.closeAll();
      } catch (error) {
        this.logger.warn('Could not close handle of a failed build', {
          handle: handle.name,
          error: describeError(error)
        });
      }
    }
  }
}
