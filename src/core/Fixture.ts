import { inject, injectable } from 'inversify';
import { SERVICE_IDENTIFIERS } from './container/identifiers';
import { LifecycleManager, FixtureState } from './lifecycle/LifecycleManager';
import { CmdOutcome, CommandRouter, ResetOutcome } from './router/CommandRouter';
import type { FixtureSettings } from '../config';
import type { ExpectPattern, Handle } from '../handles/types';
import { isSection } from '../types/section';
import { discoverFixtureFiles } from '../sources/discovery';
import { isSectionParser } from '../sources/parsers';
import { FixtureSource, SourceLoader } from '../sources/SourceLoader';
import type { Logger } from '../utils/logger';

export type FixtureScopeBody<T> = (fixture: Fixture, devs: readonly Handle[]) => T;

/**
 * Builds devices and connections from fixture sources and owns them until
 * `tearDown` or `close`.
 *
 * ```ts
 * const fixture = createFixture({ name: 'smoke', transports })
 *   .read('/etc/rig/fixture.json')
 *   .read({ dev1: { type: 'Device', conns: { serial1: { type: 'SerialConnection', port: '/dev/ttyUSB1' } } } });
 * fixture.cmdFirst('uname -a');
 * fixture.tearDown();
 * ```
 */
@injectable()
export class Fixture {
  constructor(
    @inject(SERVICE_IDENTIFIERS.FIXTURE_NAME) readonly name: string,
    @inject(SERVICE_IDENTIFIERS.LIFECYCLE_MANAGER) readonly lifecycle: LifecycleManager,
    @inject(SERVICE_IDENTIFIERS.COMMAND_ROUTER) private readonly router: CommandRouter,
    @inject(SERVICE_IDENTIFIERS.SOURCE_LOADER) readonly sources: SourceLoader,
    @inject(SERVICE_IDENTIFIERS.SETTINGS) readonly settings: FixtureSettings,
    @inject(SERVICE_IDENTIFIERS.LOGGER) private readonly logger: Logger
  ) {}

  get devs(): readonly Handle[] {
    return this.lifecycle.handles;
  }

  get state(): FixtureState {
    return this.lifecycle.state;
  }

  /**
   * Loads every source, then rebuilds the graph from the merged result.
   * A source that fails to load leaves the fixture untouched.
   */
  read(...sources: FixtureSource[]): this {
    this.logger.debug('read', { sources: sources.map(describeSource) });
    const sections = this.sources.loadAll(sources);
    this.lifecycle.rebuild(...sections);
    return this;
  }

  /**
   * Reads the fixture files found from `callLocation` upwards. Finding none is
   * not an error; the fixture simply stays empty.
   */
  autoSearch(callLocation: string): string[] {
    const files = discoverFixtureFiles({
      callLocation,
      filename: this.settings.fixtureFilename,
      debugSourceVariable: this.settings.debugSourceVariable
    });

    this.logger.debug('Auto-search finished', { callLocation, files });
    if (files.length > 0) {
      this.read(...files);
    }
    return files;
  }

  /** Device by position or by name. */
  getDev(which: number | string): Handle {
    return this.router.getDev(which);
  }

  /** Send to the first device only. */
  cmdFirst(msg: string, expect?: ExpectPattern, timeout?: number, loginTimeout?: number): string {
    return this.router.cmdFirst(msg, expect, timeout, loginTimeout);
  }

  /** Try the devices in order and return the first answer. */
  cmdAny(msg: string, expect?: ExpectPattern, timeout?: number, loginTimeout?: number): string {
    return this.router.cmdAny(msg, expect, timeout, loginTimeout);
  }

  /** Send to every device and report one outcome each. */
  cmdAll(msg: string, expect?: ExpectPattern, timeout?: number, loginTimeout?: number): CmdOutcome[] {
    return this.router.cmdAll(msg, expect, timeout, loginTimeout);
  }

  /** Reset every device to its built configuration. */
  resetConfigAll(): ResetOutcome[] {
    return this.router.resetAll();
  }

  /** Close every device. The fixture can be read into again afterwards. */
  tearDown(): void {
    this.logger.debug('tearDown');
    this.lifecycle.teardown();
  }

  /** Tear down for good. Later reads throw `FixtureClosedError`. */
  close(): void {
    this.lifecycle.close();
  }

  /** Run `body` with the fixture and its devices, then tear down once, even when it throws. */
  use<T>(body: FixtureScopeBody<T>): T {
    return this.lifecycle.withScope((_manager, handles) => body(this, handles));
  }

  toString(): string {
    return `Fixture(${this.name}).devs:[${this.devs.map(dev => String(dev)).join(', ')}]`;
  }
}

function describeSource(source: FixtureSource): string {
  if (typeof source === 'string') return source;
  if (isSection(source)) return 'section';
  if (isSectionParser(source)) return source.describe ? source.describe() : 'parser';
  return 'inline object';
}
