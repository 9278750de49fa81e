import { Container } from 'inversify';
import { SERVICE_IDENTIFIERS } from './identifiers';
import { ConfigStore } from '../config/ConfigStore';
import { Fixture } from '../Fixture';
import { ObjectGraphBuilder } from '../graph/ObjectGraphBuilder';
import { LifecycleManager } from '../lifecycle/LifecycleManager';
import { createDefaultRegistry } from '../registry/defaults';
import { TypeRegistry } from '../registry/TypeRegistry';
import { CommandRouter } from '../router/CommandRouter';
import { FixtureSettings, loadSettings } from '../../config';
import type { FixtureSource } from '../../sources/SourceLoader';
import { SourceLoader } from '../../sources/SourceLoader';
import type { TransportFactory } from '../../transports/Transport';
import { Logger, log } from '../../utils/logger';

export interface FixtureOptions {
  name?: string;
  /** Replaces the default registry; `transports` is ignored when given. */
  registry?: TypeRegistry;
  /** Transport drivers for the default connection kinds. */
  transports?: TransportFactory;
  logger?: Logger;
  settings?: Partial<FixtureSettings>;
  /** Start directory for fixture file auto-search. */
  callLocation?: string;
  /** Overrides `settings.autoSearch`. */
  autoSearch?: boolean;
  /** Read after any auto-discovered files. */
  sources?: FixtureSource[];
}

/**
 * One container per fixture: the config store and the handle graph are never
 * shared between fixtures.
 */
export function createFixtureContainer(options: FixtureOptions = {}): Container {
  const name = options.name ?? 'Fixture';
  const logger = (options.logger ?? log).child(`fixture:${name}`);
  const settings: FixtureSettings = { ...loadSettings(), ...options.settings };
  const registry = options.registry ?? createDefaultRegistry({ transports: options.transports, logger });

  const container = new Container({ defaultScope: 'Singleton' });

  container.bind<string>(SERVICE_IDENTIFIERS.FIXTURE_NAME).toConstantValue(name);
  container.bind<Logger>(SERVICE_IDENTIFIERS.LOGGER).toConstantValue(logger);
  container.bind<FixtureSettings>(SERVICE_IDENTIFIERS.SETTINGS).toConstantValue(settings);
  container.bind<TypeRegistry>(SERVICE_IDENTIFIERS.TYPE_REGISTRY).toConstantValue(registry);

  container.bind<ConfigStore>(SERVICE_IDENTIFIERS.CONFIG_STORE).to(ConfigStore);
  container.bind<ObjectGraphBuilder>(SERVICE_IDENTIFIERS.GRAPH_BUILDER).to(ObjectGraphBuilder);
  container.bind<SourceLoader>(SERVICE_IDENTIFIERS.SOURCE_LOADER).to(SourceLoader);
  container.bind<LifecycleManager>(SERVICE_IDENTIFIERS.LIFECYCLE_MANAGER).to(LifecycleManager);
  container.bind<CommandRouter>(SERVICE_IDENTIFIERS.COMMAND_ROUTER).to(CommandRouter);
  container.bind<Fixture>(SERVICE_IDENTIFIERS.FIXTURE).to(Fixture);

  return container;
}

/**
 * Composes a fixture, runs auto-search when enabled and a call location is
 * known, then reads `options.sources`.
 */
export function createFixture(options: FixtureOptions = {}): Fixture {
  const fixture = createFixtureContainer(options).get<Fixture>(SERVICE_IDENTIFIERS.FIXTURE);

  const autoSearch = options.autoSearch ?? fixture.settings.autoSearch;
  if (autoSearch && options.callLocation) {
    fixture.autoSearch(options.callLocation);
  }

  if (options.sources && options.sources.length > 0) {
    fixture.read(...options.sources);
  }

  return fixture;
}
