import 'reflect-metadata';

// Service identifiers
export const SERVICE_IDENTIFIERS = {
  // Core services
  LOGGER: Symbol('Logger'),
  SETTINGS: Symbol('Settings'),
  FIXTURE_NAME: Symbol('FixtureName'),

  // Construction
  CONFIG_STORE: Symbol('ConfigStore'),
  TYPE_REGISTRY: Symbol('TypeRegistry'),
  GRAPH_BUILDER: Symbol('ObjectGraphBuilder'),
  SOURCE_LOADER: Symbol('SourceLoader'),

  // Runtime
  LIFECYCLE_MANAGER: Symbol('LifecycleManager'),
  COMMAND_ROUTER: Symbol('CommandRouter'),
  FIXTURE: Symbol('Fixture')
} as const;

export type ServiceIdentifiers = typeof SERVICE_IDENTIFIERS;
