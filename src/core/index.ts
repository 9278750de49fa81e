// Fixture facade
export { Fixture } from './Fixture';
export type { FixtureScopeBody } from './Fixture';

// Components
export { ConfigStore, mergeSections } from './config/ConfigStore';
export { TypeRegistry } from './registry/TypeRegistry';
export { createDefaultRegistry, defaultFactories, DEFAULT_TYPES } from './registry/defaults';
export type { DefaultRegistryOptions } from './registry/defaults';
export { HandleGraph } from './graph/HandleGraph';
export { ObjectGraphBuilder } from './graph/ObjectGraphBuilder';
export { CommandRouter } from './router/CommandRouter';
export type { CmdOutcome, ResetOutcome } from './router/CommandRouter';
export { LifecycleManager } from './lifecycle/LifecycleManager';
export type { FixtureState, ScopeBody } from './lifecycle/LifecycleManager';

// Container system
export * from './container';
