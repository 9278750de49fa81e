export { SERVICE_IDENTIFIERS } from './identifiers';
export type { ServiceIdentifiers } from './identifiers';

export { createFixture, createFixtureContainer } from './FixtureContainer';
export type { FixtureOptions } from './FixtureContainer';
