import 'reflect-metadata';

export * from './core';
export * from './types';

export { Device } from './handles/Device';
export { Connection, SerialConnection, SshConnection, DEFAULT_BAUDRATE, DEFAULT_SSH_PORT } from './handles/connections';
export { AttributeReader } from './handles/attributes';
export { DEFAULT_CMD_TIMEOUT, isHandle } from './handles/types';

export { unavailableTransports } from './transports/Transport';
export type {
  Credentials,
  ExchangeRequest,
  Transport,
  TransportFactory,
  TransportKind,
  TransportOptions
} from './transports/Transport';

export { SourceLoader } from './sources/SourceLoader';
export type { FixtureSource, ParserFactory } from './sources/SourceLoader';
export { JsonFileParser, parseJsonSection, toSection, isSectionParser } from './sources/parsers';
export type { SectionParser } from './sources/parsers';
export { discoverFixtureFiles, parentDirs } from './sources/discovery';
export type { DiscoveryOptions } from './sources/discovery';

export { DEFAULT_SETTINGS, loadSettings } from './config';
export type { FixtureSettings } from './config';

export * from './utils/errors';
export { createLogger, log } from './utils/logger';
export type { Logger, LogMeta } from './utils/logger';
