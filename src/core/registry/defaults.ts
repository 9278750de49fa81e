import { TypeRegistry } from './TypeRegistry';
import { Device } from '../../handles/Device';
import { SerialConnection, SshConnection } from '../../handles/connections';
import type { HandleFactory } from '../../handles/types';
import { TransportFactory, unavailableTransports } from '../../transports/Transport';
import { Logger, log } from '../../utils/logger';

export interface DefaultRegistryOptions {
  transports?: TransportFactory;
  logger?: Logger;
}

export const DEFAULT_TYPES = {
  DEVICE: 'Device',
  SERIAL_CONNECTION: 'SerialConnection',
  SSH_CONNECTION: 'SshConnection'
} as const;

export function defaultFactories(
  transports: TransportFactory,
  logger: Logger
): Record<string, HandleFactory> {
  const handleLogger = logger.child('handle');

  return {
    [DEFAULT_TYPES.DEVICE]: (_name, attributes) => Device.fromAttributes(attributes, handleLogger),
    [DEFAULT_TYPES.SERIAL_CONNECTION]: (_name, attributes) =>
      SerialConnection.fromAttributes(attributes, transports, handleLogger),
    [DEFAULT_TYPES.SSH_CONNECTION]: (_name, attributes) =>
      SshConnection.fromAttributes(attributes, transports, handleLogger)
  };
}

/**
 * Registry seeded with one device kind and the serial and ssh connection kinds.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): TypeRegistry {
  const logger = options.logger ?? log;
  return new TypeRegistry(logger).registerAll(
    defaultFactories(options.transports ?? unavailableTransports, logger)
  );
}
