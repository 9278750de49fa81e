import type { ExpectPattern } from '../handles/types';
import { TransportUnavailableError } from '../utils/errors';

export type TransportKind = 'serial' | 'ssh';

export interface SerialTransportOptions {
  kind: 'serial';
  port: string;
  baudrate: number;
}

export interface SshTransportOptions {
  kind: 'ssh';
  host: string;
  port: number;
}

export type TransportOptions = SerialTransportOptions | SshTransportOptions;

export interface Credentials {
  user?: string;
  password?: string;
  prompt?: string;
}

export interface ExchangeRequest {
  msg: string;
  expect?: ExpectPattern;
  timeout: number;
  loginTimeout?: number;
}

/**
 * An open session to a device. Implementations live outside this package
 * (serial line drivers, ssh clients); connections only talk to this seam.
 */
export interface Transport {
  exchange(request: ExchangeRequest): string;
  close(): void;
}

export type TransportFactory = (
  handle: string,
  options: TransportOptions,
  credentials: Credentials
) => Transport;

/** Default factory: no drivers are bundled, so every open attempt fails. */
export const unavailableTransports: TransportFactory = (handle, options) => {
  throw new TransportUnavailableError(handle, options.kind);
};
