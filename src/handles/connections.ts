import { AttributeReader } from './attributes';
import { DEFAULT_CMD_TIMEOUT, ExpectPattern, Handle, HandleAttributes } from './types';
import {
  Credentials,
  Transport,
  TransportFactory,
  TransportOptions
} from '../transports/Transport';
import {
  HandleCloseError,
  HandleCmdError,
  HandleError,
  HandleResetError,
  describeError
} from '../utils/errors';
import type { Logger } from '../utils/logger';

/**
 * Leaf handle owning one transport session. The session is opened on the
 * first `cmd` and dropped by `closeAll` or `resetConfig`.
 */
export abstract class Connection implements Handle {
  private transport: Transport | null = null;

  protected constructor(
    readonly name: string,
    readonly credentials: Credentials,
    private readonly transports: TransportFactory,
    protected readonly logger: Logger
  ) {}

  protected abstract transportOptions(): TransportOptions;

  get isOpen(): boolean {
    return this.transport !== null;
  }

  /** Send over the transport, opening it on first use. */
  cmd(msg: string, expect?: ExpectPattern, timeout: number = DEFAULT_CMD_TIMEOUT, loginTimeout?: number): string {
    const transport = this.open(msg);

    try {
      return transport.exchange({ msg, expect, timeout, loginTimeout });
    } catch (error) {
      if (error instanceof HandleError) {
        throw error;
      }
      throw new HandleCmdError(this.name, msg, describeError(error), error);
    }
  }

  /** Close the transport if open. Closing twice is a no-op. */
  closeAll(): void {
    const transport = this.transport;
    if (!transport) {
      return;
    }

    this.transport = null;
    try {
      transport.close();
      this.logger.debug('Connection closed', { connection: this.name });
    } catch (error) {
      throw new HandleCloseError(this.name, describeError(error), error);
    }
  }

  resetConfig(): void {
    // drop the session; the next cmd logs in again
    try {
      this.closeAll();
    } catch (error) {
      throw new HandleResetError(this.name, describeError(error), error);
    }
  }

  toString(): string {
    return `${this.constructor.name}(${this.name})`;
  }

  private open(msg: string): Transport {
    if (this.transport) {
      return this.transport;
    }

    let transport: Transport;
    try {
      transport = this.transports(this.name, this.transportOptions(), this.credentials);
    } catch (error) {
      if (error instanceof HandleError) {
        throw error;
      }
      throw new HandleCmdError(this.name, msg, `cannot open transport: ${describeError(error)}`, error);
    }

    this.transport = transport;
    this.logger.debug('Connection opened', { connection: this.name });
    return transport;
  }
}

function readCredentials(attrs: AttributeReader): Credentials {
  return {
    user: attrs.string('user'),
    password: attrs.string('password'),
    prompt: attrs.string('prompt')
  };
}

export const DEFAULT_BAUDRATE = 115200;

export class SerialConnection extends Connection {
  constructor(
    name: string,
    readonly port: string,
    readonly baudrate: number,
    credentials: Credentials,
    transports: TransportFactory,
    logger: Logger
  ) {
    super(name, credentials, transports, logger);
  }

  static fromAttributes(attributes: HandleAttributes, transports: TransportFactory, logger: Logger): SerialConnection {
    const attrs = new AttributeReader(attributes);
    const port = attrs.requiredString('port');
    const baudrate = attrs.number('baudrate') ?? DEFAULT_BAUDRATE;
    const credentials = readCredentials(attrs);
    attrs.done();

    return new SerialConnection(attrs.name, port, baudrate, credentials, transports, logger);
  }

  protected transportOptions(): TransportOptions {
    return { kind: 'serial', port: this.port, baudrate: this.baudrate };
  }
}

export const DEFAULT_SSH_PORT = 22;

export class SshConnection extends Connection {
  constructor(
    name: string,
    readonly host: string,
    readonly port: number,
    credentials: Credentials,
    transports: TransportFactory,
    logger: Logger
  ) {
    super(name, credentials, transports, logger);
  }

  static fromAttributes(attributes: HandleAttributes, transports: TransportFactory, logger: Logger): SshConnection {
    const attrs = new AttributeReader(attributes);
    const host = attrs.requiredString('host');
    const port = attrs.number('port') ?? DEFAULT_SSH_PORT;
    const credentials = readCredentials(attrs);
    attrs.done();

    return new SshConnection(attrs.name, host, port, credentials, transports, logger);
  }

  protected transportOptions(): TransportOptions {
    return { kind: 'ssh', host: this.host, port: this.port };
  }
}
