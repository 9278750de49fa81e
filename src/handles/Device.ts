import { AttributeReader } from './attributes';
import { DEFAULT_CMD_TIMEOUT, ExpectPattern, Handle, HandleAttributes } from './types';
import {
  FailedAttempt,
  HandleCloseError,
  HandleCmdError,
  HandleResetError,
  describeError,
  toError
} from '../utils/errors';
import type { Logger } from '../utils/logger';

/**
 * A device under test. Owns its connections and an optional backup
 * controller; commands go to the first connection that answers.
 */
export class Device implements Handle {
  constructor(
    readonly name: string,
    readonly conns: readonly Handle[],
    readonly bcc: Handle | undefined,
    readonly description: string | undefined,
    private readonly logger: Logger
  ) {}

  static fromAttributes(attributes: HandleAttributes, logger: Logger): Device {
    const attrs = new AttributeReader(attributes);
    const conns = attrs.handles('conns');
    const bcc = attrs.handle('bcc');
    const description = attrs.string('description');
    attrs.done();

    return new Device(attrs.name, conns, bcc, description, logger);
  }

  /** Try each connection in order until one answers. */
  cmd(msg: string, expect?: ExpectPattern, timeout: number = DEFAULT_CMD_TIMEOUT, loginTimeout?: number): string {
    const failures: FailedAttempt[] = [];

    for (const conn of this.conns) {
      try {
        return conn.cmd(msg, expect, timeout, loginTimeout);
      } catch (error) {
        failures.push({ device: conn.name, error: toError(error) });
        this.logger.debug('Connection could not handle cmd', {
          device: this.name,
          connection: conn.name,
          error: describeError(error)
        });
      }
    }

    const reason = failures.length === 0
      ? 'device has no connections'
      : `all connections failed: ${failures.map(f => `${f.device} (${f.error.message})`).join('; ')}`;
    throw new HandleCmdError(this.name, msg, reason, failures[failures.length - 1]?.error);
  }

  /** Close every connection and the bcc, then report the failures together. */
  closeAll(): void {
    const failures = this.forEachOwned(handle => handle.closeAll());
    if (failures.length > 0) {
      throw new HandleCloseError(this.name, summarize(failures), failures[0].error);
    }
  }

  /** Reset every connection and the bcc, then report the failures together. */
  resetConfig(): void {
    const failures = this.forEachOwned(handle => handle.resetConfig());
    if (failures.length > 0) {
      throw new HandleResetError(this.name, summarize(failures), failures[0].error);
    }
  }

  toString(): string {
    return `Device(${this.name})`;
  }

  // best effort: one failing child does not stop the others
  private forEachOwned(action: (handle: Handle) => void): FailedAttempt[] {
    const owned = this.bcc ? [...this.conns, this.bcc] : [...this.conns];
    const failures: FailedAttempt[] = [];

    for (const handle of owned) {
      try {
        action(handle);
      } catch (error) {
        failures.push({ device: handle.name, error: toError(error) });
      }
    }

    return failures;
  }
}

function summarize(failures: readonly FailedAttempt[]): string {
  return failures.map(f => `${f.device} (${f.error.message})`).join('; ');
}
