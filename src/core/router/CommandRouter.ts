import { inject, injectable } from 'inversify';
import { SERVICE_IDENTIFIERS } from '../container/identifiers';
import { LifecycleManager } from '../lifecycle/LifecycleManager';
import type { FixtureSettings } from '../../config';
import type { ExpectPattern, Handle } from '../../handles/types';
import {
  CantHandleError,
  FailedAttempt,
  HandleCmdError,
  HandleError,
  HandleResetError,
  NoDeviceError,
  describeError
} from '../../utils/errors';
import type { Logger } from '../../utils/logger';

export type CmdOutcome =
  | { device: string; ok: true; result: string }
  | { device: string; ok: false; error: HandleError };

export type ResetOutcome =
  | { device: string; ok: true }
  | { device: string; ok: false; error: HandleError };

/**
 * Sends commands across the current handle graph of a lifecycle manager.
 */
@injectable()
export class CommandRouter {
  private readonly logger: Logger;

  constructor(
    @inject(SERVICE_IDENTIFIERS.LIFECYCLE_MANAGER) private readonly lifecycle: LifecycleManager,
    @inject(SERVICE_IDENTIFIERS.SETTINGS) private readonly settings: FixtureSettings,
    @inject(SERVICE_IDENTIFIERS.LOGGER) logger: Logger
  ) {
    this.logger = logger.child('router');
  }

  /**
   * Sends to the first device in graph order only.
   * Throws `NoDeviceError` on an empty graph and the device's `HandleError` on failure.
   */
  cmdFirst(msg: string, expect?: ExpectPattern, timeout?: number, loginTimeout?: number): string {
    const handles = this.lifecycle.handles;
    if (handles.length === 0) {
      throw new NoDeviceError();
    }

    this.logger.debug('cmdFirst', { msg, device: handles[0].name, timeout, loginTimeout });
    const outcome = this.send(handles[0], msg, expect, timeout, loginTimeout);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.result;
  }

  /**
   * Tries devices in graph order and returns the first answer; devices after
   * the one that answered are not contacted. Throws `CantHandleError` listing
   * every attempt when no device answers.
   */
  cmdAny(msg: string, expect?: ExpectPattern, timeout?: number, loginTimeout?: number): string {
    const handles = this.lifecycle.handles;
    if (handles.length === 0) {
      this.logger.warn('Fixture has no devices for sending commands to');
    }

    const attempts: FailedAttempt[] = [];
    for (const handle of handles) {
      const outcome = this.send(handle, msg, expect, timeout, loginTimeout);
      if (outcome.ok) {
        return outcome.result;
      }
      attempts.push({ device: handle.name, error: outcome.error });
      this.logger.debug('Device could not handle cmd', { device: handle.name, error: outcome.error.message });
    }

    throw new CantHandleError(msg, attempts);
  }

  /**
   * Contacts every device in graph order and reports one outcome per device.
   * Throws only when the graph is empty.
   */
  cmdAll(msg: string, expect?: ExpectPattern, timeout?: number, loginTimeout?: number): CmdOutcome[] {
    const handles = this.lifecycle.handles;
    if (handles.length === 0) {
      throw new NoDeviceError();
    }

    return handles.map(handle => {
      const outcome = this.send(handle, msg, expect, timeout, loginTimeout);
      if (!outcome.ok) {
        this.logger.warn('cmdAll: device failed', { device: handle.name, error: outcome.error.message });
      }
      return outcome;
    });
  }

  /**
   * Looks a device up by zero-based index, or by name through the graph's
   * name cache. Throws `NoDeviceError` or `UnknownDeviceNameError`.
   */
  getDev(which: number | string): Handle {
    const graph = this.lifecycle.graph;
    return typeof which === 'number' ? graph.at(which) : graph.byName(which);
  }

  /**
   * Resets every device in graph order without stopping at a failure.
   * An empty graph only logs a warning.
   */
  resetAll(): ResetOutcome[] {
    const handles = this.lifecycle.handles;
    if (handles.length === 0) {
      this.logger.warn('Fixture has no devices to reset');
      return [];
    }

    return handles.map((handle): ResetOutcome => {
      try {
        handle.resetConfig();
        return { device: handle.name, ok: true };
      } catch (error) {
        const wrapped = error instanceof HandleError
          ? error
          : new HandleResetError(handle.name, describeError(error), error);
        this.logger.warn('Device reset failed', { device: handle.name, error: wrapped.message });
        return { device: handle.name, ok: false, error: wrapped };
      }
    });
  }

  // anything a handle throws that is not a HandleError is wrapped as HandleCmdError
  private send(
    handle: Handle,
    msg: string,
    expect: ExpectPattern | undefined,
    timeout: number | undefined,
    loginTimeout: number | undefined
  ): CmdOutcome {
    try {
      const result = handle.cmd(msg, expect, timeout ?? this.settings.defaultTimeout, loginTimeout);
      return { device: handle.name, ok: true, result };
    } catch (error) {
      const wrapped = error instanceof HandleError
        ? error
        : new HandleCmdError(handle.name, msg, describeError(error), error);
      return { device: handle.name, ok: false, error: wrapped };
    }
  }
}
