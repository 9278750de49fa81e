export type ConfigErrorKind =
  | 'empty-config'
  | 'missing-type'
  | 'unknown-type'
  | 'construction'
  | 'cant-parse';

export type GraphErrorKind =
  | 'no-device'
  | 'unknown-device-name'
  | 'cant-handle'
  | 'teardown'
  | 'closed';

export type HandleErrorKind =
  | 'handle-cmd'
  | 'handle-close'
  | 'handle-reset'
  | 'transport-unavailable';

export type FixtureErrorKind = ConfigErrorKind | GraphErrorKind | HandleErrorKind;

// Base error class
export abstract class FixtureError extends Error {
  abstract readonly kind: FixtureErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;

    Error.captureStackTrace(this, this.constructor);
  }
}

// ---------------------------------------------------------------------------
// Configuration branch
// ---------------------------------------------------------------------------

export abstract class ConfigError extends FixtureError {
  abstract readonly kind: ConfigErrorKind;
}

export class EmptyConfigError extends ConfigError {
  readonly kind = 'empty-config' as const;

  constructor() {
    super('no device sections configured; read at least one fixture source');
  }
}

export class MissingTypeError extends ConfigError {
  readonly kind = 'missing-type' as const;

  constructor(public readonly section: string, public readonly path: string) {
    super(`section '${path}' has no string 'type' key`);
  }
}

export class UnknownTypeError extends ConfigError {
  readonly kind = 'unknown-type' as const;

  constructor(
    public readonly tag: string,
    public readonly knownTags: readonly string[],
    public readonly path?: string
  ) {
    super(
      `unknown type '${tag}'${path ? ` in section '${path}'` : ''}; registered types: ${knownTags.join(', ') || '(none)'}`
    );
  }
}

export class ConstructionError extends ConfigError {
  readonly kind = 'construction' as const;

  constructor(
    public readonly section: string,
    public readonly path: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`cannot construct section '${path}': ${reason}`, cause);
  }
}

export class CantParseError extends ConfigError {
  readonly kind = 'cant-parse' as const;

  constructor(
    public readonly origin: string,
    public readonly path: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`cannot parse ${origin}${path ? ` at '${path}'` : ''}: ${reason}`, cause);
  }
}

// ---------------------------------------------------------------------------
// Graph branch
// ---------------------------------------------------------------------------

export abstract class GraphError extends FixtureError {
  abstract readonly kind: GraphErrorKind;
}

export class NoDeviceError extends GraphError {
  readonly kind = 'no-device' as const;

  constructor(public readonly index?: number, public readonly size: number = 0) {
    super(
      index === undefined
        ? 'this fixture has no device loaded'
        : `no device at index ${index}; fixture holds ${size} device(s)`
    );
  }
}

export class UnknownDeviceNameError extends GraphError {
  readonly kind = 'unknown-device-name' as const;

  constructor(public readonly requested: string, public readonly availableNames: readonly string[]) {
    super(`no device named '${requested}'; available names are: ${JSON.stringify(availableNames)}`);
  }
}

export interface FailedAttempt {
  device: string;
  error: Error;
}

export class CantHandleError extends GraphError {
  readonly kind = 'cant-handle' as const;

  constructor(public readonly msg: string, public readonly attempts: readonly FailedAttempt[]) {
    super(
      attempts.length === 0
        ? `no device could handle cmd ${JSON.stringify(msg)}: fixture has no devices`
        : `no device could handle cmd ${JSON.stringify(msg)}: ${attempts
            .map(a => `${a.device} (${a.error.message})`)
            .join('; ')}`
    );
  }
}

export class TeardownError extends GraphError {
  readonly kind = 'teardown' as const;

  constructor(public readonly failures: readonly FailedAttempt[]) {
    super(`teardown failed for ${failures.map(f => `${f.device} (${f.error.message})`).join('; ')}`);
  }
}

export class FixtureClosedError extends GraphError {
  readonly kind = 'closed' as const;

  constructor(public readonly operation: string) {
    super(`cannot ${operation}: fixture is closed`);
  }
}

// ---------------------------------------------------------------------------
// Handle branch (raised by handle implementations and transports)
// ---------------------------------------------------------------------------

export abstract class HandleError extends FixtureError {
  abstract readonly kind: HandleErrorKind;

  constructor(public readonly handle: string, message: string, cause?: unknown) {
    super(`${handle}: ${message}`, cause);
  }
}

export class HandleCmdError extends HandleError {
  readonly kind = 'handle-cmd' as const;

  constructor(handle: string, public readonly msg: string, reason: string, cause?: unknown) {
    super(handle, `cmd ${JSON.stringify(msg)} failed: ${reason}`, cause);
  }
}

export class HandleCloseError extends HandleError {
  readonly kind = 'handle-close' as const;

  constructor(handle: string, reason: string, cause?: unknown) {
    super(handle, `close failed: ${reason}`, cause);
  }
}

export class HandleResetError extends HandleError {
  readonly kind = 'handle-reset' as const;

  constructor(handle: string, reason: string, cause?: unknown) {
    super(handle, `reset failed: ${reason}`, cause);
  }
}

export class TransportUnavailableError extends HandleError {
  readonly kind = 'transport-unavailable' as const;

  constructor(handle: string, public readonly transport: string) {
    super(handle, `no ${transport} transport driver installed`);
  }
}

export type ConfigFailure =
  | EmptyConfigError
  | MissingTypeError
  | UnknownTypeError
  | ConstructionError
  | CantParseError;

export type GraphFailure =
  | NoDeviceError
  | UnknownDeviceNameError
  | CantHandleError
  | TeardownError
  | FixtureClosedError;

export type HandleFailure =
  | HandleCmdError
  | HandleCloseError
  | HandleResetError
  | TransportUnavailableError;

export function isFixtureError(error: unknown): error is FixtureError {
  return error instanceof FixtureError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
