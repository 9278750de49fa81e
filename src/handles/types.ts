import type { SectionValue } from '../types/section';

export type ExpectPattern = string | RegExp;

/**
 * Capability set every constructed device or connection provides.
 * All calls are synchronous; `timeout` and `loginTimeout` are seconds and
 * are only forwarded to the transport, never enforced here.
 */
export interface Handle {
  readonly name: string;
  cmd(msg: string, expect?: ExpectPattern, timeout?: number, loginTimeout?: number): string;
  closeAll(): void;
  resetConfig(): void;
}

export type AttributeValue = SectionValue | Handle | readonly Handle[];

/** What a factory receives: the section's keys after conns/bcc/bctrl resolution, plus `name`. */
export interface HandleAttributes {
  readonly name: string;
  readonly [key: string]: AttributeValue;
}

export type HandleFactory = (name: string, attributes: HandleAttributes) => Handle;

export const DEFAULT_CMD_TIMEOUT = 30;

export function isHandle(value: unknown): value is Handle {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'cmd' in value &&
    typeof value.cmd === 'function' &&
    'closeAll' in value &&
    typeof value.closeAll === 'function' &&
    'resetConfig' in value &&
    typeof value.resetConfig === 'function'
  );
}

export function isHandleList(value: unknown): value is readonly Handle[] {
  return Array.isArray(value) && value.every(isHandle);
}
