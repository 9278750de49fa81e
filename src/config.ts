import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export interface FixtureSettings {
  /** File name looked for during auto-search. */
  fixtureFilename: string;
  /** Environment variable naming an extra, last-applied debug source. */
  debugSourceVariable: string;
  autoSearch: boolean;
  /** Teardown also forgets merged configuration when set. */
  clearConfigOnTeardown: boolean;
  /** Seconds, forwarded to handles when a caller gives no timeout. */
  defaultTimeout: number;
}

export const DEFAULT_SETTINGS: Readonly<FixtureSettings> = {
  fixtureFilename: 'fixture.json',
  debugSourceVariable: 'FIXTURE_DEBUG_SOURCE',
  autoSearch: true,
  clearConfigOnTeardown: false,
  defaultTimeout: 30
};

type Env = Record<string, string | undefined>;

function parseBoolean(key: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`Invalid boolean for environment variable ${key}: ${value}`);
  }
}

function parsePositiveNumber(key: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid positive number for environment variable ${key}: ${value}`);
  }
  return parsed;
}

// Build the settings object
export function loadSettings(env: Env = process.env): FixtureSettings {
  return {
    fixtureFilename: env.FIXTURE_FILENAME || DEFAULT_SETTINGS.fixtureFilename,
    debugSourceVariable: env.FIXTURE_DEBUG_SOURCE_VAR || DEFAULT_SETTINGS.debugSourceVariable,
    autoSearch: parseBoolean('FIXTURE_AUTO_SEARCH', env.FIXTURE_AUTO_SEARCH, DEFAULT_SETTINGS.autoSearch),
    clearConfigOnTeardown: parseBoolean(
      'FIXTURE_CLEAR_CONFIG_ON_TEARDOWN',
      env.FIXTURE_CLEAR_CONFIG_ON_TEARDOWN,
      DEFAULT_SETTINGS.clearConfigOnTeardown
    ),
    defaultTimeout: parsePositiveNumber(
      'FIXTURE_DEFAULT_TIMEOUT',
      env.FIXTURE_DEFAULT_TIMEOUT,
      DEFAULT_SETTINGS.defaultTimeout
    )
  };
}
