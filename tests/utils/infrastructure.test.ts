import winston from 'winston';
import { LogMeta, createLogger, log } from '../../src/utils/logger';
import {
  CantHandleError,
  ConfigError,
  EmptyConfigError,
  FixtureError,
  GraphError,
  HandleCmdError,
  HandleError,
  NoDeviceError,
  TeardownError,
  UnknownDeviceNameError,
  UnknownTypeError,
  describeError,
  isFixtureError,
  toError
} from '../../src/utils/errors';

interface Captured extends LogMeta {
  level: string;
  message: unknown;
}

function capturingBase(entries: Captured[]): winston.Logger {
  const capture = winston.format(info => {
    entries.push({ ...info, level: info.level, message: info.message });
    return info;
  });

  return winston.createLogger({
    level: 'debug',
    format: capture(),
    transports: [new winston.transports.Console({ silent: true })]
  });
}

describe('Infrastructure Tests', () => {
  describe('logger', () => {
    test('default logger should work', () => {
      expect(() => {
        log.info('Test message');
        log.child('test').error('Test error', { code: 1 });
      }).not.toThrow();
    });

    test('child loggers tag entries with a nested component', () => {
      const entries: Captured[] = [];
      const logger = createLogger('fixture:smoke', capturingBase(entries));

      logger.child('router').warn('Device reset failed', { device: 'dev1' });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        level: 'warn',
        message: 'Device reset failed',
        component: 'fixture:smoke:router',
        device: 'dev1'
      });
    });

    test('entries without a component carry none', () => {
      const entries: Captured[] = [];

      createLogger(undefined, capturingBase(entries)).info('Fixture graph loaded');

      expect(entries[0].message).toBe('Fixture graph loaded');
      expect(entries[0]).not.toHaveProperty('component');
    });
  });

  describe('errors', () => {
    test('each error is named after its class and tagged by kind', () => {
      const error = new EmptyConfigError();

      expect(error.name).toBe('EmptyConfigError');
      expect(error.kind).toBe('empty-config');
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toBeInstanceOf(FixtureError);
      expect(isFixtureError(error)).toBe(true);
      expect(isFixtureError(new Error('plain'))).toBe(false);
    });

    test('handle errors are prefixed with the handle name', () => {
      const error = new HandleCmdError('dev1', 'uptime', 'link down');

      expect(error).toBeInstanceOf(HandleError);
      expect(error.handle).toBe('dev1');
      expect(error.message).toBe('dev1: cmd "uptime" failed: link down');
    });

    test('graph errors describe what is missing', () => {
      expect(new NoDeviceError().message).toBe('this fixture has no device loaded');
      expect(new NoDeviceError(3, 2).message).toBe('no device at index 3; fixture holds 2 device(s)');
      expect(new UnknownDeviceNameError('dev3', ['dev1', 'dev2']).message)
        .toBe('no device named \'dev3\'; available names are: ["dev1","dev2"]');
      expect(new CantHandleError('uptime', []).message)
        .toBe('no device could handle cmd "uptime": fixture has no devices');
      expect(new NoDeviceError()).toBeInstanceOf(GraphError);
    });

    test('aggregate errors list every failed device', () => {
      const failures = [
        { device: 'dev1', error: new Error('port stuck') },
        { device: 'dev2', error: new Error('session gone') }
      ];

      expect(new TeardownError(failures).message).toBe('teardown failed for dev1 (port stuck); dev2 (session gone)');
      expect(new CantHandleError('uptime', failures).message)
        .toBe('no device could handle cmd "uptime": dev1 (port stuck); dev2 (session gone)');
    });

    test('unknown type errors list the registered tags', () => {
      expect(new UnknownTypeError('Toaster', ['Device'], 'dev1').message)
        .toBe("unknown type 'Toaster' in section 'dev1'; registered types: Device");
      expect(new UnknownTypeError('Toaster', []).message).toBe("unknown type 'Toaster'; registered types: (none)");
    });

    test('non-Error values are normalised', () => {
      expect(toError('boom')).toEqual(new Error('boom'));
      expect(describeError(42)).toBe('42');
      expect(describeError(new Error('bad'))).toBe('bad');
    });
  });
});
