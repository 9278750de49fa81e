import { DEFAULT_BAUDRATE, SerialConnection, SshConnection } from '../../src/handles/connections';
import { Transport, TransportFactory, unavailableTransports } from '../../src/transports/Transport';
import {
  HandleCloseError,
  HandleCmdError,
  HandleResetError,
  TransportUnavailableError
} from '../../src/utils/errors';
import { captureError, createRecordingLogger, fakeTransports } from '../helpers/fakes';

const logger = createRecordingLogger();

function stickyTransports(): TransportFactory {
  return (): Transport => ({
    exchange: () => 'ok',
    close: () => {
      throw new Error('line busy');
    }
  });
}

describe('SerialConnection', () => {
  it('reads its attributes and defaults the baud rate', () => {
    const conn = SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyUSB0' }, fakeTransports(), logger);

    expect(conn.name).toBe('conn1');
    expect(conn.port).toBe('/dev/ttyUSB0');
    expect(conn.baudrate).toBe(DEFAULT_BAUDRATE);
    expect(conn.credentials).toEqual({});
  });

  it('accepts a numeric string baud rate and login credentials', () => {
    const conn = SerialConnection.fromAttributes(
      { name: 'conn1', port: '/dev/ttyS1', baudrate: '9600', user: 'root', password: 'test-secret', prompt: '# ' },
      fakeTransports(),
      logger
    );

    expect(conn.baudrate).toBe(9600);
    expect(conn.credentials).toEqual({ user: 'root', password: 'test-secret', prompt: '# ' });
  });

  it('requires a port', () => {
    expect(() => SerialConnection.fromAttributes({ name: 'conn1' }, fakeTransports(), logger))
      .toThrow(new TypeError("missing required attribute 'port'"));
  });

  it('rejects attributes it does not know', () => {
    expect(() =>
      SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyS1', parity: 'even' }, fakeTransports(), logger)
    ).toThrow(new TypeError('unexpected attribute(s): parity'));
  });

  it('rejects a baud rate that is not a number', () => {
    expect(() =>
      SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyS1', baudrate: 'fast' }, fakeTransports(), logger)
    ).toThrow(new TypeError("attribute 'baudrate' must be a number, got string \"fast\""));
  });

  it('opens the transport on the first command and reuses it', () => {
    const transports = fakeTransports();
    const conn = SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyUSB0' }, transports, logger);

    expect(conn.isOpen).toBe(false);
    expect(conn.cmd('uptime')).toBe('conn1> uptime');
    expect(conn.cmd('date', 'UTC', 5, 2)).toBe('conn1> date');

    expect(transports.opened).toHaveLength(1);
    expect(transports.opened[0].options).toEqual({ kind: 'serial', port: '/dev/ttyUSB0', baudrate: 115200 });
    expect(transports.opened[0].requests).toEqual([
      { msg: 'uptime', timeout: 30 },
      { msg: 'date', expect: 'UTC', timeout: 5, loginTimeout: 2 }
    ]);
  });

  it('closes the session and opens a fresh one on the next command', () => {
    const transports = fakeTransports();
    const conn = SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyUSB0' }, transports, logger);
    conn.cmd('uptime');

    conn.closeAll();

    expect(conn.isOpen).toBe(false);
    expect(transports.opened[0].closed).toBe(true);
    conn.cmd('uptime');
    expect(transports.opened).toHaveLength(2);
  });

  it('treats closing a session that was never opened as a no-op', () => {
    const transports = fakeTransports();
    const conn = SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyUSB0' }, transports, logger);

    expect(() => conn.closeAll()).not.toThrow();
    expect(transports.opened).toEqual([]);
  });

  it('reports a missing driver as TransportUnavailableError', () => {
    const conn = SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyUSB0' }, unavailableTransports, logger);

    const error = captureError(() => conn.cmd('uptime'), TransportUnavailableError);
    expect(error.message).toBe('conn1: no serial transport driver installed');
  });

  it('wraps a failure to open the transport as HandleCmdError', () => {
    const refused: TransportFactory = () => {
      throw new Error('ECONNREFUSED');
    };
    const conn = SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyUSB0' }, refused, logger);

    const error = captureError(() => conn.cmd('uptime'), HandleCmdError);
    expect(error.message).toBe('conn1: cmd "uptime" failed: cannot open transport: ECONNREFUSED');
    expect(conn.isOpen).toBe(false);
  });

  it('wraps an exchange failure as HandleCmdError with the cause attached', () => {
    const timeout = new Error('timed out waiting for prompt');
    const conn = SerialConnection.fromAttributes(
      { name: 'conn1', port: '/dev/ttyUSB0' },
      fakeTransports(() => {
        throw timeout;
      }),
      logger
    );

    const error = captureError(() => conn.cmd('reboot'), HandleCmdError);
    expect(error.message).toBe('conn1: cmd "reboot" failed: timed out waiting for prompt');
    expect(error.cause).toBe(timeout);
  });

  it('wraps a close failure as HandleCloseError and forgets the session anyway', () => {
    const conn = SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyUSB0' }, stickyTransports(), logger);
    conn.cmd('uptime');

    const error = captureError(() => conn.closeAll(), HandleCloseError);

    expect(error.message).toBe('conn1: close failed: line busy');
    expect(conn.isOpen).toBe(false);
  });

  it('reports a reset that could not close the session as HandleResetError', () => {
    const conn = SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyUSB0' }, stickyTransports(), logger);
    conn.cmd('uptime');

    const error = captureError(() => conn.resetConfig(), HandleResetError);

    expect(error.message).toBe('conn1: reset failed: conn1: close failed: line busy');
    expect(error.cause).toBeInstanceOf(HandleCloseError);
  });

  it('names itself by class and section', () => {
    const conn = SerialConnection.fromAttributes({ name: 'conn1', port: '/dev/ttyUSB0' }, fakeTransports(), logger);

    expect(String(conn)).toBe('SerialConnection(conn1)');
  });
});

describe('SshConnection', () => {
  it('defaults the port and opens an ssh transport', () => {
    const transports = fakeTransports();
    const conn = SshConnection.fromAttributes({ name: 'mgmt', host: 'dut.local', user: 'admin' }, transports, logger);

    expect(conn.cmd('hostname')).toBe('mgmt> hostname');
    expect(transports.opened[0].options).toEqual({ kind: 'ssh', host: 'dut.local', port: 22 });
    expect(conn.credentials).toEqual({ user: 'admin' });
  });

  it('requires a host', () => {
    expect(() => SshConnection.fromAttributes({ name: 'mgmt', port: 2222 }, fakeTransports(), logger))
      .toThrow(new TypeError("missing required attribute 'host'"));
  });

  it('reports a missing driver by transport kind', () => {
    const conn = SshConnection.fromAttributes({ name: 'mgmt', host: 'dut.local' }, unavailableTransports, logger);

    expect(() => conn.cmd('hostname')).toThrowFixtureError('transport-unavailable');
  });
});
