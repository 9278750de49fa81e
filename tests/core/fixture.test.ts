import fs from 'fs';
import os from 'os';
import path from 'path';
import { Fixture } from '../../src/core/Fixture';
import { FixtureOptions, createFixture } from '../../src/core/container/FixtureContainer';
import { Device } from '../../src/handles/Device';
import type { SectionObject } from '../../src/types/section';
import { CantParseError } from '../../src/utils/errors';
import { RecordingLogger, captureError, createRecordingLogger, fakeTransports } from '../helpers/fakes';

const BENCH: SectionObject = {
  dev1: { type: 'Device', conns: { serial1: { type: 'SerialConnection', port: '/dev/ttyUSB1' } } },
  dev2: { type: 'Device', conns: { ssh1: { type: 'SshConnection', host: 'dut2.local' } } }
};

describe('Fixture', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = createRecordingLogger();
  });

  function fixture(options: FixtureOptions = {}): Fixture {
    return createFixture({ name: 'smoke', transports: fakeTransports(), logger, autoSearch: false, ...options });
  }

  it('builds devices from its sources and routes commands to them', () => {
    const smoke = fixture({ sources: [BENCH] });

    expect(smoke.state).toBe('loaded');
    expect(smoke.devs.map(d => d.name)).toEqual(['dev1', 'dev2']);
    expect(smoke.cmdFirst('uname -a')).toBe('serial1> uname -a');
    expect(smoke.getDev('dev2').cmd('hostname')).toBe('ssh1> hostname');
    expect(smoke.cmdAll('uptime')).toEqual([
      { device: 'dev1', ok: true, result: 'serial1> uptime' },
      { device: 'dev2', ok: true, result: 'ssh1> uptime' }
    ]);
  });

  it('starts empty without sources', () => {
    const smoke = fixture();

    expect(smoke.state).toBe('empty');
    expect(smoke.devs).toEqual([]);
    expect(() => smoke.cmdFirst('uptime')).toThrowFixtureError('no-device');
  });

  it('chains reads and lets later sources override earlier ones', () => {
    const smoke = fixture()
      .read(BENCH)
      .read({ dev2: { conns: { ssh1: { host: 'spare.local' } } }, dev3: { type: 'Device' } });

    expect(smoke.devs.map(d => d.name)).toEqual(['dev1', 'dev2', 'dev3']);
    expect(smoke.getDev(1).cmd('hostname')).toBe('ssh1> hostname');

    const dev2 = smoke.getDev('dev2');
    expect(dev2).toBeInstanceOf(Device);
    if (dev2 instanceof Device) {
      expect(dev2.conns.map(c => String(c))).toEqual(['SshConnection(ssh1)']);
    }
  });

  it('leaves the graph untouched when a source cannot be loaded', () => {
    const smoke = fixture({ sources: [BENCH] });
    const before = smoke.devs;

    const error = captureError(() => smoke.read(BENCH, '/nonexistent/bench/fixture.json'), CantParseError);

    expect(error.origin).toBe('/nonexistent/bench/fixture.json');
    expect(smoke.state).toBe('loaded');
    expect(smoke.devs).toBe(before);
  });

  it('tears down once after a scoped body', () => {
    const transports = fakeTransports();
    const smoke = fixture({ transports, sources: [BENCH] });

    const names = smoke.use((self, devs) => {
      expect(self).toBe(smoke);
      self.cmdAll('uptime');
      return devs.map(d => d.name);
    });

    expect(names).toEqual(['dev1', 'dev2']);
    expect(smoke.state).toBe('empty');
    expect(transports.opened.map(t => t.closed)).toEqual([true, true]);
  });

  it('resets every device', () => {
    const smoke = fixture({ sources: [BENCH] });

    expect(smoke.resetConfigAll()).toEqual([
      { device: 'dev1', ok: true },
      { device: 'dev2', ok: true }
    ]);
  });

  it('refuses to read after close', () => {
    const smoke = fixture({ sources: [BENCH] });

    smoke.close();

    expect(smoke.state).toBe('closed');
    expect(() => smoke.read(BENCH)).toThrowFixtureError('closed');
  });

  it('describes itself with its devices', () => {
    expect(String(fixture({ sources: [BENCH] }))).toBe('Fixture(smoke).devs:[Device(dev1), Device(dev2)]');
    expect(String(fixture())).toBe('Fixture(smoke).devs:[]');
  });

  it('keeps configuration separate between fixtures', () => {
    const first = fixture({ sources: [BENCH] });
    const second = fixture({ sources: [{ other: { type: 'Device' } }] });

    expect(first.devs.map(d => d.name)).toEqual(['dev1', 'dev2']);
    expect(second.devs.map(d => d.name)).toEqual(['other']);
    expect(second.lifecycle.configStore).not.toBe(first.lifecycle.configStore);
  });

  describe('auto-search', () => {
    const filename = 'bench-autosearch.json';
    let root: string;
    let nested: string;

    beforeEach(() => {
      root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'fixture-auto-')));
      nested = path.join(root, 'suite');
      fs.mkdirSync(nested);
      fs.writeFileSync(path.join(root, filename), JSON.stringify(BENCH));
      fs.writeFileSync(
        path.join(nested, filename),
        JSON.stringify({ dev2: { conns: { ssh1: { host: 'near.local' } } }, dev3: { type: 'Device' } })
      );
    });

    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    const settings = { fixtureFilename: filename, debugSourceVariable: 'BENCH_AUTOSEARCH_UNSET' };

    it('reads the files found above the call location, nearest last', () => {
      const smoke = fixture({ settings });

      const files = smoke.autoSearch(path.join(nested, 'boot.test.ts'));

      expect(files).toEqual([path.join(root, filename), path.join(nested, filename)]);
      expect(smoke.devs.map(d => d.name)).toEqual(['dev1', 'dev2', 'dev3']);
    });

    it('runs on creation when enabled and given a call location', () => {
      const smoke = fixture({ settings, autoSearch: true, callLocation: nested, sources: [{ dev4: { type: 'Device' } }] });

      expect(smoke.devs.map(d => d.name)).toEqual(['dev1', 'dev2', 'dev3', 'dev4']);
    });

    it('keeps discovered files when explicit sources follow and teardown clears configuration', () => {
      const smoke = fixture({
        settings: { ...settings, clearConfigOnTeardown: true },
        autoSearch: true,
        callLocation: nested,
        sources: [{ dev4: { type: 'Device' } }]
      });

      expect(smoke.devs.map(d => d.name)).toEqual(['dev1', 'dev2', 'dev3', 'dev4']);

      smoke.tearDown();
      expect(smoke.lifecycle.configStore.isEmpty).toBe(true);
    });

    it('stays empty when nothing is found', () => {
      const smoke = fixture({ settings: { ...settings, fixtureFilename: 'absent-bench.json' } });

      expect(smoke.autoSearch(nested)).toEqual([]);
      expect(smoke.state).toBe('empty');
    });
  });
});
