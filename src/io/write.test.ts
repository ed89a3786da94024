import { mkdtemp, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { kv } from '../engine/types';
import { CountingGate } from '../tests/_utils/gates';
import { commitStats, ListStreamSource, MemorySink, MemorySource, outputs, resetMemoryPlugins } from '../tests/_utils/memory-plugins';
import { toAsync } from '../tests/_utils/stages';
import { ConfigurationMismatchError, MissingConfigurationError, UnsupportedOperationError } from './errors';
import { getPluginByClass } from './mapping';
import { buildWrite, write } from './write';
import { Types } from './types';

const stubBackends = () => {
  const format = { read: vi.fn(), write: vi.fn() };
  const receiver = { read: vi.fn() };
  return { backends: { format, receiver }, format, receiver };
};

const memoryWrite = (config: object) =>
  write<string, number>()
    .withPluginClass(MemorySink)
    .withPluginConfig(config)
    .withKeyType(Types.string)
    .withValueType(Types.number);

describe('Write', () => {
  beforeEach(() => {
    resetMemoryPlugins();
  });

  describe('preconditions', () => {
    const { backends, format, receiver } = stubBackends();
    const plugin = () => getPluginByClass(MemorySink);

    afterEach(() => {
      expect(format.write).not.toHaveBeenCalled();
      expect(receiver.read).not.toHaveBeenCalled();
    });

    it('requires a plugin', () => {
      const request = write<string, number>(backends)
        .withPluginConfig({ dataset: 'out' })
        .withKeyType(Types.string)
        .withValueType(Types.number)
        .withLocksDirPath('/tmp/locks');

      expect(() => request.build()).toThrow(new MissingConfigurationError('plugin'));
    });

    it('requires a plugin configuration', () => {
      const request = write<string, number>(backends)
        .withPlugin(plugin())
        .withKeyType(Types.string)
        .withValueType(Types.number)
        .withLocksDirPath('/tmp/locks');

      expect(() => request.build()).toThrow(new MissingConfigurationError('pluginConfig'));
    });

    it('requires a key type', () => {
      const request = write<string, number>(backends)
        .withPlugin(plugin())
        .withPluginConfig({ dataset: 'out' })
        .withValueType(Types.number)
        .withLocksDirPath('/tmp/locks');

      expect(() => request.build()).toThrow(new MissingConfigurationError('keyType'));
    });

    it('requires a value type', () => {
      const request = write<string, number>(backends)
        .withPlugin(plugin())
        .withPluginConfig({ dataset: 'out' })
        .withKeyType(Types.string)
        .withLocksDirPath('/tmp/locks');

      expect(() => request.build()).toThrow(new MissingConfigurationError('valueType'));
    });

    it('requires a locks directory', () => {
      const request = write<string, number>(backends)
        .withPlugin(plugin())
        .withPluginConfig({ dataset: 'out' })
        .withKeyType(Types.string)
        .withValueType(Types.number);

      expect(() => request.build()).toThrow(new MissingConfigurationError('locksDirPath'));
    });
  });

  it('builds one base request again after a failed build', async () => {
    const base = write<string, number>()
      .withPluginClass(MemorySink)
      .withKeyType(Types.string)
      .withValueType(Types.number)
      .withSynchronization(() => new CountingGate());

    expect(() =>
      base.withPluginParams({ dataset: 'out', outputDir: '/data/out' }).withLocksDirPath('/data/out/locks').build()
    ).toThrow(ConfigurationMismatchError);

    const first = base.withPluginParams({ dataset: 'out' }).withLocksDirPath('/tmp/locks').build();
    const second = base.withPluginParams({ dataset: 'out' }).withLocksDirPath('/tmp/locks').build();
    await first.write(toAsync([kv('k1', 1)]));
    await second.write(toAsync([kv('k2', 2)]));

    expect(outputs.get('out')).toEqual([
      { key: 'k1', value: 1 },
      { key: 'k2', value: 2 },
    ]);
  });

  it('rejects unbounded plugins whatever their configuration', () => {
    const { backends, format } = stubBackends();

    for (const config of [{ values: '1,2' }, {}]) {
      const request = write<string, number>(backends)
        .withPlugin(getPluginByClass(ListStreamSource))
        .withPluginConfig(config)
        .withKeyType(Types.string)
        .withValueType(Types.number)
        .withLocksDirPath('/tmp/locks');

      expect(() => buildWrite(request)).toThrow(new UnsupportedOperationError('streaming write not supported'));
    }
    expect(format.write).not.toHaveBeenCalled();
  });

  it('refuses to write into a source', () => {
    const request = write<string, number>()
      .withPluginClass(MemorySource)
      .withPluginConfig({ dataset: 'people' })
      .withKeyType(Types.string)
      .withValueType(Types.number)
      .withLocksDirPath('/tmp/locks');

    expect(() => request.build()).toThrow('is a source and cannot be written');
  });

  it.each(['/data/out', '/data/out/locks'])('rejects %s as locks directory of /data/out', (locksDir) => {
    const request = memoryWrite({ dataset: 'out', outputDir: '/data/out' }).withLocksDirPath(locksDir);

    expect(() => request.build()).toThrow(ConfigurationMismatchError);
  });

  it('accepts a sibling of the output directory', () => {
    const request = memoryWrite({ dataset: 'out', outputDir: '/data/out' }).withLocksDirPath('/data/out-locks');

    expect(() => request.build()).not.toThrow();
  });

  it('hands the gate bound to the locks directory to the format backend', () => {
    const { backends, format } = stubBackends();
    const gate = new CountingGate();
    const factory = vi.fn(() => gate);

    write<string, number>(backends)
      .withPluginClass(MemorySink)
      .withPluginConfig({ dataset: 'out' })
      .withKeyType(Types.string)
      .withValueType(Types.number)
      .withLocksDirPath('/tmp/locks')
      .withSynchronization(factory)
      .build();

    expect(factory).toHaveBeenCalledWith('/tmp/locks');
    expect(format.write.mock.calls[0][1]).toEqual({ partitioning: true, synchronization: gate });
  });

  it('writes every record and commits one task at a time', async () => {
    const gate = new CountingGate();
    const sink = memoryWrite({ dataset: 'out', partitions: '2' })
      .withLocksDirPath('/tmp/locks')
      .withSynchronization(() => gate)
      .build();

    const summary = await sink.write(toAsync([kv('k1', 1), kv('k2', 2), kv('k3', 3), kv('k4', 4)]));

    expect(summary).toEqual({ records: 4, partitions: 2 });
    expect(outputs.get('out')).toHaveLength(4);
    expect(commitStats.committed).toHaveLength(2);
    expect(commitStats.maxActive).toBe(1);
    expect(gate.maxHolders).toBe(1);
    expect(gate.holders).toBe(0);
  });

  describe('with lock files', () => {
    let locksDir = '';

    beforeEach(async () => {
      locksDir = await mkdtemp(path.join(os.tmpdir(), 'plugin-io-locks-'));
    });

    afterEach(async () => {
      await rm(locksDir, { recursive: true, force: true });
    });

    it('leaves no lock behind', async () => {
      const sink = memoryWrite({ dataset: 'out', partitions: 2 }).withLocksDirPath(locksDir).build();

      await sink.write(toAsync([kv('k1', 1), kv('k2', 2)]));

      expect(outputs.get('out')).toEqual(
        expect.arrayContaining([
          { key: 'k1', value: 1 },
          { key: 'k2', value: 2 },
        ])
      );
      expect(await readdir(locksDir)).toEqual([]);
    });
  });
});
