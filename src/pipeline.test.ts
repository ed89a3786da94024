import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { runPipeline } from './engine/runner';
import { ConfigMappingError, MissingConfigurationError } from './io/errors';
import { getPluginByClass } from './io/mapping';
import { Types } from './io/types';
import { buildPipeline, parseParams, typeWitness } from './pipeline';
import { registerPlugin } from './plugins/registry';
import {
  datasets,
  ListStreamSource,
  MemorySink,
  MemorySource,
  outputs,
  resetMemoryPlugins,
} from './tests/_utils/memory-plugins';

registerPlugin('memory-source', () => getPluginByClass(MemorySource));
registerPlugin('memory-sink', () => getPluginByClass(MemorySink));
registerPlugin('list-stream', () => getPluginByClass(ListStreamSource));

describe('parseParams', () => {
  it('splits on the first equals sign', () => {
    expect(parseParams(['dataset=people', 'filter=a=b', 'dataset=others'])).toEqual({
      dataset: 'others',
      filter: 'a=b',
    });
  });

  it('rejects entries without a key', () => {
    expect(() => parseParams(['=value'])).toThrow(ConfigMappingError);
    expect(() => parseParams(['flag'])).toThrow('Invalid plugin parameter "flag": expected key=value');
  });
});

describe('typeWitness', () => {
  it('looks up builtin witnesses', () => {
    expect(typeWitness('record', 'valueType')).toBe(Types.record);
  });

  it('rejects unknown names', () => {
    expect(() => typeWitness('toString', 'keyType')).toThrow(ConfigMappingError);
  });
});

describe('buildPipeline', () => {
  let locksDir = '';

  beforeEach(async () => {
    resetMemoryPlugins();
    vi.spyOn(console, 'info').mockImplementation(() => {});
    locksDir = await mkdtemp(path.join(os.tmpdir(), 'plugin-io-pipeline-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(locksDir, { recursive: true, force: true });
  });

  it('requires a locks directory for the sink', () => {
    expect(() =>
      buildPipeline({
        source: 'memory-source',
        sink: 'memory-sink',
        sourceParams: { dataset: 'people' },
        sinkParams: { dataset: 'out' },
        keyType: 'string',
        valueType: 'number',
      })
    ).toThrow(new MissingConfigurationError('locksDirPath'));
  });

  it('copies a bounded dataset', async () => {
    datasets.set('people', [
      { key: 'k1', value: 1 },
      { key: 'k2', value: 2 },
      { key: 'k3', value: 3 },
    ]);

    const config = buildPipeline({
      source: 'memory-source',
      sink: 'memory-sink',
      sourceParams: parseParams(['dataset=people']),
      sinkParams: parseParams(['dataset=out', 'partitions=2']),
      locksDir,
      keyType: 'string',
      valueType: 'number',
    });
    const result = await runPipeline(config);

    expect(config.name).toBe('memory-source-to-memory-sink');
    expect(result).toMatchObject({ records: 3, written: 3, partitions: 2, completed: true });
    expect(outputs.get('out')).toHaveLength(3);
  });

  it('rejects key types the format does not use', () => {
    expect(() =>
      buildPipeline({
        source: 'memory-source',
        sink: 'memory-sink',
        sourceParams: { dataset: 'people' },
        sinkParams: { dataset: 'out' },
        locksDir,
        keyType: 'number',
        valueType: 'number',
      })
    ).toThrow('works with <string, number> but <number, number> was declared');
  });

  it('reads an unbounded source from its start offset', async () => {
    const config = buildPipeline({
      source: 'list-stream',
      sink: 'memory-sink',
      sourceParams: { values: '1,2,3' },
      sinkParams: { dataset: 'out' },
      locksDir,
      keyType: 'string',
      valueType: 'number',
      startOffset: 2,
    });

    const result = await runPipeline(config);

    expect(result).toMatchObject({ records: 2, written: 2, completed: true });
    expect(outputs.get('out')).toEqual([
      { key: null, value: 2 },
      { key: null, value: 3 },
    ]);
  });
});
