import Knex from 'knex';
import { getOffsetFnForPluginClass } from '../../io/mapping';
import { Types } from '../../io/types';
import { createPlugin } from '../registry';
import { buildPollQuery, offsetOf, PostgresStreamingSource } from './index';

const config = {
  host: 'localhost',
  port: 5432,
  user: 'app',
  password: 'test-secret',
  database: 'app',
  ssl: false,
  table: 'events',
  offsetColumn: 'seq',
  pollIntervalMs: 1000,
  batchSize: 100,
};

describe('buildPollQuery', () => {
  it('selects the next rows by offset', () => {
    const query = buildPollQuery(Knex({ client: 'pg' }), config, 10).toSQL();

    expect(query.sql).toContain('from "events" where "seq" >= ? order by "seq" asc limit ?');
    expect(query.bindings).toEqual([10, 100]);
  });
});

describe('offsetOf', () => {
  it('reads numeric and numeric string columns', () => {
    expect(offsetOf({ seq: 7 }, 'seq')).toBe(7);
    expect(offsetOf({ seq: '42' }, 'seq')).toBe(42);
  });

  it('rejects missing or non-numeric offsets', () => {
    expect(() => offsetOf({ seq: 'abc' }, 'seq')).toThrow(TypeError);
    expect(() => offsetOf({}, 'seq')).toThrow(TypeError);
  });

  it('rejects bigint offsets beyond the safe integer range', () => {
    expect(offsetOf({ seq: '9007199254740991' }, 'seq')).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => offsetOf({ seq: '9007199254740993' }, 'seq')).toThrow(
      'Column "seq" holds an offset beyond 9007199254740991: 9007199254740993'
    );
  });
});

describe('PostgresStreamingSource', () => {
  it('is registered as an unbounded plugin', () => {
    expect(createPlugin('postgresql-stream').classification).toBe('unbounded');
  });

  it('reads offsets from the configured column', () => {
    const offset = getOffsetFnForPluginClass(PostgresStreamingSource, { ...config, offsetColumn: 'id' }, Types.record);

    expect(offset({ id: '12', seq: 3 })).toBe(12);
  });
});
