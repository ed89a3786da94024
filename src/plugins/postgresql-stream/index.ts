import type { Knex } from 'knex';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { Receiver } from '../../backends/receiver/receiver';
import { log, formatError } from '../../engine/logger';
import { fields } from '../../io/config';
import { getPluginByClass, registerStreamingPlugin } from '../../io/mapping';
import { createKnexClient, PgConnectionSchema } from '../postgresql/client';
import { registerPlugin } from '../registry';

const PostgresStreamConfigSchema = PgConnectionSchema.extend({
  table: fields.string(),
  offsetColumn: fields.string().default('id'),
  pollIntervalMs: fields.int().default(1000),
  batchSize: fields.int().default(500),
});

export type PostgresStreamConfig = z.infer<typeof PostgresStreamConfigSchema>;

/**
 * Rows at or after `nextOffset`, oldest first.
 */
export const buildPollQuery = (knex: Knex, config: PostgresStreamConfig, nextOffset: number): Knex.QueryBuilder =>
  knex(config.table)
    .select('*')
    .where(config.offsetColumn, '>=', nextOffset)
    .orderBy(config.offsetColumn, 'asc')
    .limit(config.batchSize);

const RowSchema = z.record(z.unknown());

/**
 * Reads the offset column of a row. Numeric strings (bigint columns) are accepted
 * up to `Number.MAX_SAFE_INTEGER`; larger offsets cannot be advanced exactly and are rejected.
 */
export const offsetOf = (value: unknown, column: string): number => {
  const row = RowSchema.parse(value);
  const raw = row[column];
  const offset = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof offset !== 'number' || !Number.isFinite(offset)) {
    throw new TypeError(`Column "${column}" does not hold a numeric offset: ${String(raw)}`);
  }
  if (Math.abs(offset) > Number.MAX_SAFE_INTEGER) {
    throw new TypeError(`Column "${column}" holds an offset beyond ${Number.MAX_SAFE_INTEGER}: ${String(raw)}`);
  }
  return offset;
};

/**
 * Tails a table by polling rows with an increasing offset column.
 */
export class PostgresPollingReceiver extends Receiver {
  private client?: Knex;
  private readonly wake = new AbortController();
  private nextOffset = 0;

  constructor(private readonly config: PostgresStreamConfig) {
    super();
  }

  setStartOffset(offset: number): void {
    this.nextOffset = offset;
  }

  async onStart(): Promise<void> {
    this.client = createKnexClient(this.config, { min: 0, max: 1 });
    const client = this.client;

    void this.poll(client).catch((err) => {
      // destroying the client on stop interrupts the pending query
      if (this.isStopped()) return;
      log.error(`Polling ${this.config.table} failed: ${formatError(err)}`);
      this.stop(err).catch((stopErr) => log.warn(`Failed to stop receiver: ${formatError(stopErr)}`));
    });
  }

  async onStop(): Promise<void> {
    this.wake.abort();
    await this.client?.destroy();
    this.client = undefined;
  }

  private async poll(client: Knex): Promise<void> {
    while (!this.isStopped()) {
      const rows: unknown[] = await buildPollQuery(client, this.config, this.nextOffset);

      for (const row of rows) {
        if (this.isStopped()) return;
        this.store(row);
        this.nextOffset = offsetOf(row, this.config.offsetColumn) + 1;
      }

      if (rows.length < this.config.batchSize) {
        try {
          await sleep(this.config.pollIntervalMs, undefined, { signal: this.wake.signal });
        } catch (err) {
          if (this.wake.signal.aborted) return;
          throw err;
        }
      }
    }
  }
}

/**
 * Streaming source over a PostgreSQL table with a monotonic offset column.
 */
export class PostgresStreamingSource {
  static readonly pluginName = 'postgresql-stream';
  static readonly configSchema = PostgresStreamConfigSchema;
}

registerStreamingPlugin(PostgresStreamingSource, {
  receiverClass: PostgresPollingReceiver,
  offsetFn: (config) => (value) => offsetOf(value, config.offsetColumn),
});
registerPlugin(PostgresStreamingSource.pluginName, () => getPluginByClass(PostgresStreamingSource));
