import type { Knex } from 'knex';
import { z } from 'zod';
import {
  FormatKeys,
  type FormatConfiguration,
  type JobContext,
  type OutputFormat,
  type RecordWriter,
  type TaskContext,
} from '../../backends/format/format';
import { writeWithRetry } from '../../engine/batch';
import { log } from '../../engine/logger';
import { fields } from '../../io/config';
import type { BatchConnector, BatchContext, FormatProvider } from '../../io/contracts';
import { getPluginByClass, registerBatchPlugin } from '../../io/mapping';
import { registerPlugin } from '../registry';
import { connectionEntries, connectionFromConfiguration, createKnexClient, PgConnectionSchema } from './client';
import { describeRow, upsertRows, type UpsertTarget } from './upsert';

const ENTRY_TABLE = 'pg.table';
const ENTRY_COLUMNS = 'pg.columns';
const ENTRY_CONFLICT_COLUMNS = 'pg.conflict-columns';
const ENTRY_BATCH_SIZE = 'pg.batch-size';

const PostgresSinkConfigSchema = PgConnectionSchema.extend({
  table: fields.string(),
  columns: fields.list().pipe(z.array(z.string()).min(1, 'expected at least one column')),
  conflictColumns: fields.list().default([]),
  batchSize: fields.int().default(500),
  partitions: fields.int().default(1),
});

export type PostgresSinkConfig = z.infer<typeof PostgresSinkConfigSchema>;

const splitList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');

export const targetFromConfiguration = (conf: FormatConfiguration<unknown, unknown>): UpsertTarget => ({
  table: conf.require(ENTRY_TABLE),
  columns: splitList(conf.require(ENTRY_COLUMNS)),
  conflictColumns: splitList(conf.get(ENTRY_CONFLICT_COLUMNS)),
});

const RowSchema = z.record(z.unknown());

type TaskState = {
  client: Knex;
  trx: Knex.Transaction;
};

/**
 * Upserts record values into one table. Each task writes inside its own transaction,
 * which is committed by `commitTask`. Failing batches are split and retried on savepoints.
 */
export class PostgresUpsertOutputFormat implements OutputFormat {
  static readonly direction = 'output';
  static readonly formatName = 'postgresql-upsert';
  static readonly keyType = 'string';
  static readonly valueType = 'record';

  private readonly tasks = new Map<string, TaskState>();

  async checkOutputSpecs(job: JobContext): Promise<void> {
    const target = targetFromConfiguration(job.conf);
    if (target.columns.length === 0) {
      throw new Error(`No columns configured for table ${target.table}`);
    }
  }

  async getRecordWriter(task: TaskContext): Promise<RecordWriter> {
    const target = targetFromConfiguration(task.conf);
    const batchSize = task.conf.getNumber(ENTRY_BATCH_SIZE, 500);
    const client = createKnexClient(connectionFromConfiguration(task.conf));
    const trx = await client.transaction();
    this.tasks.set(task.taskId, { client, trx });

    let buffer: Record<string, unknown>[] = [];

    const flush = async (): Promise<void> => {
      if (buffer.length === 0) return;
      const batch = buffer;
      buffer = [];

      const start = Date.now();
      const written = await writeWithRetry(
        batch,
        (rows) => trx.transaction((savepoint) => upsertRows(savepoint, target, rows)),
        (row) => `${target.table} row ${describeRow(row, target)}`
      );
      log.db(`upserted (task ${task.partition})`, written, Date.now() - start);
    };

    return {
      write: async (_key: unknown, value: unknown): Promise<void> => {
        buffer.push(RowSchema.parse(value));
        if (buffer.length >= batchSize) {
          await flush();
        }
      },
      close: flush,
    };
  }

  async commitTask(task: TaskContext): Promise<void> {
    const state = this.takeTask(task);
    if (!state) return;
    try {
      await state.trx.commit();
    } finally {
      await state.client.destroy();
    }
  }

  async abortTask(task: TaskContext): Promise<void> {
    const state = this.takeTask(task);
    if (!state) return;
    try {
      await state.trx.rollback();
    } finally {
      await state.client.destroy();
    }
  }

  private takeTask(task: TaskContext): TaskState | undefined {
    const state = this.tasks.get(task.taskId);
    this.tasks.delete(task.taskId);
    return state;
  }
}

export class PostgresFormatProvider implements FormatProvider {
  constructor(private readonly config: PostgresSinkConfig) {}

  getFormatClassName(): string {
    return PostgresUpsertOutputFormat.formatName;
  }

  getFormatConfiguration(): Record<string, string> {
    return {
      ...connectionEntries(this.config),
      [ENTRY_TABLE]: this.config.table,
      [ENTRY_COLUMNS]: this.config.columns.join(','),
      [ENTRY_CONFLICT_COLUMNS]: this.config.conflictColumns.join(','),
      [ENTRY_BATCH_SIZE]: String(this.config.batchSize),
      [FormatKeys.PARTITIONS]: String(this.config.partitions),
    };
  }
}

/**
 * Batch sink writing into a PostgreSQL table.
 */
export class PostgresSink implements BatchConnector {
  static readonly pluginName = 'postgresql';
  static readonly configSchema = PostgresSinkConfigSchema;

  constructor(private readonly config: PostgresSinkConfig) {}

  prepareRun(context: BatchContext): void {
    context.setOutput(new PostgresFormatProvider(this.config));
  }
}

registerBatchPlugin(PostgresSink, PostgresUpsertOutputFormat, PostgresFormatProvider);
registerPlugin(PostgresSink.pluginName, () => getPluginByClass(PostgresSink));
