import { v4 as uuidv4 } from 'uuid';
import { kv, type KV, type SinkStage, type SourceStage, type WriteSummary } from '../../engine/types';
import { log, formatError } from '../../engine/logger';
import { ConfigurationMismatchError } from '../../io/errors';
import {
  FormatKeys,
  type FormatConfiguration,
  type JobContext,
  type OutputFormat,
  type TaskContext,
} from './format';
import { withGate, type SynchronizationGate } from './synchronization';

export type FormatWriteOptions = {
  /** Spread records over `output.partitions` tasks by key hash; one task otherwise */
  partitioning: boolean;
  synchronization: SynchronizationGate;
};

export interface FormatBackend {
  read<K, V>(conf: FormatConfiguration<K, V>): SourceStage<KV<K, V>>;
  write<K, V>(conf: FormatConfiguration<K, V>, options: FormatWriteOptions): SinkStage<KV<K, V>>;
}

// djb2 over the JSON form of the key, so equal keys land in the same task
export const partitionFor = (key: unknown, partitions: number): number => {
  const text = JSON.stringify(key) ?? 'undefined';
  let hash = 5381;
  for (let i = 0; i < text.length; i++) {
    hash = ((hash << 5) + hash + text.charCodeAt(i)) | 0;
  }
  return Math.abs(hash) % partitions;
};

const readFormat = <K, V>(conf: FormatConfiguration<K, V>): SourceStage<KV<K, V>> => {
  const binding = conf.format;
  if (binding.direction !== 'input') {
    throw new ConfigurationMismatchError(`Format "${binding.formatClass.formatName}" is an output format and cannot be read`);
  }
  const { formatClass } = binding;

  return {
    name: `format-read:${formatClass.formatName}`,

    async *read(signal?: AbortSignal): AsyncGenerator<KV<K, V>> {
      const format = new formatClass();
      const splits = await format.getSplits(conf);
      log.stage(formatClass.formatName, `reading ${splits.length} splits`);

      for (const split of splits) {
        if (signal?.aborted) return;

        const reader = await format.createRecordReader(split, conf);
        try {
          for await (const record of reader.records()) {
            if (signal?.aborted) return;
            yield kv(conf.keyType.schema.parse(record.key), conf.valueType.schema.parse(record.value));
          }
        } finally {
          await reader.close();
        }
      }
    },
  };
};

const runTask = async <K, V>(
  format: OutputFormat,
  task: TaskContext,
  records: KV<K, V>[],
  gate: SynchronizationGate,
  lockKey: string
): Promise<void> => {
  try {
    const writer = await format.getRecordWriter(task);
    try {
      for (const record of records) {
        await writer.write(record.key, record.value);
      }
    } finally {
      await writer.close();
    }

    await withGate(gate, lockKey, () => format.commitTask(task));
  } catch (err) {
    try {
      await format.abortTask(task);
    } catch (abortErr) {
      log.warn(`Failed to abort task ${task.taskId}: ${formatError(abortErr)}`);
    }
    throw err;
  }
};

const writeFormat = <K, V>(conf: FormatConfiguration<K, V>, options: FormatWriteOptions): SinkStage<KV<K, V>> => {
  const binding = conf.format;
  if (binding.direction !== 'output') {
    throw new ConfigurationMismatchError(`Format "${binding.formatClass.formatName}" is an input format and cannot be written`);
  }
  const { formatClass } = binding;

  const partitions = options.partitioning ? conf.getNumber(FormatKeys.PARTITIONS, 1) : 1;
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new ConfigurationMismatchError(`Entry "${FormatKeys.PARTITIONS}" must be a positive integer, got ${partitions}`);
  }
  const gate = options.synchronization;

  return {
    name: `format-write:${formatClass.formatName}`,

    async write(records: AsyncIterable<KV<K, V>>): Promise<WriteSummary> {
      const format = new formatClass();
      const job: JobContext = { jobId: uuidv4(), conf };
      const lockKey = `job-${job.jobId}`;

      await withGate(gate, lockKey, async () => {
        await format.checkOutputSpecs?.(job);
        await format.setupJob?.(job);
      });

      const buckets: KV<K, V>[][] = Array.from({ length: partitions }, () => []);
      let total = 0;
      for await (const record of records) {
        buckets[partitionFor(record.key, partitions)].push(record);
        total++;
      }

      const tasks = buckets
        .map((bucket, partition) => ({ bucket, partition }))
        .filter(({ bucket }) => bucket.length > 0);
      log.stage(formatClass.formatName, `writing ${total} records in ${tasks.length} tasks`);

      const outcomes = await Promise.allSettled(
        tasks.map(({ bucket, partition }) =>
          runTask(format, { ...job, taskId: `${job.jobId}-${partition}`, partition }, bucket, gate, lockKey)
        )
      );
      const failed = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
      if (failed) {
        throw failed.reason;
      }

      await withGate(gate, lockKey, async () => {
        await format.commitJob?.(job);
      });

      return { records: total, partitions: tasks.length };
    },
  };
};

export const formatIO: FormatBackend = {
  read: readFormat,
  write: writeFormat,
};
