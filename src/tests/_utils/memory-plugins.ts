import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import {
  FormatKeys,
  type FormatConfiguration,
  type InputFormat,
  type InputSplit,
  type OutputFormat,
  type RawRecord,
  type RecordReader,
  type RecordWriter,
  type TaskContext,
} from '../../backends/format/format';
import { Receiver } from '../../backends/receiver/receiver';
import { fields } from '../../io/config';
import type { BatchConnector, BatchContext, FormatProvider } from '../../io/contracts';
import { registerBatchPlugin, registerStreamingPlugin } from '../../io/mapping';

/** Input datasets by name */
export const datasets = new Map<string, RawRecord[]>();

/** Committed output by dataset name */
export const outputs = new Map<string, RawRecord[]>();

type CommitStats = {
  active: number;
  maxActive: number;
  committed: string[];
  aborted: string[];
};

/** Task commits seen by MemoryOutputFormat; `maxActive` counts overlapping commits */
export const commitStats: CommitStats = { active: 0, maxActive: 0, committed: [], aborted: [] };

export const resetMemoryPlugins = (): void => {
  datasets.clear();
  outputs.clear();
  commitStats.active = 0;
  commitStats.maxActive = 0;
  commitStats.committed = [];
  commitStats.aborted = [];
};

export class MemoryInputFormat implements InputFormat {
  static readonly direction = 'input';
  static readonly formatName = 'memory-input';
  static readonly keyType = 'string';
  static readonly valueType = 'number';

  async getSplits(conf: FormatConfiguration<unknown, unknown>): Promise<InputSplit[]> {
    const records = datasets.get(conf.require('memory.dataset')) ?? [];
    const splitSize = conf.getNumber('memory.split-size', 2);
    const splits: InputSplit[] = [];
    for (let start = 0; start < records.length; start += splitSize) {
      splits.push({ id: String(start) });
    }
    return splits;
  }

  async createRecordReader(split: InputSplit, conf: FormatConfiguration<unknown, unknown>): Promise<RecordReader> {
    const records = datasets.get(conf.require('memory.dataset')) ?? [];
    const start = Number(split.id);
    const slice = records.slice(start, start + conf.getNumber('memory.split-size', 2));

    return {
      async *records() {
        yield* slice;
      },
      close: async () => {},
    };
  }
}

export class MemoryOutputFormat implements OutputFormat {
  static readonly direction = 'output';
  static readonly formatName = 'memory-output';
  static readonly keyType = 'string';
  static readonly valueType = 'number';

  private readonly staged = new Map<string, RawRecord[]>();

  async getRecordWriter(task: TaskContext): Promise<RecordWriter> {
    const rows: RawRecord[] = [];
    this.staged.set(task.taskId, rows);
    const failKey = task.conf.get('memory.fail-key');

    return {
      write: async (key, value) => {
        if (key === failKey) {
          throw new Error(`cannot write ${String(key)}`);
        }
        rows.push({ key, value });
      },
      close: async () => {},
    };
  }

  async commitTask(task: TaskContext): Promise<void> {
    commitStats.active++;
    commitStats.maxActive = Math.max(commitStats.maxActive, commitStats.active);
    try {
      await sleep(5);
      const dataset = task.conf.require('memory.dataset');
      outputs.set(dataset, [...(outputs.get(dataset) ?? []), ...(this.staged.get(task.taskId) ?? [])]);
      commitStats.committed.push(task.taskId);
    } finally {
      commitStats.active--;
    }
  }

  async abortTask(task: TaskContext): Promise<void> {
    this.staged.delete(task.taskId);
    commitStats.aborted.push(task.taskId);
  }
}

const MemorySourceConfigSchema = z.object({
  dataset: fields.string(),
  splitSize: fields.int().default(2),
});

type MemorySourceConfig = z.infer<typeof MemorySourceConfigSchema>;

export class MemoryInputProvider implements FormatProvider {
  constructor(private readonly config: MemorySourceConfig) {}

  getFormatClassName(): string {
    return MemoryInputFormat.formatName;
  }

  getFormatConfiguration(): Record<string, string> {
    return { 'memory.dataset': this.config.dataset, 'memory.split-size': String(this.config.splitSize) };
  }
}

export class MemorySource implements BatchConnector {
  static readonly pluginName = 'memory-source';
  static readonly configSchema = MemorySourceConfigSchema;

  constructor(private readonly config: MemorySourceConfig) {}

  prepareRun(context: BatchContext): void {
    context.setInput(new MemoryInputProvider(this.config));
  }
}

const MemorySinkConfigSchema = z.object({
  dataset: fields.string(),
  partitions: fields.int().default(1),
  outputDir: fields.string().optional(),
  failKey: fields.string().optional(),
});

type MemorySinkConfig = z.infer<typeof MemorySinkConfigSchema>;

export class MemoryOutputProvider implements FormatProvider {
  constructor(private readonly config: MemorySinkConfig) {}

  getFormatClassName(): string {
    return MemoryOutputFormat.formatName;
  }

  getFormatConfiguration(): Record<string, string> {
    const entries: Record<string, string> = {
      'memory.dataset': this.config.dataset,
      [FormatKeys.PARTITIONS]: String(this.config.partitions),
    };
    if (this.config.outputDir !== undefined) {
      entries[FormatKeys.OUTPUT_DIR] = this.config.outputDir;
    }
    if (this.config.failKey !== undefined) {
      entries['memory.fail-key'] = this.config.failKey;
    }
    return entries;
  }
}

export class MemorySink implements BatchConnector {
  static readonly pluginName = 'memory-sink';
  static readonly configSchema = MemorySinkConfigSchema;

  constructor(private readonly config: MemorySinkConfig) {}

  prepareRun(context: BatchContext): void {
    context.setOutput(new MemoryOutputProvider(this.config));
  }
}

const ListStreamConfigSchema = z.object({
  values: fields.list(),
  failWith: fields.string().optional(),
});

type ListStreamConfig = z.infer<typeof ListStreamConfigSchema>;

/**
 * Stores each configured value as a number, then stops (with an error if `failWith` is set).
 */
export class ListReceiver extends Receiver {
  constructor(private readonly config: ListStreamConfig) {
    super();
  }

  async onStart(): Promise<void> {
    for (const value of this.config.values) {
      this.store(Number(value));
    }
    await this.stop(this.config.failWith === undefined ? undefined : new Error(this.config.failWith));
  }

  async onStop(): Promise<void> {}
}

export class ListStreamSource {
  static readonly pluginName = 'list-stream';
  static readonly configSchema = ListStreamConfigSchema;
}

registerBatchPlugin(MemorySource, MemoryInputFormat, MemoryInputProvider);
registerBatchPlugin(MemorySink, MemoryOutputFormat, MemoryOutputProvider);
registerStreamingPlugin(ListStreamSource, {
  receiverClass: ListReceiver,
  offsetFn: () => (value) => Number(value),
});
