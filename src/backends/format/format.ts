import type { TypeWitness } from '../../io/types';
import { ConfigurationMismatchError } from '../../io/errors';

/**
 * Well-known configuration entries understood by the format backend.
 * Plugins add their own entries next to these.
 */
export const FormatKeys = {
  KEY_CLASS: 'key.class',
  VALUE_CLASS: 'value.class',
  FORMAT_CLASS: 'format.class',
  /** Directory the output format writes data files into, if any */
  OUTPUT_DIR: 'output.dir',
  /** Number of write tasks when partitioning is enabled */
  PARTITIONS: 'output.partitions',
} as const;

export type InputSplit = {
  readonly id: string;
};

export type RawRecord = {
  key: unknown;
  value: unknown;
};

export interface RecordReader {
  records(): AsyncIterable<RawRecord>;
  close(): Promise<void>;
}

/**
 * Bounded input: a list of splits, each read by its own record reader.
 */
export interface InputFormat {
  getSplits(conf: FormatConfiguration<unknown, unknown>): Promise<InputSplit[]>;
  createRecordReader(split: InputSplit, conf: FormatConfiguration<unknown, unknown>): Promise<RecordReader>;
}

export type JobContext = {
  readonly jobId: string;
  readonly conf: FormatConfiguration<unknown, unknown>;
};

export type TaskContext = JobContext & {
  readonly taskId: string;
  readonly partition: number;
};

export interface RecordWriter {
  write(key: unknown, value: unknown): Promise<void>;
  close(): Promise<void>;
}

/**
 * Bounded output with a two-phase task commit.
 * Job setup, task commits and the job commit run under the write stage's synchronization gate.
 */
export interface OutputFormat {
  checkOutputSpecs?(job: JobContext): Promise<void>;
  setupJob?(job: JobContext): Promise<void>;
  getRecordWriter(task: TaskContext): Promise<RecordWriter>;
  commitTask(task: TaskContext): Promise<void>;
  abortTask(task: TaskContext): Promise<void>;
  commitJob?(job: JobContext): Promise<void>;
}

type FormatClassInfo = {
  /** Name a format provider refers to */
  readonly formatName: string;
  /** Type witness names of the elements the format produces or accepts */
  readonly keyType: string;
  readonly valueType: string;
};

export type InputFormatClass = FormatClassInfo & {
  new (): InputFormat;
  readonly direction: 'input';
};

export type OutputFormatClass = FormatClassInfo & {
  new (): OutputFormat;
  readonly direction: 'output';
};

export type FormatBinding =
  | { readonly direction: 'input'; readonly formatClass: InputFormatClass }
  | { readonly direction: 'output'; readonly formatClass: OutputFormatClass };

export const bindFormat = (formatClass: InputFormatClass | OutputFormatClass): FormatBinding =>
  formatClass.direction === 'input'
    ? { direction: 'input', formatClass }
    : { direction: 'output', formatClass };

/**
 * Key/value configuration handed to the format backend.
 * Always carries key.class, value.class and format.class next to the plugin's own entries.
 */
export class FormatConfiguration<K, V> {
  private readonly values: ReadonlyMap<string, string>;

  constructor(
    readonly format: FormatBinding,
    readonly keyType: TypeWitness<K>,
    readonly valueType: TypeWitness<V>,
    entries: Readonly<Record<string, string>>
  ) {
    this.values = new Map(
      Object.entries({
        ...entries,
        [FormatKeys.KEY_CLASS]: keyType.name,
        [FormatKeys.VALUE_CLASS]: valueType.name,
        [FormatKeys.FORMAT_CLASS]: format.formatClass.formatName,
      })
    );
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  require(key: string): string {
    const value = this.values.get(key);
    if (value === undefined || value === '') {
      throw new ConfigurationMismatchError(`Format "${this.format.formatClass.formatName}" requires entry "${key}"`);
    }
    return value;
  }

  getNumber(key: string, fallback: number): number {
    const raw = this.values.get(key);
    if (raw === undefined) return fallback;

    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationMismatchError(`Entry "${key}" is not a number: ${raw}`);
    }
    return parsed;
  }

  entries(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}
