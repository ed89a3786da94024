/**
 * Key/value element flowing between plugin stages.
 */
export type KV<K, V> = {
  readonly key: K;
  readonly value: V;
};

export const kv = <K, V>(key: K, value: V): KV<K, V> => ({ key, value });

/**
 * A stage that produces elements.
 * Building one has no side effects; data only moves once `read` is iterated.
 */
export type SourceStage<T> = {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  read(signal?: AbortSignal): AsyncIterable<T>;
};

export type WriteSummary = {
  records: number;
  partitions: number;
};

/**
 * A stage that consumes elements and produces nothing but a summary.
 */
export type SinkStage<T> = {
  readonly name: string;

  write(records: AsyncIterable<T>): Promise<WriteSummary>;
};

/**
 * Metrics hook for monitoring a pipeline run.
 */
export type MetricsHook = {
  /** Called when the run starts */
  onStart?: (params: { pipelineName: string; source: string; sink: string }) => void;

  /** Called every `progressEvery` records */
  onProgress?: (params: { records: number; elapsedMs: number }) => void;

  /** Called when the run completes (success or failure) */
  onComplete?: (params: {
    pipelineName: string;
    records: number;
    written: number;
    partitions: number;
    completed: boolean;
    elapsedMs: number;
  }) => void;
};

export type RunnerConfig<T> = {
  name: string;
  source: SourceStage<T>;
  sink: SinkStage<T>;
  /** Emit onProgress every N records (default: 1000) */
  progressEvery?: number;
  metrics?: MetricsHook;
  signal?: AbortSignal;
};

export type RunResult = {
  records: number;
  written: number;
  partitions: number;
  completed: boolean;
  elapsedMs: number;
};
