import type { RunnerConfig, RunResult } from './types';
import { log, formatError } from './logger';

/**
 * Pipe a source stage into a sink stage.
 * The signal only reaches the source: an aborted run still lets the sink commit what it received.
 */
export const runPipeline = async <T>(config: RunnerConfig<T>): Promise<RunResult> => {
  const startTime = Date.now();
  const { name, source, sink, metrics, signal } = config;
  const progressEvery = config.progressEvery ?? 1000;

  log.pipeline.start({ name, source: source.name, sink: sink.name });
  metrics?.onStart?.({ pipelineName: name, source: source.name, sink: sink.name });

  let records = 0;
  let written = 0;
  let partitions = 0;
  let completed = false;

  async function* counted(): AsyncGenerator<T> {
    for await (const record of source.read(signal)) {
      records++;
      if (records % progressEvery === 0) {
        const elapsedMs = Date.now() - startTime;
        log.progress({ records, elapsedMs });
        metrics?.onProgress?.({ records, elapsedMs });
      }
      yield record;
    }
  }

  try {
    const summary = await sink.write(counted());
    written = summary.records;
    partitions = summary.partitions;
    completed = signal?.aborted !== true;

    return { records, written, partitions, completed, elapsedMs: Date.now() - startTime };
  } catch (err) {
    log.error(`Pipeline ${name} failed: ${formatError(err)}`);
    throw err;
  } finally {
    const elapsedMs = Date.now() - startTime;
    log.pipeline.summary({ records, written, partitions, completed, elapsedMs });
    metrics?.onComplete?.({ pipelineName: name, records, written, partitions, completed, elapsedMs });
  }
};
