import type { SourceStage } from './types';

/**
 * Wrap a source stage, transforming each element. Stays lazy like the stage it wraps.
 */
export const mapStage = <T, R>(stage: SourceStage<T>, name: string, fn: (value: T) => R): SourceStage<R> => ({
  name,

  async *read(signal?: AbortSignal): AsyncGenerator<R> {
    for await (const value of stage.read(signal)) {
      yield fn(value);
    }
  },
});
