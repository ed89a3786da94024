import type { SourceStage } from '../../engine/types';
import { log } from '../../engine/logger';
import { AsyncQueue } from './queue';
import type { ReceiverBuilder } from './receiver';

export type ReceiverReadOptions<V> = {
  receiverBuilder: ReceiverBuilder<V>;
  /** Position of a value in the source; used to resume from `startOffset` */
  getOffsetFn: (value: V) => number;
  /** Values with a lower offset are dropped */
  startOffset?: number;
};

export interface ReceiverBackend {
  read<V>(options: ReceiverReadOptions<V>): SourceStage<V>;
}

/**
 * Unbounded read: the receiver is started when the stage is iterated and
 * runs until it stops itself or the signal aborts.
 */
const readReceiver = <V>(options: ReceiverReadOptions<V>): SourceStage<V> => {
  const { receiverBuilder, getOffsetFn, startOffset } = options;

  return {
    name: `receiver-read:${receiverBuilder.receiverName}`,

    async *read(signal?: AbortSignal): AsyncGenerator<V> {
      if (signal?.aborted) return;

      const receiver = receiverBuilder.build();
      const queue = new AsyncQueue<unknown>();
      receiver.attach({
        store: (value) => queue.push(value),
        stopped: (error) => (error === undefined ? queue.close() : queue.fail(error)),
      });

      const onAbort = () => queue.close();
      signal?.addEventListener('abort', onAbort, { once: true });

      let lastOffset: number | undefined;
      try {
        if (startOffset !== undefined) {
          receiver.setStartOffset?.(startOffset);
        }
        await receiver.start();
        log.stage(receiverBuilder.receiverName, 'receiver started');

        for await (const raw of queue) {
          if (signal?.aborted) return;
          const value = receiverBuilder.decode(raw);
          const offset = getOffsetFn(value);
          if (startOffset !== undefined && offset < startOffset) continue;

          lastOffset = offset;
          yield value;
        }
      } finally {
        signal?.removeEventListener('abort', onAbort);
        await receiver.stop();
        log.stage(receiverBuilder.receiverName, `receiver stopped (last offset: ${lastOffset ?? 'none'})`);
      }
    },
  };
};

export const receiverIO: ReceiverBackend = {
  read: readReceiver,
};
