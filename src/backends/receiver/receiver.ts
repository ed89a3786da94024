import type { TypeWitness } from '../../io/types';

export type ReceiverHost = {
  store(value: unknown): void;
  stopped(error?: unknown): void;
};

/**
 * Push-based unbounded source.
 * Subclasses start producing in `onStart`, hand values over with `store`
 * and release their resources in `onStop`.
 */
export abstract class Receiver {
  private host?: ReceiverHost;
  private stoppedFlag = false;

  abstract onStart(): Promise<void>;

  abstract onStop(): Promise<void>;

  /**
   * Called before `start` when the reading stage resumes from an offset.
   * Receivers that can seek should skip everything below it.
   */
  setStartOffset?(offset: number): void;

  attach(host: ReceiverHost): void {
    this.host = host;
  }

  async start(): Promise<void> {
    await this.onStart();
  }

  store(value: unknown): void {
    if (this.stoppedFlag) return;
    this.host?.store(value);
  }

  isStopped(): boolean {
    return this.stoppedFlag;
  }

  /**
   * Stop receiving. Passing an error makes the reading stage fail with it.
   */
  async stop(error?: unknown): Promise<void> {
    if (this.stoppedFlag) return;
    this.stoppedFlag = true;
    this.host?.stopped(error);
    await this.onStop();
  }
}

export type ReceiverClass<C> = new (config: C) => Receiver;

/**
 * Builds fresh receivers for one plugin and decodes what they store into typed values.
 */
export class ReceiverBuilder<V> {
  constructor(
    readonly receiverName: string,
    private readonly create: () => Receiver,
    readonly valueType: TypeWitness<V>
  ) {}

  build(): Receiver {
    return this.create();
  }

  decode(value: unknown): V {
    return this.valueType.schema.parse(value);
  }
}
