import { InMemorySynchronization, type SynchronizationGate } from '../../backends/format/synchronization';

/**
 * In-memory gate that records how many callers hold a key at once.
 */
export class CountingGate implements SynchronizationGate {
  private readonly inner = new InMemorySynchronization();
  holders = 0;
  maxHolders = 0;
  acquisitions: string[] = [];

  async acquire(key: string): Promise<void> {
    await this.inner.acquire(key);
    this.holders++;
    this.maxHolders = Math.max(this.maxHolders, this.holders);
    this.acquisitions.push(key);
  }

  async release(key: string): Promise<void> {
    this.holders--;
    await this.inner.release(key);
  }
}
