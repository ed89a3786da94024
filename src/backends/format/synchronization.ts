import { mkdir, open, rm } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Mutual exclusion scoped to a resource key.
 * `acquire` waits until the key is free; every acquire must be paired with a release.
 */
export interface SynchronizationGate {
  acquire(key: string): Promise<void>;
  release(key: string): Promise<void>;
}

export type SynchronizationFactory = (locksDirPath: string) => SynchronizationGate;

/**
 * Run `fn` while holding `key`. The key is released whether `fn` resolves or throws.
 */
export const withGate = async <T>(gate: SynchronizationGate, key: string, fn: () => Promise<T>): Promise<T> => {
  await gate.acquire(key);
  try {
    return await fn();
  } finally {
    await gate.release(key);
  }
};

/**
 * In-process gate. Waiters are handed the key in FIFO order.
 */
export class InMemorySynchronization implements SynchronizationGate {
  private readonly held = new Set<string>();
  private readonly waiters = new Map<string, Array<() => void>>();

  acquire(key: string): Promise<void> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const queue = this.waiters.get(key) ?? [];
      queue.push(resolve);
      this.waiters.set(key, queue);
    });
  }

  async release(key: string): Promise<void> {
    const queue = this.waiters.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.waiters.delete(key);
    }

    // Hand the key straight to the next waiter so nobody can slip in between
    if (next) {
      next();
      return;
    }
    this.held.delete(key);
  }
}

export type DirectorySynchronizationOptions = {
  /** Delay between attempts while the lock file exists (default: 50ms) */
  pollIntervalMs?: number;
};

const isErrnoException = (err: unknown): err is NodeJS.ErrnoException =>
  err instanceof Error && 'code' in err;

const lockFileName = (key: string): string => `${key.replace(/[^A-Za-z0-9._-]/g, '_')}.lock`;

/**
 * Lock files in a shared directory, one per key.
 * Works across processes that see the same directory. The directory must not be a data output directory.
 */
export class DirectorySynchronization implements SynchronizationGate {
  private readonly pollIntervalMs: number;

  constructor(
    readonly locksDir: string,
    options: DirectorySynchronizationOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 50;
  }

  async acquire(key: string): Promise<void> {
    await mkdir(this.locksDir, { recursive: true });
    const lockPath = this.lockPath(key);

    for (;;) {
      try {
        const handle = await open(lockPath, 'wx');
        try {
          try {
            await handle.writeFile(String(process.pid));
          } finally {
            await handle.close();
          }
        } catch (err) {
          await rm(lockPath, { force: true });
          throw err;
        }
        return;
      } catch (err) {
        if (!isErrnoException(err) || err.code !== 'EEXIST') {
          throw err;
        }
      }
      await sleep(this.pollIntervalMs);
    }
  }

  async release(key: string): Promise<void> {
    await rm(this.lockPath(key), { force: true });
  }

  lockPath(key: string): string {
    return path.join(this.locksDir, lockFileName(key));
  }
}

export const directorySynchronization: SynchronizationFactory = (locksDirPath) =>
  new DirectorySynchronization(locksDirPath);
