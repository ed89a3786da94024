import { mkdtemp, open, readFile, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DirectorySynchronization, InMemorySynchronization, withGate } from './synchronization';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, open: vi.fn(actual.open) };
});

describe('withGate', () => {
  it('releases the key when the callback throws', async () => {
    const gate = new InMemorySynchronization();

    await expect(withGate(gate, 'job', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    // would hang if the key were still held
    await expect(withGate(gate, 'job', async () => 'ok')).resolves.toBe('ok');
  });
});

describe('InMemorySynchronization', () => {
  it('hands the key to waiters in arrival order', async () => {
    const gate = new InMemorySynchronization();
    const order: string[] = [];

    await gate.acquire('job');
    const second = gate.acquire('job').then(() => order.push('second'));
    const third = gate.acquire('job').then(() => order.push('third'));

    await gate.release('job');
    await second;
    expect(order).toEqual(['second']);

    await gate.release('job');
    await third;
    expect(order).toEqual(['second', 'third']);
  });

  it('keeps keys independent', async () => {
    const gate = new InMemorySynchronization();

    await gate.acquire('a');
    await expect(gate.acquire('b')).resolves.toBeUndefined();
  });
});

describe('DirectorySynchronization', () => {
  let locksDir = '';

  beforeEach(async () => {
    locksDir = await mkdtemp(path.join(os.tmpdir(), 'plugin-io-sync-'));
  });

  afterEach(async () => {
    await rm(locksDir, { recursive: true, force: true });
  });

  it('names lock files after the sanitized key', () => {
    const gate = new DirectorySynchronization('/locks');

    expect(gate.lockPath('job/1 a')).toBe(path.join('/locks', 'job_1_a.lock'));
  });

  it('holds a lock file while the key is acquired', async () => {
    const gate = new DirectorySynchronization(path.join(locksDir, 'nested'));

    await gate.acquire('job-1');
    expect(await readFile(gate.lockPath('job-1'), 'utf8')).toBe(String(process.pid));

    await gate.release('job-1');
    expect(await readdir(path.join(locksDir, 'nested'))).toEqual([]);
  });

  it('removes the lock file when writing the owner fails', async () => {
    const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises');
    vi.mocked(open).mockImplementationOnce(async (file, flags, mode) => {
      const handle = await actual.open(file, flags, mode);
      vi.spyOn(handle, 'writeFile').mockRejectedValue(new Error('no space left on device'));
      return handle;
    });
    const gate = new DirectorySynchronization(locksDir);

    await expect(gate.acquire('job-1')).rejects.toThrow('no space left on device');
    expect(await readdir(locksDir)).toEqual([]);

    await gate.acquire('job-1');
    await gate.release('job-1');
  });

  it('waits for the lock file to disappear', async () => {
    const first = new DirectorySynchronization(locksDir, { pollIntervalMs: 5 });
    const second = new DirectorySynchronization(locksDir, { pollIntervalMs: 5 });
    let acquired = false;

    await first.acquire('job-1');
    const waiting = second.acquire('job-1').then(() => {
      acquired = true;
    });

    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(acquired).toBe(false);

    await first.release('job-1');
    await waiting;
    expect(acquired).toBe(true);

    await second.release('job-1');
  });
});
