import { describe, expect, it } from 'vitest';
import { Semaphore, SemaphoreClosedError } from '../semaphore.js';

function tick(ms = 1): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('Semaphore', () => {
  it('never runs more tasks than its limit', async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;

    const tasks = Array.from({ length: 10 }, (_, i) =>
      semaphore.run(async () => {
        running += 1;
        peak = Math.max(peak, running);
        await tick(i % 3);
        running -= 1;
        return i;
      })
    );

    const results = await Promise.all(tasks);

    expect(results).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(peak).toBe(2);
    expect(semaphore.inFlight).toBe(0);
    expect(semaphore.queued).toBe(0);
  });

  it('releases the slot when a task throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.run(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(semaphore.run(async () => 'next')).resolves.toBe('next');
  });

  it('rejects queued and future waiters once closed', async () => {
    const semaphore = new Semaphore(1);
    let unblock: () => void = () => undefined;
    const blocker = semaphore.run(() => new Promise<void>(resolve => {
      unblock = resolve;
    }));
    const queued = semaphore.run(async () => 'never');
    await tick();

    semaphore.close();
    unblock();

    await expect(queued).rejects.toBeInstanceOf(SemaphoreClosedError);
    await expect(semaphore.acquire()).rejects.toBeInstanceOf(SemaphoreClosedError);
    await blocker;
  });

  it('rejects a non-positive limit', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});
