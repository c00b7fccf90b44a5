import { describe, it, expect } from 'vitest';
import { createLock } from './lock.util';
import { sleep } from './sleep.util';

describe('createLock', () => {
  it('runs tasks one at a time in call order', async () => {
    const lock = createLock();
    const events: string[] = [];

    const first = lock(async () => {
      events.push('first:start');
      await sleep(20);
      events.push('first:end');
      return 1;
    });
    const second = lock(async () => {
      events.push('second:start');
      events.push('second:end');
      return 2;
    });

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual([
      'first:start',
      'first:end',
      'second:start',
      'second:end',
    ]);
  });

  it('releases the lock when a task rejects', async () => {
    const lock = createLock();

    const failing = lock(async () => {
      throw new Error('boom');
    });
    const next = lock(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
