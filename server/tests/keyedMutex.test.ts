import { describe, expect, it } from 'vitest';
import { KeyedMutex } from '../core/keyedMutex.js';

describe('KeyedMutex', () => {
  it('runs tasks sharing a key one after another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const first = mutex.run('a', async () => {
      order.push('first:start');
      await new Promise((r) => setTimeout(r, 5));
      order.push('first:end');
    });
    const second = mutex.run('a', () => {
      order.push('second');
    });
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block unrelated keys', async () => {
    const mutex = new KeyedMutex();
    let open: () => void = () => undefined;
    const gate = new Promise<void>((r) => {
      open = r;
    });
    const slow = mutex.run('a', () => gate);
    await expect(mutex.run('b', () => 'b')).resolves.toBe('b');
    expect(mutex.isLocked('a')).toBe(true);
    open();
    await slow;
  });

  it('releases the key after a failing task', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.run('a', () => {
        throw new Error('fail');
      })
    ).rejects.toThrow('fail');
    await expect(mutex.run('a', () => 42)).resolves.toBe(42);
    expect(mutex.size).toBe(0);
  });
});
