import { afterEach, describe, expect, it, vi } from 'vitest';
import { BLEConnectionError, BLETimeoutError } from '../exceptions';
import { NotificationQueue } from './notification-queue';

describe('NotificationQueue', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('buffers notifications that arrive before a consumer', async () => {
    const queue = new NotificationQueue();
    queue.enqueue(Uint8Array.of(1));
    queue.enqueue(Uint8Array.of(2));

    expect(queue.size).toBe(2);
    await expect(queue.dequeue()).resolves.toEqual(Uint8Array.of(1));
    await expect(queue.dequeue()).resolves.toEqual(Uint8Array.of(2));
    expect(queue.size).toBe(0);
  });

  it('hands notifications to waiting consumers in order', async () => {
    const queue = new NotificationQueue();
    const first = queue.dequeue();
    const second = queue.dequeue();
    expect(queue.pendingCount).toBe(2);

    queue.enqueue(Uint8Array.of(1));
    queue.enqueue(Uint8Array.of(2));

    await expect(first).resolves.toEqual(Uint8Array.of(1));
    await expect(second).resolves.toEqual(Uint8Array.of(2));
    expect(queue.pendingCount).toBe(0);
  });

  it('times out a waiting consumer', async () => {
    vi.useFakeTimers();
    const queue = new NotificationQueue();

    const assertion = expect(queue.dequeue(100)).rejects.toThrow(BLETimeoutError);
    vi.advanceTimersByTime(100);
    await assertion;

    // A late notification is buffered, not lost
    queue.enqueue(Uint8Array.of(9));
    expect(queue.size).toBe(1);
  });

  it('rejects waiting consumers on clear', async () => {
    const queue = new NotificationQueue();
    const pending = queue.dequeue();
    queue.clear('Badge disconnected');

    await expect(pending).rejects.toThrow(BLEConnectionError);
    await expect(pending).rejects.toThrow('Badge disconnected');
    expect(queue.pendingCount).toBe(0);
  });

  it('drops buffered notifications on clear', () => {
    const queue = new NotificationQueue();
    queue.enqueue(Uint8Array.of(1));
    queue.clear();
    expect(queue.size).toBe(0);
  });

  it('streams notifications as they arrive', async () => {
    const queue = new NotificationQueue();
    const stream = queue.stream();

    queue.enqueue(Uint8Array.of(7));
    await expect(stream.next()).resolves.toEqual({ done: false, value: Uint8Array.of(7) });
  });
});
