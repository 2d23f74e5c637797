/**
 * Notification queue for BLE responses.
 *
 * BLE stacks deliver notifications as events. This queue buffers them and
 * hands them out through promises, optionally with a timeout.
 */

import { BLEConnectionError, BLETimeoutError } from '../exceptions';

interface PendingResolver {
  resolve: (data: Uint8Array) => void;
  reject: (error: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
}

/**
 * Queue for managing BLE notification frames.
 *
 * - Buffers notifications that arrive before being requested
 * - Queues requests that wait for future notifications
 * - Rejects every waiter when the link goes away
 */
export class NotificationQueue {
  private queue: Uint8Array[] = [];
  private pendingResolvers: PendingResolver[] = [];

  /**
   * Add a notification to the queue.
   *
   * If consumers are waiting, the oldest one receives it immediately.
   */
  enqueue(data: Uint8Array): void {
    const pending = this.pendingResolvers.shift();
    if (pending) {
      clearTimeout(pending.timeoutId);
      pending.resolve(data);
    } else {
      this.queue.push(data);
    }
  }

  /**
   * Get the next notification from the queue.
   *
   * @param timeoutMs - Maximum time to wait; waits indefinitely when omitted
   * @throws {BLETimeoutError} If the timeout expires first
   */
  async dequeue(timeoutMs?: number): Promise<Uint8Array> {
    const buffered = this.queue.shift();
    if (buffered) {
      return buffered;
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      const pending: PendingResolver = { resolve, reject };

      if (timeoutMs !== undefined) {
        pending.timeoutId = setTimeout(() => {
          const index = this.pendingResolvers.indexOf(pending);
          if (index !== -1) {
            this.pendingResolvers.splice(index, 1);
            reject(new BLETimeoutError(`No notification received within ${timeoutMs}ms`));
          }
        }, timeoutMs);
      }

      this.pendingResolvers.push(pending);
    });
  }

  /**
   * Async iteration over notifications as they arrive.
   *
   * Ends with a rejection once {@link clear} is called.
   */
  async *stream(): AsyncGenerator<Uint8Array, never, undefined> {
    for (;;) {
      yield await this.dequeue();
    }
  }

  /**
   * Drop buffered notifications and reject all pending requests.
   *
   * @param reason - Reason for clearing
   */
  clear(reason: string = 'Connection closed'): void {
    this.queue = [];

    const pending = this.pendingResolvers;
    this.pendingResolvers = [];
    for (const waiter of pending) {
      clearTimeout(waiter.timeoutId);
      waiter.reject(new BLEConnectionError(reason));
    }
  }

  /**
   * Number of buffered notifications.
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Number of consumers waiting for notifications.
   */
  get pendingCount(): number {
    return this.pendingResolvers.length;
  }
}
