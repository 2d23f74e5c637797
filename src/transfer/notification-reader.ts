/**
 * Deadline-bounded reads from a transport's notification stream.
 */

import type { BadgeTransport } from '../transport/transport';

/**
 * Result of waiting for one notification.
 */
export type ReadOutcome =
  | { kind: 'frame'; frame: Uint8Array }
  | { kind: 'error'; error: unknown }
  | { kind: 'ended' }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

type StreamEnd = Extract<ReadOutcome, { kind: 'error' | 'ended' }>;

/**
 * Single consumer of a transport's notifications.
 *
 * The stream is subscribed once, on first use, and drained into a buffer.
 * Frames that arrive while nobody waits stay buffered until the next read
 * or until {@link NotificationReader.discardPending} drops them.
 */
export class NotificationReader {
  private readonly frames: Uint8Array[] = [];
  private readonly waiters = new Set<() => void>();
  private end: StreamEnd | null = null;
  private pumping: Promise<void> | null = null;

  constructor(private readonly transport: BadgeTransport) {}

  /**
   * Wait for the next notification.
   *
   * Never rejects; stream failures are reported as an `error` outcome.
   *
   * @param timeoutMs - Deadline for this wait
   * @param signal - Ends the wait early with a `cancelled` outcome
   */
  async next(timeoutMs: number, signal?: AbortSignal): Promise<ReadOutcome> {
    if (signal?.aborted) {
      return { kind: 'cancelled' };
    }
    this.start();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<ReadOutcome>((resolve) => {
      timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
    });

    let onAbort = (): void => {};
    const cancelled = new Promise<ReadOutcome>((resolve) => {
      onAbort = () => resolve({ kind: 'cancelled' });
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    let wake = (): void => {};
    try {
      for (;;) {
        const available = this.take();
        if (available) {
          return available;
        }

        const arrival = new Promise<null>((resolve) => {
          wake = () => resolve(null);
          this.waiters.add(wake);
        });
        const outcome = await Promise.race([arrival, timedOut, cancelled]);
        this.waiters.delete(wake);
        if (outcome) {
          return outcome;
        }
      }
    } finally {
      this.waiters.delete(wake);
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Drop every notification that has already arrived.
   *
   * Called before writing a command whose reply is awaited, so a late reply
   * to an earlier command is never read as the reply to this one.
   *
   * @returns Number of frames dropped
   */
  async discardPending(): Promise<number> {
    this.start();
    // Let frames the transport has already queued reach the buffer
    await new Promise<void>((resolve) => setImmediate(resolve));

    const dropped = this.frames.length;
    this.frames.length = 0;
    if (dropped > 0) {
      console.debug(`Discarded ${dropped} stale notification(s)`);
    }
    return dropped;
  }

  private take(): ReadOutcome | null {
    const frame = this.frames.shift();
    if (frame) {
      return { kind: 'frame', frame };
    }
    return this.end;
  }

  private start(): void {
    if (!this.pumping) {
      this.pumping = this.pump();
    }
  }

  private async pump(): Promise<void> {
    try {
      for await (const frame of this.transport.notifications()) {
        this.frames.push(frame);
        this.wakeAll();
      }
      this.end = { kind: 'ended' };
    } catch (error) {
      this.end = { kind: 'error', error };
    }
    this.wakeAll();
  }

  private wakeAll(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }
}
