/**
 * In-process transport that records writes and replays scripted
 * notifications. Backs the tests and the CLI's `--dry-run`.
 */

import { buildPlaintextBlock, parseCommandBlock } from '../protocol/commands';
import type { BlockCipher } from '../protocol/cipher';
import { Characteristic, CommandName } from '../protocol/constants';
import { AckKind } from '../protocol/responses';
import { NotificationQueue } from './notification-queue';
import type { BadgeTransport, WritableCharacteristic } from './transport';

export interface RecordedWrite {
  characteristic: WritableCharacteristic;
  data: Uint8Array;
}

/**
 * Produces the notification frames a write triggers, if any.
 */
export type Responder = (write: RecordedWrite) => readonly Uint8Array[];

export interface MemoryTransportOptions {
  responder?: Responder;
}

export class MemoryTransport implements BadgeTransport {
  readonly writes: RecordedWrite[] = [];

  private readonly queue = new NotificationQueue();
  private readonly pendingFailures: Error[] = [];
  private responder: Responder | undefined;
  private closed = false;

  constructor(options: MemoryTransportOptions = {}) {
    this.responder = options.responder;
  }

  async write(characteristic: WritableCharacteristic, data: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new Error('Transport closed');
    }

    const failure = this.pendingFailures.shift();
    if (failure) {
      throw failure;
    }

    const write: RecordedWrite = { characteristic, data: data.slice() };
    this.writes.push(write);

    for (const frame of this.responder?.(write) ?? []) {
      this.queue.enqueue(frame);
    }
  }

  notifications(): AsyncIterable<Uint8Array> {
    return this.queue.stream();
  }

  /**
   * Deliver a notification as if the badge had sent it.
   */
  notify(frame: Uint8Array): void {
    this.queue.enqueue(frame);
  }

  /**
   * Make the next write reject with `error` instead of being recorded.
   */
  failNextWrite(error: Error): void {
    this.pendingFailures.push(error);
  }

  setResponder(responder: Responder | undefined): void {
    this.responder = responder;
  }

  /**
   * Writes to one characteristic, in order.
   */
  writesTo(characteristic: WritableCharacteristic): Uint8Array[] {
    return this.writes
      .filter((write) => write.characteristic === characteristic)
      .map((write) => write.data);
  }

  /**
   * Reject further writes and end the notification stream.
   */
  close(reason?: string): void {
    this.closed = true;
    this.queue.clear(reason);
  }
}

/**
 * Encrypt a response token the way the badge sends it (bare ciphertext).
 */
export function encodeResponseFrame(token: string, cipher: BlockCipher): Uint8Array {
  const payload = Uint8Array.from(token, (character) => character.charCodeAt(0));
  return cipher.encrypt(buildPlaintextBlock(payload));
}

/**
 * Responder that behaves like a healthy badge: acknowledges DATS and DATCP
 * and reports its display size on CHEC.
 */
export function badgeSimulator(cipher: BlockCipher, deviceType = 'STYPE12X48N'): Responder {
  return (write) => {
    if (write.characteristic !== Characteristic.COMMAND) {
      return [];
    }

    const { name } = parseCommandBlock(cipher.decrypt(write.data));
    switch (name) {
      case CommandName.DATS:
        return [encodeResponseFrame(AckKind.DATS, cipher)];
      case CommandName.DATCP:
        return [encodeResponseFrame(AckKind.DATCP, cipher)];
      case CommandName.CHEC:
        return [encodeResponseFrame(deviceType, cipher)];
      default:
        return [];
    }
  };
}
