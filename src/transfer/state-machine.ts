/**
 * Upload session state machine.
 *
 * An upload is `DATS` → `DATSOK` → chunks → `DATCP` → `DATCPOK` → display
 * settings. {@link transition} describes the legal moves; the
 * {@link TransferStateMachine} class drives them against a transport.
 */

import {
  BLEConnectionError,
  InvalidTransitionError,
  MalformedFrameError,
  TransferFailedError,
  TransferInProgressError,
} from '../exceptions';
import { DEFAULT_DISPLAY_SETTINGS, type DisplaySettings } from '../models/settings';
import { splitPayload } from '../protocol/chunks';
import { BlockCipher } from '../protocol/cipher';
import { encodeCommand } from '../protocol/commands';
import { Characteristic, CommandName } from '../protocol/constants';
import { AckKind, type BadgeResponse, decodeNotification } from '../protocol/responses';
import type { BadgeTransport, WritableCharacteristic } from '../transport/transport';
import { NotificationReader } from './notification-reader';

export type FailureReason =
  | { kind: 'timeout'; awaiting: AckKind; timeoutMs: number }
  | { kind: 'cancelled' }
  | { kind: 'transport'; error: Error }
  | { kind: 'unexpectedResponse'; awaiting: AckKind; response: BadgeResponse }
  | { kind: 'malformedFrame'; error: MalformedFrameError };

export type TransferState =
  | { kind: 'idle' }
  | { kind: 'awaitingDatsAck'; totalChunks: number }
  | { kind: 'sendingChunks'; nextIndex: number; totalChunks: number }
  | { kind: 'awaitingDatcpAck' }
  | { kind: 'settling' }
  | { kind: 'done' }
  | { kind: 'failed'; reason: FailureReason };

export type TransferEvent =
  | { type: 'sendRequested'; totalChunks: number }
  | { type: 'ackReceived'; response: BadgeResponse }
  | { type: 'chunkSent' }
  | { type: 'settled' }
  | { type: 'timeoutFired'; timeoutMs: number }
  | { type: 'cancelRequested' }
  | { type: 'transportFailed'; error: Error }
  | { type: 'frameRejected'; error: MalformedFrameError };

type FailureEvent = Extract<
  TransferEvent,
  { type: 'timeoutFired' | 'cancelRequested' | 'transportFailed' | 'frameRejected' }
>;

/**
 * States from which a new upload may start.
 */
export function isTerminal(state: TransferState): boolean {
  return state.kind === 'idle' || state.kind === 'done' || state.kind === 'failed';
}

/**
 * Compute the state that follows an event.
 *
 * @throws {InvalidTransitionError} If the event is not legal in the state
 */
export function transition(state: TransferState, event: TransferEvent): TransferState {
  if (event.type === 'sendRequested') {
    if (!isTerminal(state)) {
      throw new InvalidTransitionError(state.kind, event.type);
    }
    return { kind: 'awaitingDatsAck', totalChunks: event.totalChunks };
  }

  switch (state.kind) {
    case 'awaitingDatsAck':
      if (event.type === 'ackReceived') {
        if (!isAck(event.response, AckKind.DATS)) {
          return unexpected(AckKind.DATS, event.response);
        }
        return state.totalChunks === 0
          ? { kind: 'awaitingDatcpAck' }
          : { kind: 'sendingChunks', nextIndex: 0, totalChunks: state.totalChunks };
      }
      if (event.type === 'timeoutFired') {
        return failed({ kind: 'timeout', awaiting: AckKind.DATS, timeoutMs: event.timeoutMs });
      }
      break;

    case 'sendingChunks':
      if (event.type === 'chunkSent') {
        const nextIndex = state.nextIndex + 1;
        return nextIndex === state.totalChunks
          ? { kind: 'awaitingDatcpAck' }
          : { kind: 'sendingChunks', nextIndex, totalChunks: state.totalChunks };
      }
      break;

    case 'awaitingDatcpAck':
      if (event.type === 'ackReceived') {
        return isAck(event.response, AckKind.DATCP)
          ? { kind: 'settling' }
          : unexpected(AckKind.DATCP, event.response);
      }
      if (event.type === 'timeoutFired') {
        return failed({ kind: 'timeout', awaiting: AckKind.DATCP, timeoutMs: event.timeoutMs });
      }
      break;

    case 'settling':
      if (event.type === 'settled') {
        return { kind: 'done' };
      }
      break;

    case 'idle':
    case 'done':
    case 'failed':
      throw new InvalidTransitionError(state.kind, event.type);
  }

  switch (event.type) {
    case 'cancelRequested':
      return failed({ kind: 'cancelled' });
    case 'transportFailed':
      return failed({ kind: 'transport', error: event.error });
    case 'frameRejected':
      return failed({ kind: 'malformedFrame', error: event.error });
    default:
      throw new InvalidTransitionError(state.kind, event.type);
  }
}

function isAck(response: BadgeResponse, expected: AckKind): boolean {
  return response.kind === 'ack' && response.ack === expected;
}

function unexpected(awaiting: AckKind, response: BadgeResponse): TransferState {
  return failed({ kind: 'unexpectedResponse', awaiting, response });
}

function failed(reason: FailureReason): TransferState {
  return { kind: 'failed', reason };
}

export interface TransferStateMachineOptions {
  /** Cipher holding the badge key */
  cipher?: BlockCipher;

  /** Default deadline for each acknowledgement */
  ackTimeoutMs?: number;

  /** Shared reader, when other code also consumes notifications */
  reader?: NotificationReader;

  /** Called after every state change */
  onStateChange?: (state: TransferState, previous: TransferState) => void;
}

export interface UploadOptions {
  /** Cancels the upload at its next suspension point */
  signal?: AbortSignal;

  /** Overrides the machine's acknowledgement deadline */
  ackTimeoutMs?: number;
}

export interface TransferResult {
  /** Payload bytes announced by DATS */
  totalLength: number;

  /** Chunks written to IMAGE_UPLOAD */
  chunkCount: number;

  elapsedMs: number;
}

/**
 * Drives one upload at a time against a transport.
 *
 * @example
 * ```typescript
 * const machine = new TransferStateMachine(transport);
 * const result = await machine.beginUpload(concatSegments(renderText('Hi')));
 * ```
 */
export class TransferStateMachine {
  static readonly DEFAULT_ACK_TIMEOUT_MS = 5000;

  private _state: TransferState = { kind: 'idle' };
  private readonly cipher: BlockCipher;
  private readonly ackTimeoutMs: number;
  private readonly reader: NotificationReader;

  constructor(
    private readonly transport: BadgeTransport,
    private readonly options: TransferStateMachineOptions = {}
  ) {
    this.cipher = options.cipher ?? new BlockCipher();
    this.ackTimeoutMs = options.ackTimeoutMs ?? TransferStateMachine.DEFAULT_ACK_TIMEOUT_MS;
    this.reader = options.reader ?? new NotificationReader(transport);
  }

  get state(): TransferState {
    return this._state;
  }

  /**
   * Upload a bitmap payload and apply display settings.
   *
   * Every block is encoded before the first write, so invalid input fails
   * without touching the transport.
   *
   * @param payload - Concatenated 9-byte glyph segments
   * @param settings - Mode, speed and brightness sent after the upload
   * @throws {TransferInProgressError} If an upload is already running
   * @throws {TransferFailedError} If the session fails; `reason` says why
   */
  async beginUpload(
    payload: Uint8Array,
    settings: DisplaySettings = DEFAULT_DISPLAY_SETTINGS,
    options: UploadOptions = {}
  ): Promise<TransferResult> {
    if (!isTerminal(this._state)) {
      throw new TransferInProgressError(this._state.kind);
    }

    const { signal } = options;
    const ackTimeoutMs = options.ackTimeoutMs ?? this.ackTimeoutMs;

    const startPacket = encodeCommand(
      { name: CommandName.DATS, totalLength: payload.length },
      this.cipher
    );
    const chunks = splitPayload(payload, this.cipher);
    const completePacket = encodeCommand({ name: CommandName.DATCP }, this.cipher);
    const settingPackets = [
      encodeCommand({ name: CommandName.MODE, mode: settings.mode }, this.cipher),
      encodeCommand({ name: CommandName.SPEED, speed: settings.speed }, this.cipher),
      encodeCommand({ name: CommandName.LIGHT, level: settings.brightness }, this.cipher),
    ];

    const startedAt = Date.now();
    this.dispatch({ type: 'sendRequested', totalChunks: chunks.length });
    console.log(`Uploading ${payload.length} bytes in ${chunks.length} chunks`);

    await this.reader.discardPending();
    await this.send(Characteristic.COMMAND, startPacket, signal);
    await this.awaitAck(ackTimeoutMs, signal);

    for (const chunk of chunks) {
      await this.send(Characteristic.IMAGE_UPLOAD, chunk.packet, signal);
      this.dispatch({ type: 'chunkSent' });
      console.debug(`Sent chunk ${chunk.index + 1}/${chunks.length} (${chunk.data.length} bytes)`);
    }

    await this.send(Characteristic.COMMAND, completePacket, signal);
    await this.awaitAck(ackTimeoutMs, signal);

    for (const packet of settingPackets) {
      await this.send(Characteristic.COMMAND, packet, signal);
    }
    this.dispatch({ type: 'settled' });

    const elapsedMs = Date.now() - startedAt;
    console.log(`Upload complete in ${elapsedMs}ms`);

    return { totalLength: payload.length, chunkCount: chunks.length, elapsedMs };
  }

  private dispatch(event: TransferEvent): TransferState {
    const previous = this._state;
    this._state = transition(previous, event);
    this.options.onStateChange?.(this._state, previous);
    return this._state;
  }

  /**
   * Move to `failed` and build the error to reject with.
   */
  private failure(event: FailureEvent): TransferFailedError {
    const next = this.dispatch(event);
    if (next.kind !== 'failed') {
      throw new InvalidTransitionError(next.kind, event.type);
    }
    console.warn(`Upload failed: ${next.reason.kind}`);
    return new TransferFailedError(next.reason);
  }

  private async send(
    characteristic: WritableCharacteristic,
    packet: Uint8Array,
    signal: AbortSignal | undefined
  ): Promise<void> {
    if (signal?.aborted) {
      throw this.failure({ type: 'cancelRequested' });
    }

    try {
      await this.transport.write(characteristic, packet);
    } catch (error) {
      throw this.failure({ type: 'transportFailed', error: toError(error) });
    }

    if (signal?.aborted) {
      throw this.failure({ type: 'cancelRequested' });
    }
  }

  private async awaitAck(timeoutMs: number, signal: AbortSignal | undefined): Promise<void> {
    const outcome = await this.reader.next(timeoutMs, signal);

    switch (outcome.kind) {
      case 'timeout':
        throw this.failure({ type: 'timeoutFired', timeoutMs });
      case 'cancelled':
        throw this.failure({ type: 'cancelRequested' });
      case 'error':
        throw this.failure({ type: 'transportFailed', error: toError(outcome.error) });
      case 'ended':
        throw this.failure({
          type: 'transportFailed',
          error: new BLEConnectionError('Notification stream ended'),
        });
      case 'frame':
        break;
    }

    let response: BadgeResponse;
    try {
      response = decodeNotification(outcome.frame, this.cipher);
    } catch (error) {
      if (error instanceof MalformedFrameError) {
        throw this.failure({ type: 'frameRejected', error });
      }
      throw error;
    }

    const next = this.dispatch({ type: 'ackReceived', response });
    if (next.kind === 'failed') {
      console.warn(`Upload failed: badge replied ${JSON.stringify(response.token)}`);
      throw new TransferFailedError(next.reason);
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
