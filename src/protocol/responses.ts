/**
 * Decoding of badge notifications.
 */

import { MalformedFrameError, UnexpectedResponseError } from '../exceptions';
import type { DeviceInfo } from '../models/device-info';
import type { BlockCipher } from './cipher';
import {
  BLOCK_SIZE,
  FRAMED_NOTIFICATION_SIZE,
  FRAME_HEADER_SIZE,
  MAX_BLOCK_PAYLOAD,
} from './constants';

/**
 * Acknowledgements the badge sends during an upload.
 */
export enum AckKind {
  DATS = 'DATSOK',
  DATCP = 'DATCPOK',
}

/**
 * A decoded notification.
 */
export type BadgeResponse =
  | { kind: 'ack'; ack: AckKind; token: string }
  | { kind: 'error'; code: string; token: string }
  | { kind: 'deviceInfo'; info: DeviceInfo; token: string }
  | { kind: 'unexpected'; token: string };

const ACK_TOKENS: ReadonlyMap<string, AckKind> = new Map(
  Object.values(AckKind).map((ack) => [ack, ack])
);

const ERROR_PATTERN = /^ERROR(.*)$/;
const DEVICE_TYPE_PATTERN = /^STYPE(\d+)X(\d+)(.*)$/;

/**
 * Extract the 16-byte ciphertext from a raw notification.
 *
 * Two shapes are accepted: the bare ciphertext, and the framed
 * `[frameLength][type][ciphertext][trailer]` form where `frameLength`
 * counts the bytes after itself. Type and trailer bytes are not
 * interpreted.
 *
 * @throws {MalformedFrameError} If the frame has neither shape
 */
export function extractCiphertext(frame: Uint8Array): Uint8Array {
  if (frame.length === BLOCK_SIZE) {
    return frame;
  }

  if (frame.length !== FRAMED_NOTIFICATION_SIZE) {
    throw new MalformedFrameError(
      `Notification of ${frame.length} bytes (expected ${BLOCK_SIZE} or ${FRAMED_NOTIFICATION_SIZE})`
    );
  }

  const frameLength = frame[0];
  if (frameLength !== frame.length - 1) {
    throw new MalformedFrameError(
      `Frame length byte ${frameLength} does not match ${frame.length - 1} following bytes`
    );
  }

  return frame.subarray(FRAME_HEADER_SIZE, FRAME_HEADER_SIZE + BLOCK_SIZE);
}

/**
 * Recover the ASCII token from a decrypted notification block.
 *
 * The block carries `[length][token][...]`; bytes after the length are
 * stale buffer contents, and the token itself may end in zero padding.
 *
 * @throws {MalformedFrameError} If the length prefix exceeds 15
 */
export function parseToken(block: Uint8Array): string {
  const length = block[0];
  if (length > MAX_BLOCK_PAYLOAD) {
    throw new MalformedFrameError(
      `Length prefix ${length} exceeds maximum ${MAX_BLOCK_PAYLOAD}`
    );
  }

  let end = 1 + length;
  while (end > 1 && block[end - 1] === 0x00) {
    end--;
  }

  return String.fromCharCode(...block.subarray(1, end));
}

/**
 * Classify a notification token.
 */
export function classifyToken(token: string): BadgeResponse {
  const ack = ACK_TOKENS.get(token);
  if (ack) {
    return { kind: 'ack', ack, token };
  }

  const error = ERROR_PATTERN.exec(token);
  if (error) {
    return { kind: 'error', code: error[1], token };
  }

  const deviceType = DEVICE_TYPE_PATTERN.exec(token);
  if (deviceType) {
    return {
      kind: 'deviceInfo',
      info: {
        rows: Number(deviceType[1]),
        columns: Number(deviceType[2]),
        variant: deviceType[3],
      },
      token,
    };
  }

  return { kind: 'unexpected', token };
}

/**
 * Decrypt and classify a raw notification.
 *
 * @param frame - Notification bytes as delivered by the transport
 * @param cipher - Cipher holding the badge key
 * @throws {MalformedFrameError} If the frame cannot be sliced or parsed
 *
 * @example
 * ```typescript
 * const response = decodeNotification(frame, cipher);
 * if (response.kind === 'ack' && response.ack === AckKind.DATS) {
 *   // start streaming chunks
 * }
 * ```
 */
export function decodeNotification(frame: Uint8Array, cipher: BlockCipher): BadgeResponse {
  const block = cipher.decrypt(extractCiphertext(frame));
  return classifyToken(parseToken(block));
}

/**
 * Require a specific acknowledgement.
 *
 * @throws {UnexpectedResponseError} For any other response
 */
export function expectAck(response: BadgeResponse, expected: AckKind): void {
  if (response.kind !== 'ack' || response.ack !== expected) {
    throw new UnexpectedResponseError(response, expected);
  }
}
