/**
 * Command block builders for the badge protocol.
 *
 * Every command travels as one AES block whose plaintext is
 * `[length][ASCII name][argument bytes][zero padding]`.
 */

import {
  InvalidBlockLengthError,
  PayloadTooLargeError,
  UnknownCommandError,
  ValueOutOfRangeError,
} from '../exceptions';
import type { BlockCipher } from './cipher';
import {
  BLOCK_SIZE,
  CommandName,
  MAX_BLOCK_PAYLOAD,
  MAX_IMAGE_IDS,
  MAX_TRANSFER_LENGTH,
} from './constants';

/**
 * A badge command with its typed arguments.
 */
export type BadgeCommand =
  | { name: CommandName.LEDON }
  | { name: CommandName.LEDOFF }
  | { name: CommandName.DATCP }
  | { name: CommandName.CHEC }
  | { name: CommandName.MODE; mode: number }
  | { name: CommandName.SPEED; speed: number }
  | { name: CommandName.LIGHT; level: number }
  | { name: CommandName.DATS; totalLength: number }
  | { name: CommandName.ANIM; animation: number }
  | { name: CommandName.IMAG; imageId: number }
  | { name: CommandName.PLAY; imageIds: readonly number[] }
  | { name: CommandName.DELE; imageIds: readonly number[] };

const COMMAND_NAMES: ReadonlySet<string> = new Set(Object.values(CommandName));

/**
 * Resolve a command name typed by a user or read from a trace.
 *
 * @throws {UnknownCommandError} If the name is not a known command
 */
export function parseCommandName(text: string): CommandName {
  const upper = text.trim().toUpperCase();
  if (!isCommandName(upper)) {
    throw new UnknownCommandError(text);
  }
  return upper;
}

function isCommandName(text: string): text is CommandName {
  return COMMAND_NAMES.has(text);
}

/**
 * Argument bytes for a command.
 *
 * @throws {ValueOutOfRangeError} If an argument is not a byte value
 * @throws {PayloadTooLargeError} If a DATS length does not fit 16 bits,
 *   or PLAY/DELE carry more ids than fit in one block
 */
export function commandArguments(command: BadgeCommand): Uint8Array {
  switch (command.name) {
    case CommandName.LEDON:
    case CommandName.LEDOFF:
    case CommandName.DATCP:
    case CommandName.CHEC:
      return new Uint8Array(0);

    case CommandName.MODE:
      return Uint8Array.of(toByte(command.mode, 'mode'));

    case CommandName.SPEED:
      return Uint8Array.of(toByte(command.speed, 'speed'));

    case CommandName.LIGHT:
      return Uint8Array.of(toByte(command.level, 'brightness'));

    case CommandName.ANIM:
      return Uint8Array.of(toByte(command.animation, 'animation'));

    case CommandName.IMAG:
      return Uint8Array.of(toByte(command.imageId, 'image id'));

    case CommandName.DATS:
      return buildDataStartArguments(command.totalLength);

    case CommandName.PLAY:
    case CommandName.DELE:
      return buildImageListArguments(command.imageIds);
  }
}

/**
 * DATS arguments: `[hi][lo][0x00][0x00]`.
 *
 * The two trailing bytes are reserved; the captured traces only ever carry
 * zeros there.
 */
function buildDataStartArguments(totalLength: number): Uint8Array {
  if (!Number.isInteger(totalLength) || totalLength < 0) {
    throw new ValueOutOfRangeError(
      `Transfer length must be a non-negative integer, got ${totalLength}`
    );
  }
  if (totalLength > MAX_TRANSFER_LENGTH) {
    throw new PayloadTooLargeError(
      `Transfer length ${totalLength} exceeds maximum ${MAX_TRANSFER_LENGTH}`,
      totalLength,
      MAX_TRANSFER_LENGTH
    );
  }

  const args = new Uint8Array(4);
  const view = new DataView(args.buffer);
  view.setUint16(0, totalLength, false); // big-endian
  return args;
}

/**
 * PLAY/DELE arguments: `[count][id...]`.
 */
function buildImageListArguments(imageIds: readonly number[]): Uint8Array {
  if (imageIds.length > MAX_IMAGE_IDS) {
    throw new PayloadTooLargeError(
      `At most ${MAX_IMAGE_IDS} image ids fit in one command, got ${imageIds.length}`,
      imageIds.length,
      MAX_IMAGE_IDS
    );
  }
  return Uint8Array.from([imageIds.length, ...imageIds.map((id) => toByte(id, 'image id'))]);
}

function toByte(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new ValueOutOfRangeError(`${label} must be an integer in 0-255, got ${value}`);
  }
  return value;
}

/**
 * Wrap up to 15 payload bytes into a 16-byte plaintext block.
 *
 * @param payload - Meaningful bytes of the block
 * @returns `[payload.length][payload][zero padding]`
 * @throws {PayloadTooLargeError} If the payload exceeds 15 bytes
 */
export function buildPlaintextBlock(payload: Uint8Array): Uint8Array {
  if (payload.length > MAX_BLOCK_PAYLOAD) {
    throw new PayloadTooLargeError(
      `Block payload of ${payload.length} bytes exceeds maximum ${MAX_BLOCK_PAYLOAD}`,
      payload.length,
      MAX_BLOCK_PAYLOAD
    );
  }

  const block = new Uint8Array(BLOCK_SIZE);
  block[0] = payload.length;
  block.set(payload, 1);
  return block;
}

/**
 * Build the plaintext block for a command.
 *
 * @example
 * ```typescript
 * buildCommandBlock({ name: CommandName.SPEED, speed: 50 });
 * // 06 53 50 45 45 44 32 00 00 00 00 00 00 00 00 00
 * ```
 */
export function buildCommandBlock(command: BadgeCommand): Uint8Array {
  const name = new TextEncoder().encode(command.name);
  const args = commandArguments(command);

  const payload = new Uint8Array(name.length + args.length);
  payload.set(name, 0);
  payload.set(args, name.length);

  return buildPlaintextBlock(payload);
}

/**
 * Build the encrypted wire packet for a command.
 */
export function encodeCommand(command: BadgeCommand, cipher: BlockCipher): Uint8Array {
  return cipher.encrypt(buildCommandBlock(command));
}

/**
 * A decrypted command block split back into name and arguments.
 */
export interface ParsedCommandBlock {
  name: CommandName;
  args: Uint8Array;
}

/**
 * Parse a decrypted command block, e.g. one recovered from a BLE trace.
 *
 * @throws {InvalidBlockLengthError} If the block is not 16 bytes
 * @throws {PayloadTooLargeError} If the length prefix exceeds 15
 * @throws {UnknownCommandError} If the payload starts with no known name
 */
export function parseCommandBlock(block: Uint8Array): ParsedCommandBlock {
  if (block.length !== BLOCK_SIZE) {
    throw new InvalidBlockLengthError(block.length);
  }

  const length = block[0];
  if (length > MAX_BLOCK_PAYLOAD) {
    throw new PayloadTooLargeError(
      `Length prefix ${length} exceeds maximum ${MAX_BLOCK_PAYLOAD}`,
      length,
      MAX_BLOCK_PAYLOAD
    );
  }

  const payload = block.subarray(1, 1 + length);
  const text = String.fromCharCode(...payload);

  // No command name is a prefix of another, so the first match is the only one
  const name = Object.values(CommandName).find((candidate) => text.startsWith(candidate));

  if (!name) {
    throw new UnknownCommandError(text);
  }

  return { name, args: payload.slice(name.length) };
}
