/**
 * BLE protocol constants for LED name badges.
 */

export const SERVICE_UUID = '0000fee9-0000-1000-8000-00805f9b34fb';

/**
 * GATT characteristics used by the badge.
 */
export enum Characteristic {
  /** Encrypted commands */
  COMMAND = 'd44bc439-abfd-45a2-b575-925416129600',
  /** Encrypted bitmap chunks */
  IMAGE_UPLOAD = 'd44bc439-abfd-45a2-b575-92541612960a',
  /** Encrypted acknowledgements from the badge */
  NOTIFY = 'd44bc439-abfd-45a2-b575-925416129601',
}

/**
 * AES-128 key shared by the badge family this library targets.
 */
export const DEFAULT_KEY = Uint8Array.of(
  0x34, 0x52, 0x2a, 0x5b, 0x7a, 0x6e, 0x49, 0x2c,
  0x08, 0x09, 0x0a, 0x9d, 0x8d, 0x2a, 0x23, 0xf8
);

/**
 * Key used by "Shining Masks" devices, which speak the same framing.
 */
export const SHINING_MASKS_KEY = Uint8Array.of(
  0x32, 0x67, 0x2f, 0x79, 0x74, 0xad, 0x43, 0x45,
  0x1d, 0x9c, 0x6c, 0x89, 0x4a, 0x0e, 0x87, 0x64
);

// Block framing
export const BLOCK_SIZE = 16;
export const MAX_BLOCK_PAYLOAD = BLOCK_SIZE - 1; // one byte is the length prefix
export const CHUNK_SIZE = MAX_BLOCK_PAYLOAD;
export const MAX_TRANSFER_LENGTH = 0xffff; // DATS carries a 16-bit length

// Notification frames: [frameLength][type][ciphertext:16][trailer]
export const FRAME_HEADER_SIZE = 2;
export const FRAMED_NOTIFICATION_SIZE = FRAME_HEADER_SIZE + BLOCK_SIZE + 1;

/**
 * Commands understood by the badge firmware. The payload of each command
 * block is the ASCII name followed by its argument bytes.
 */
export enum CommandName {
  LEDON = 'LEDON',
  LEDOFF = 'LEDOFF',
  MODE = 'MODE',
  SPEED = 'SPEED',
  LIGHT = 'LIGHT',
  DATS = 'DATS',
  DATCP = 'DATCP',
  ANIM = 'ANIM',
  IMAG = 'IMAG',
  PLAY = 'PLAY',
  DELE = 'DELE',
  CHEC = 'CHEC',
}

/**
 * Most image ids a PLAY or DELE block can carry: 15 payload bytes minus
 * the 4-byte name and the count byte.
 */
export const MAX_IMAGE_IDS = MAX_BLOCK_PAYLOAD - 4 - 1;
