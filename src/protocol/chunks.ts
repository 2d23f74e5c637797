/**
 * Splitting bitmap payloads into encrypted upload chunks.
 */

import type { BlockCipher } from './cipher';
import { buildPlaintextBlock } from './commands';
import { CHUNK_SIZE } from './constants';

/**
 * One slice of an upload payload, ready for the IMAGE_UPLOAD characteristic.
 */
export interface ImageChunk {
  /** Position of the chunk in the upload, from 0 */
  index: number;

  /** Raw payload bytes (15, or fewer for the last chunk) */
  data: Uint8Array;

  /** True for the final chunk */
  isLast: boolean;

  /** Plaintext block: `[data.length][data][zero padding]` */
  block: Uint8Array;

  /** Encrypted block as written to the badge */
  packet: Uint8Array;
}

/**
 * Split a payload into 15-byte chunks, each wrapped in its own block.
 *
 * An empty payload yields no chunks. Concatenating `data` of all chunks in
 * order gives back the payload.
 *
 * @param payload - Complete bitmap payload
 * @param cipher - Cipher used to encrypt each block
 */
export function splitPayload(payload: Uint8Array, cipher: BlockCipher): ImageChunk[] {
  const chunkCount = Math.ceil(payload.length / CHUNK_SIZE);
  const chunks: ImageChunk[] = [];

  for (let index = 0; index < chunkCount; index++) {
    const offset = index * CHUNK_SIZE;
    const data = payload.slice(offset, offset + CHUNK_SIZE);
    const block = buildPlaintextBlock(data);

    chunks.push({
      index,
      data,
      isLast: index === chunkCount - 1,
      block,
      packet: cipher.encrypt(block),
    });
  }

  return chunks;
}
