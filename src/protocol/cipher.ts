/**
 * AES-128-ECB block cipher bound to a fixed badge key.
 */

import { createCipheriv, createDecipheriv } from 'node:crypto';
import { InvalidBlockLengthError, InvalidKeyLengthError } from '../exceptions';
import { BLOCK_SIZE, DEFAULT_KEY } from './constants';

/**
 * Encrypts and decrypts single 16-byte blocks. Each block is transformed
 * independently (ECB, no IV, no padding), so one instance can be shared by
 * any number of encoders and decoders.
 *
 * @example
 * ```typescript
 * const cipher = new BlockCipher();
 * const packet = cipher.encrypt(buildCommandBlock({ name: CommandName.LEDON }));
 * ```
 */
export class BlockCipher {
  private readonly key: Buffer;

  /**
   * @param key - 16-byte AES key (defaults to the badge key)
   * @throws {InvalidKeyLengthError} If the key is not 16 bytes
   */
  constructor(key: Uint8Array = DEFAULT_KEY) {
    if (key.length !== BLOCK_SIZE) {
      throw new InvalidKeyLengthError(key.length);
    }
    this.key = Buffer.from(key);
  }

  /**
   * Encrypt one plaintext block.
   *
   * @throws {InvalidBlockLengthError} If the block is not 16 bytes
   */
  encrypt(block: Uint8Array): Uint8Array {
    assertBlock(block);
    const cipher = createCipheriv('aes-128-ecb', this.key, null);
    cipher.setAutoPadding(false);
    return toBytes(Buffer.concat([cipher.update(block), cipher.final()]));
  }

  /**
   * Decrypt one ciphertext block.
   *
   * @throws {InvalidBlockLengthError} If the block is not 16 bytes
   */
  decrypt(block: Uint8Array): Uint8Array {
    assertBlock(block);
    const decipher = createDecipheriv('aes-128-ecb', this.key, null);
    decipher.setAutoPadding(false);
    return toBytes(Buffer.concat([decipher.update(block), decipher.final()]));
  }
}

function assertBlock(block: Uint8Array): void {
  if (block.length !== BLOCK_SIZE) {
    throw new InvalidBlockLengthError(block.length);
  }
}

// Plain Uint8Array so results compare equal to Uint8Array literals in callers.
function toBytes(buffer: Buffer): Uint8Array {
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength).slice();
}
