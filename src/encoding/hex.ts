/**
 * Hex text for packets typed on the command line or copied from BLE traces.
 */

import { EncodingError } from '../exceptions';

/**
 * Parse hex text. Spaces, colons and dashes between bytes are ignored.
 *
 * @throws {EncodingError} If the text is not whole bytes of hex
 */
export function parseHex(text: string): Uint8Array {
  const digits = text.replace(/[\s:-]/g, '').replace(/^0x/i, '');
  if (digits.length % 2 !== 0 || !/^[0-9a-f]*$/i.test(digits)) {
    throw new EncodingError(`Not a hex byte string: ${JSON.stringify(text)}`);
  }
  return Uint8Array.from(Buffer.from(digits, 'hex'));
}

/**
 * Format bytes as space-separated lowercase hex pairs.
 */
export function formatHex(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join(' ');
}
