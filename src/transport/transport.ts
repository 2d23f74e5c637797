/**
 * Transport contract between the protocol core and a BLE link.
 */

import type { Characteristic } from '../protocol/constants';

/**
 * Characteristics the core writes to.
 */
export type WritableCharacteristic = Characteristic.COMMAND | Characteristic.IMAGE_UPLOAD;

/**
 * A connected link to one badge.
 *
 * Implementations serialize writes per connection. Errors thrown by
 * `write` or by the notification stream are passed to callers unchanged.
 */
export interface BadgeTransport {
  /**
   * Write one 16-byte packet to a characteristic.
   */
  write(characteristic: WritableCharacteristic, data: Uint8Array): Promise<void>;

  /**
   * Live stream of raw NOTIFY frames while connected. The stream does not
   * restart: callers obtain it once and keep the iterator.
   */
  notifications(): AsyncIterable<Uint8Array>;
}
