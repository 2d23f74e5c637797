/**
 * ble-led-badge - TypeScript library for encrypted BLE LED name badges
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { BadgeDevice, type BadgeDeviceOptions } from './device';
export {
  discoverBadges,
  findBadgePeripheral,
  DEFAULT_NAME_PATTERN,
  type DiscoveredBadge,
  type DiscoveryOptions,
} from './discovery';

// Protocol and encoding
export * from './protocol';
export * from './encoding/glyphs';
export * from './encoding/text';
export * from './encoding/bitmap';
export * from './encoding/hex';

// Upload sessions
export * from './transfer/state-machine';
export { NotificationReader, type ReadOutcome } from './transfer/notification-reader';

// Transports
export type { BadgeTransport, WritableCharacteristic } from './transport/transport';
export { NotificationQueue } from './transport/notification-queue';
export * from './transport/memory-transport';
export { NobleTransport, type NobleTransportOptions } from './transport/noble-transport';

// Models and types
export * from './models';

// Configuration
export { loadConfig, type BadgeConfig } from './config';

// Exceptions
export * from './exceptions';
