/**
 * Protocol layer exports for badge BLE communication.
 */

export * from './constants';
export * from './cipher';
export * from './commands';
export * from './chunks';
export * from './responses';
