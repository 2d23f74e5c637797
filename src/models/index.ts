/**
 * Models layer exports for badge data structures.
 */

export * from './enums';
export * from './device-info';
export * from './settings';
export * from './glyph';
