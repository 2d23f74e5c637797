/**
 * Display settings applied after an upload.
 */

import { ScrollMode } from './enums';

export interface DisplaySettings {
  /** Scroll mode byte (see {@link ScrollMode}); other values pass through */
  mode: ScrollMode | number;

  /** Scroll speed, 0-255 */
  speed: number;

  /** Brightness, 0-255 */
  brightness: number;
}

/**
 * The badge does not keep brightness or speed across power cycles, so every
 * upload re-applies a full set.
 */
export const DEFAULT_DISPLAY_SETTINGS: Readonly<DisplaySettings> = {
  mode: ScrollMode.LEFT,
  speed: 50,
  brightness: 200,
};

const SCROLL_MODE_NAMES: ReadonlyMap<string, ScrollMode> = new Map([
  ['static', ScrollMode.STATIC],
  ['left', ScrollMode.LEFT],
  ['right', ScrollMode.RIGHT],
  ['up', ScrollMode.UP],
  ['down', ScrollMode.DOWN],
  ['snow', ScrollMode.SNOW],
]);

/**
 * Names accepted by {@link parseScrollMode}.
 */
export const SCROLL_MODE_CHOICES = [...SCROLL_MODE_NAMES.keys()];

/**
 * Resolve a scroll mode given by name (`left`) or number (`3`).
 *
 * @returns The mode, or undefined for unknown input
 */
export function parseScrollMode(text: string): ScrollMode | undefined {
  const key = text.trim().toLowerCase();
  const named = SCROLL_MODE_NAMES.get(key);
  if (named !== undefined) {
    return named;
  }

  const numeric = Number(key);
  return [...SCROLL_MODE_NAMES.values()].find((mode) => mode === numeric);
}
