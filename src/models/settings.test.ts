import { describe, expect, it } from 'vitest';
import { ScrollMode } from './enums';
import { DEFAULT_DISPLAY_SETTINGS, SCROLL_MODE_CHOICES, parseScrollMode } from './settings';

describe('parseScrollMode', () => {
  it.each<[string, ScrollMode]>([
    ['static', ScrollMode.STATIC],
    ['Left', ScrollMode.LEFT],
    [' SNOW ', ScrollMode.SNOW],
    ['4', ScrollMode.RIGHT],
    ['1', ScrollMode.STATIC],
  ])('resolves %j', (text, mode) => {
    expect(parseScrollMode(text)).toBe(mode);
  });

  it.each(['2', '8', 'fast', '', 'constructor'])('rejects %j', (text) => {
    expect(parseScrollMode(text)).toBeUndefined();
  });
});

describe('display settings', () => {
  it('defaults to left scroll, speed 50, brightness 200', () => {
    expect(DEFAULT_DISPLAY_SETTINGS).toEqual({ mode: ScrollMode.LEFT, speed: 50, brightness: 200 });
  });

  it('lists every named mode', () => {
    expect(SCROLL_MODE_CHOICES).toEqual(['static', 'left', 'right', 'up', 'down', 'snow']);
  });
});
