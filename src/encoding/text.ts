/**
 * Text rendering with bit-packed badge fonts.
 */

import { z } from 'zod';
import { ImageEncodingError, UnsupportedCharacterError } from '../exceptions';
import type { FontDefinition } from '../models/glyph';
import defaultFontData from './fonts/default-font.json';
import {
  GLYPH_HEIGHT,
  GLYPH_WIDTH,
  SEGMENT_SIZE,
  encodeGlyph,
  parsePixelRows,
  sliceSegments,
} from './glyphs';

const fontDefinitionSchema = z.object({
  name: z.string().min(1),
  height: z.literal(GLYPH_HEIGHT),
  glyphs: z.record(z.string(), z.array(z.string()).length(GLYPH_HEIGHT)),
});

/**
 * Emoji presentation selectors carry no pixels of their own.
 */
const VARIATION_SELECTORS: ReadonlySet<string> = new Set(['\uFE0E', '\uFE0F']);

/**
 * A font ready for rendering: each character maps to one or more encoded
 * 9-byte segments.
 */
export class BadgeFont {
  private readonly glyphs: ReadonlyMap<string, readonly Uint8Array[]>;

  constructor(
    readonly name: string,
    glyphs: ReadonlyMap<string, readonly Uint8Array[]>
  ) {
    this.glyphs = glyphs;
  }

  /**
   * Characters the font can render.
   */
  get characters(): string[] {
    return [...this.glyphs.keys()];
  }

  has(character: string): boolean {
    return this.glyphs.has(character);
  }

  /**
   * Encoded segments of a character, left to right.
   *
   * @throws {UnsupportedCharacterError} If the font has no such glyph
   */
  segmentsFor(character: string): readonly Uint8Array[] {
    const segments = this.glyphs.get(character);
    if (!segments) {
      throw new UnsupportedCharacterError(character, this.name);
    }
    return segments;
  }
}

/**
 * Build a font from its row-string definition.
 *
 * @param definition - Parsed font file contents
 * @throws {ImageEncodingError} If the definition is malformed
 */
export function loadFont(definition: unknown): BadgeFont {
  const parsed = fontDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    throw new ImageEncodingError(`Invalid font definition: ${parsed.error.message}`);
  }

  const font: FontDefinition = parsed.data;
  const glyphs = new Map<string, Uint8Array[]>();

  for (const [character, rows] of Object.entries(font.glyphs)) {
    if ([...character].length !== 1) {
      throw new ImageEncodingError(
        `Font "${font.name}" key ${JSON.stringify(character)} must be a single character`
      );
    }

    const grid = parsePixelRows(rows);
    const width = grid[0].length;
    if (width === 0 || width % GLYPH_WIDTH !== 0) {
      throw new ImageEncodingError(
        `Glyph ${JSON.stringify(character)} is ${width} columns wide, ` +
          `expected a multiple of ${GLYPH_WIDTH}`
      );
    }

    glyphs.set(character, sliceSegments(grid).map(encodeGlyph));
  }

  return new BadgeFont(font.name, glyphs);
}

let bundledFont: BadgeFont | null = null;

/**
 * The bundled 5×7 font (printable ASCII and a two-segment heart).
 */
export function defaultFont(): BadgeFont {
  if (!bundledFont) {
    bundledFont = loadFont(defaultFontData);
  }
  return bundledFont;
}

/**
 * Render a string to glyph segments.
 *
 * @param text - Text to render
 * @param font - Font to render with
 * @returns One 9-byte segment per 6-pixel column group, in display order
 * @throws {UnsupportedCharacterError} For a character the font lacks
 *
 * @example
 * ```typescript
 * const segments = renderText('Badger');
 * totalByteLength(segments); // 54
 * ```
 */
export function renderText(text: string, font: BadgeFont = defaultFont()): Uint8Array[] {
  const segments: Uint8Array[] = [];

  for (const character of text) {
    if (VARIATION_SELECTORS.has(character)) {
      continue;
    }
    segments.push(...font.segmentsFor(character));
  }

  return segments;
}

/**
 * Byte length of a segment sequence, as announced by DATS.
 */
export function totalByteLength(segments: readonly Uint8Array[]): number {
  return SEGMENT_SIZE * segments.length;
}

/**
 * Join segments into one upload payload.
 */
export function concatSegments(segments: readonly Uint8Array[]): Uint8Array {
  const payload = new Uint8Array(totalByteLength(segments));
  segments.forEach((segment, index) => payload.set(segment, index * SEGMENT_SIZE));
  return payload;
}
