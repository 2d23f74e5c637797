/**
 * Glyph and font data structures.
 */

/**
 * Pixel grid of one 6×12 glyph segment, indexed `grid[row][column]`.
 */
export type GlyphGrid = boolean[][];

/**
 * Font as stored on disk: each glyph is 12 rows of `#` (lit) and `.`
 * (dark), 6 columns per segment. Wide glyphs use rows of 12, 18, ... columns.
 */
export interface FontDefinition {
  name: string;
  height: number;
  glyphs: Record<string, string[]>;
}
