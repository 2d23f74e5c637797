/**
 * Bit layout of one glyph segment.
 *
 * A segment is 6 columns × 12 rows packed into 9 bytes:
 *
 * | byte | contents                                     |
 * |------|----------------------------------------------|
 * | 0    | column 0, rows 0-7                           |
 * | 1    | column 0 rows 8-11 (high) / column 1 (low)   |
 * | 2    | column 1, rows 0-7                           |
 * | 3    | column 2, rows 0-7                           |
 * | 4    | column 2 rows 8-11 (high) / column 3 (low)   |
 * | 5    | column 3, rows 0-7                           |
 * | 6    | column 4, rows 0-7                           |
 * | 7    | column 4 rows 8-11 (high) / column 5 (low)   |
 * | 8    | column 5, rows 0-7                           |
 *
 * The top row is always the most significant bit.
 */

import { ImageEncodingError } from '../exceptions';
import type { GlyphGrid } from '../models/glyph';

export const GLYPH_WIDTH = 6;
export const GLYPH_HEIGHT = 12;
export const SEGMENT_SIZE = 9;

const UPPER_ROWS = 8;

/** Byte holding rows 0-7 of each column */
const UPPER_BYTE = [0, 2, 3, 5, 6, 8] as const;

/** Byte holding rows 8-11 of each column (shared by column pairs) */
const LOWER_BYTE = [1, 1, 4, 4, 7, 7] as const;

const LIT = '#';
const DARK = '.';

/**
 * Encode a 6×12 glyph grid into its 9-byte segment.
 *
 * @throws {ImageEncodingError} If the grid is not 12 rows of 6 columns
 */
export function encodeGlyph(grid: GlyphGrid): Uint8Array {
  assertGridShape(grid);

  const segment = new Uint8Array(SEGMENT_SIZE);

  for (let col = 0; col < GLYPH_WIDTH; col++) {
    let upper = 0;
    for (let row = 0; row < UPPER_ROWS; row++) {
      if (grid[row][col]) {
        upper |= 1 << (7 - row);
      }
    }
    segment[UPPER_BYTE[col]] = upper;

    let nibble = 0;
    for (let row = UPPER_ROWS; row < GLYPH_HEIGHT; row++) {
      if (grid[row][col]) {
        nibble |= 1 << (GLYPH_HEIGHT - 1 - row);
      }
    }
    // Even columns take the high nibble of the shared byte
    segment[LOWER_BYTE[col]] |= col % 2 === 0 ? nibble << 4 : nibble;
  }

  return segment;
}

/**
 * Decode a 9-byte segment back into its glyph grid.
 *
 * @throws {ImageEncodingError} If the segment is not 9 bytes
 */
export function decodeGlyph(segment: Uint8Array): GlyphGrid {
  if (segment.length !== SEGMENT_SIZE) {
    throw new ImageEncodingError(
      `Glyph segment must be ${SEGMENT_SIZE} bytes, got ${segment.length}`
    );
  }

  const grid: GlyphGrid = [];
  for (let row = 0; row < GLYPH_HEIGHT; row++) {
    const line: boolean[] = [];
    for (let col = 0; col < GLYPH_WIDTH; col++) {
      line.push(isPixelLit(segment, row, col));
    }
    grid.push(line);
  }
  return grid;
}

function isPixelLit(segment: Uint8Array, row: number, col: number): boolean {
  if (row < UPPER_ROWS) {
    return ((segment[UPPER_BYTE[col]] >> (7 - row)) & 1) === 1;
  }
  const shift = (col % 2 === 0 ? 7 : 3) - (row - UPPER_ROWS);
  return ((segment[LOWER_BYTE[col]] >> shift) & 1) === 1;
}

function assertGridShape(grid: GlyphGrid): void {
  if (grid.length !== GLYPH_HEIGHT) {
    throw new ImageEncodingError(
      `Glyph must have ${GLYPH_HEIGHT} rows, got ${grid.length}`
    );
  }
  grid.forEach((line, row) => {
    if (line.length !== GLYPH_WIDTH) {
      throw new ImageEncodingError(
        `Glyph row ${row} must have ${GLYPH_WIDTH} columns, got ${line.length}`
      );
    }
  });
}

/**
 * Parse `#`/`.` row strings into a pixel grid of any width.
 *
 * @throws {ImageEncodingError} On ragged rows or other characters
 */
export function parsePixelRows(rows: readonly string[]): boolean[][] {
  const width = rows[0]?.length ?? 0;

  return rows.map((line, row) => {
    if (line.length !== width) {
      throw new ImageEncodingError(
        `Row ${row} has ${line.length} columns, expected ${width}`
      );
    }
    return [...line].map((pixel, col) => {
      if (pixel !== LIT && pixel !== DARK) {
        throw new ImageEncodingError(
          `Unexpected pixel ${JSON.stringify(pixel)} at row ${row}, column ${col}`
        );
      }
      return pixel === LIT;
    });
  });
}

/**
 * Format a pixel grid as `#`/`.` row strings.
 */
export function formatPixelRows(grid: readonly (readonly boolean[])[]): string[] {
  return grid.map((line) => line.map((lit) => (lit ? LIT : DARK)).join(''));
}

/**
 * Cut a 12-row pixel grid into 6-column glyph grids, left to right.
 * The last slice is padded with dark columns.
 */
export function sliceSegments(grid: readonly (readonly boolean[])[]): GlyphGrid[] {
  if (grid.length !== GLYPH_HEIGHT) {
    throw new ImageEncodingError(
      `Image must have ${GLYPH_HEIGHT} rows, got ${grid.length}`
    );
  }

  const width = grid[0].length;
  const count = Math.ceil(width / GLYPH_WIDTH);
  const slices: GlyphGrid[] = [];

  for (let segment = 0; segment < count; segment++) {
    const start = segment * GLYPH_WIDTH;
    slices.push(
      grid.map((line) => {
        const columns = line.slice(start, start + GLYPH_WIDTH);
        while (columns.length < GLYPH_WIDTH) {
          columns.push(false);
        }
        return columns;
      })
    );
  }

  return slices;
}
