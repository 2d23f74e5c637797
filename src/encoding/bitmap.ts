/**
 * Whole-display bitmaps in the badge's segment format.
 */

import { z } from 'zod';
import { ImageEncodingError } from '../exceptions';
import {
  GLYPH_HEIGHT,
  GLYPH_WIDTH,
  SEGMENT_SIZE,
  decodeGlyph,
  encodeGlyph,
  sliceSegments,
} from './glyphs';

/**
 * Encode a 12-row pixel image into concatenated 9-byte segments.
 *
 * Images whose width is not a multiple of 6 are padded on the right with
 * dark columns.
 *
 * @param grid - Pixels indexed `grid[row][column]`
 * @throws {ImageEncodingError} If the image does not have 12 rows
 */
export function encodeBitmap(grid: readonly (readonly boolean[])[]): Uint8Array {
  const segments = sliceSegments(grid).map(encodeGlyph);

  const output = new Uint8Array(segments.length * SEGMENT_SIZE);
  segments.forEach((segment, index) => output.set(segment, index * SEGMENT_SIZE));
  return output;
}

/**
 * Decode concatenated segments into a 12-row pixel image.
 *
 * @throws {ImageEncodingError} If the length is not a multiple of 9
 */
export function decodeBitmap(data: Uint8Array): boolean[][] {
  if (data.length % SEGMENT_SIZE !== 0) {
    throw new ImageEncodingError(
      `Bitmap length ${data.length} is not a multiple of ${SEGMENT_SIZE}`
    );
  }

  const grid: boolean[][] = Array.from({ length: GLYPH_HEIGHT }, () => []);
  for (let offset = 0; offset < data.length; offset += SEGMENT_SIZE) {
    const glyph = decodeGlyph(data.subarray(offset, offset + SEGMENT_SIZE));
    glyph.forEach((line, row) => grid[row].push(...line));
  }
  return grid;
}

/**
 * Text preview of a bitmap, one line per LED row.
 */
export function renderPreview(data: Uint8Array, lit = '█', dark = '.'): string {
  return decodeBitmap(data)
    .map((line) => line.map((on) => (on ? lit : dark)).join(''))
    .join('\n');
}

const imageJsonSchema = z.object({
  width: z.number().int().positive().optional(),
  height: z.literal(GLYPH_HEIGHT).optional(),
  segments: z.number().int().nonnegative().optional(),
  bytes: z.array(z.number().int().min(0).max(0xff)).min(1),
});

/**
 * Parse an image exported by the font editor:
 * `{"width": 48, "height": 12, "segments": 8, "bytes": [...]}`.
 *
 * @returns Upload payload
 * @throws {ImageEncodingError} If the JSON is invalid or inconsistent
 */
export function parseImageJson(json: string): Uint8Array {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ImageEncodingError(
      `Invalid image JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = imageJsonSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ImageEncodingError(`Invalid image JSON: ${parsed.error.message}`);
  }

  const { width, segments, bytes } = parsed.data;

  if (bytes.length % SEGMENT_SIZE !== 0) {
    throw new ImageEncodingError(
      `Image has ${bytes.length} bytes, not a multiple of ${SEGMENT_SIZE}`
    );
  }

  const segmentCount = bytes.length / SEGMENT_SIZE;
  if (segments !== undefined && segments !== segmentCount) {
    throw new ImageEncodingError(
      `Image declares ${segments} segments but carries ${segmentCount}`
    );
  }
  if (width !== undefined && width !== segmentCount * GLYPH_WIDTH) {
    throw new ImageEncodingError(
      `Image declares width ${width} but carries ${segmentCount * GLYPH_WIDTH} columns`
    );
  }

  return Uint8Array.from(bytes);
}
