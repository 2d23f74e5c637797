import { describe, expect, it } from 'vitest';
import { ImageEncodingError } from '../exceptions';
import {
  GLYPH_HEIGHT,
  GLYPH_WIDTH,
  decodeGlyph,
  encodeGlyph,
  formatPixelRows,
  parsePixelRows,
  sliceSegments,
} from './glyphs';
import { formatHex } from './hex';

const LETTER_B = [
  '......',
  '......',
  '####..',
  '#...#.',
  '#...#.',
  '####..',
  '#...#.',
  '#...#.',
  '####..',
  '......',
  '......',
  '......',
];

function blank(): boolean[][] {
  return Array.from({ length: GLYPH_HEIGHT }, () => new Array<boolean>(GLYPH_WIDTH).fill(false));
}

describe('encodeGlyph', () => {
  it('packs a glyph into the documented byte layout', () => {
    expect(formatHex(encodeGlyph(parsePixelRows(LETTER_B)))).toBe('3f 88 24 24 88 24 1b 00 00');
  });

  it('puts the top row in the most significant bit', () => {
    const grid = blank();
    grid[0][0] = true;
    expect(formatHex(encodeGlyph(grid))).toBe('80 00 00 00 00 00 00 00 00');
  });

  it('packs rows 8-11 of even columns into the high nibble', () => {
    const grid = blank();
    grid[8][2] = true;
    grid[11][2] = true;
    expect(formatHex(encodeGlyph(grid))).toBe('00 00 00 00 90 00 00 00 00');
  });

  it('packs rows 8-11 of odd columns into the low nibble', () => {
    const grid = blank();
    grid[8][5] = true;
    grid[10][5] = true;
    expect(formatHex(encodeGlyph(grid))).toBe('00 00 00 00 00 00 00 0a 00');
  });

  it('rejects grids of the wrong shape', () => {
    expect(() => encodeGlyph(blank().slice(1))).toThrow(ImageEncodingError);
    const wide = blank();
    wide[3].push(false);
    expect(() => encodeGlyph(wide)).toThrow('Glyph row 3 must have 6 columns, got 7');
  });
});

describe('decodeGlyph', () => {
  it('inverts encodeGlyph', () => {
    const segment = encodeGlyph(parsePixelRows(LETTER_B));
    expect(formatPixelRows(decodeGlyph(segment))).toEqual(LETTER_B);
  });

  it('round-trips a pseudo-random pattern', () => {
    let seed = 0x2f;
    const grid = blank().map((line) =>
      line.map(() => {
        seed = (seed * 73 + 41) % 257;
        return seed % 3 === 0;
      })
    );
    expect(decodeGlyph(encodeGlyph(grid))).toEqual(grid);
  });

  it('lights every pixel for an all-ones segment', () => {
    const segment = new Uint8Array(9).fill(0xff);
    expect(decodeGlyph(segment).every((line) => line.every(Boolean))).toBe(true);
  });

  it('rejects segments that are not 9 bytes', () => {
    expect(() => decodeGlyph(new Uint8Array(8))).toThrow(ImageEncodingError);
  });
});

describe('parsePixelRows', () => {
  it('rejects ragged rows', () => {
    expect(() => parsePixelRows(['#..', '#.'])).toThrow('Row 1 has 2 columns, expected 3');
  });

  it('rejects characters other than # and .', () => {
    expect(() => parsePixelRows(['#x.'])).toThrow(ImageEncodingError);
  });
});

describe('sliceSegments', () => {
  it('cuts wide images into 6-column slices and pads the last one', () => {
    const rows = Array.from({ length: GLYPH_HEIGHT }, () => '########');
    const slices = sliceSegments(parsePixelRows(rows));

    expect(slices).toHaveLength(2);
    expect(formatPixelRows(slices[0])[0]).toBe('######');
    expect(formatPixelRows(slices[1])[0]).toBe('##....');
  });

  it('requires 12 rows', () => {
    expect(() => sliceSegments(parsePixelRows(['######']))).toThrow('Image must have 12 rows, got 1');
  });
});
