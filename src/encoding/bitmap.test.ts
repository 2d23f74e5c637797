import { describe, expect, it } from 'vitest';
import { ImageEncodingError } from '../exceptions';
import { decodeBitmap, encodeBitmap, parseImageJson, renderPreview } from './bitmap';
import { formatPixelRows, parsePixelRows } from './glyphs';
import { renderText, concatSegments } from './text';

describe('encodeBitmap', () => {
  it('pads the width to whole segments', () => {
    const rows = Array.from({ length: 12 }, (_, row) => (row === 0 ? '#######' : '.......'));
    const data = encodeBitmap(parsePixelRows(rows));

    expect(data).toHaveLength(18);
    expect(data[0]).toBe(0x80);
    expect(data[9]).toBe(0x80);
    expect(data[11]).toBe(0x00);
  });

  it('matches text rendering for the same pixels', () => {
    const text = concatSegments(renderText('Hi'));
    expect(encodeBitmap(decodeBitmap(text))).toEqual(text);
  });
});

describe('decodeBitmap', () => {
  it('joins segments side by side', () => {
    const grid = decodeBitmap(concatSegments(renderText('B!')));
    expect(grid).toHaveLength(12);
    expect(formatPixelRows(grid)[2]).toBe('####....#...');
  });

  it('rejects lengths that are not a multiple of 9', () => {
    expect(() => decodeBitmap(new Uint8Array(10))).toThrow(ImageEncodingError);
  });
});

describe('renderPreview', () => {
  it('draws one line per LED row', () => {
    const preview = renderPreview(concatSegments(renderText('B')), '#', ' ');
    expect(preview.split('\n')).toEqual([
      '      ',
      '      ',
      '####  ',
      '#   # ',
      '#   # ',
      '####  ',
      '#   # ',
      '#   # ',
      '####  ',
      '      ',
      '      ',
      '      ',
    ]);
  });
});

describe('parseImageJson', () => {
  const nine = [0x3f, 0x88, 0x24, 0x24, 0x88, 0x24, 0x1b, 0x00, 0x00];

  it('returns the payload bytes', () => {
    const json = JSON.stringify({ width: 6, height: 12, segments: 1, bytes: nine });
    expect(parseImageJson(json)).toEqual(Uint8Array.from(nine));
  });

  it('accepts a bare bytes array', () => {
    expect(parseImageJson(JSON.stringify({ bytes: [...nine, ...nine] }))).toHaveLength(18);
  });

  it('rejects a segment count that does not match the bytes', () => {
    const json = JSON.stringify({ segments: 2, bytes: nine });
    expect(() => parseImageJson(json)).toThrow('Image declares 2 segments but carries 1');
  });

  it('rejects a width that does not match the bytes', () => {
    const json = JSON.stringify({ width: 12, bytes: nine });
    expect(() => parseImageJson(json)).toThrow('Image declares width 12 but carries 6 columns');
  });

  it('rejects partial segments', () => {
    expect(() => parseImageJson(JSON.stringify({ bytes: [1, 2, 3] }))).toThrow(
      'Image has 3 bytes, not a multiple of 9'
    );
  });

  it('rejects values outside a byte', () => {
    expect(() => parseImageJson(JSON.stringify({ bytes: [...nine.slice(1), 256] }))).toThrow(
      ImageEncodingError
    );
  });

  it('rejects invalid JSON', () => {
    expect(() => parseImageJson('{bytes:')).toThrow(ImageEncodingError);
  });
});
