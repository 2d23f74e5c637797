import { describe, expect, it } from 'vitest';
import { EncodingError } from '../exceptions';
import { formatHex, parseHex } from './hex';

describe('parseHex', () => {
  it('ignores separators and a 0x prefix', () => {
    expect(parseHex('0x0a:0B-ff 10')).toEqual(Uint8Array.of(0x0a, 0x0b, 0xff, 0x10));
  });

  it('rejects odd digit counts and non-hex text', () => {
    expect(() => parseHex('abc')).toThrow(EncodingError);
    expect(() => parseHex('zz')).toThrow(EncodingError);
  });
});

describe('formatHex', () => {
  it('writes lowercase pairs separated by spaces', () => {
    expect(formatHex(Uint8Array.of(0, 0x4c, 0xff))).toBe('00 4c ff');
  });
});
