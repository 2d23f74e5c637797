import { describe, expect, it } from 'vitest';
import { MalformedFrameError, UnexpectedResponseError } from '../exceptions';
import { parseHex } from '../encoding/hex';
import { BlockCipher } from './cipher';
import {
  AckKind,
  classifyToken,
  decodeNotification,
  expectAck,
  extractCiphertext,
  parseToken,
} from './responses';

// Notifications captured from a 12x48 badge
const DEVICE_TYPE = '23663db1dd91971c88cde4642796107c';
const DATSOK_WITH_STALE_BYTES = 'efc06dd3b73de903702bd2aa7fced35f';
const ERROR_00 = 'e041372d21ca14d912ba49fbb8c504cc';
const DATCPOK = 'b7882dabe2536709ab8cddb9d5673189';

// Encrypted "HELLO"
const HELLO = 'f3da461114fee447b81bd4210328c446';

function framed(ciphertext: string, type = 0x01, trailer = 0x00): Uint8Array {
  const frame = new Uint8Array(19);
  frame[0] = 18;
  frame[1] = type;
  frame.set(parseHex(ciphertext), 2);
  frame[18] = trailer;
  return frame;
}

describe('decodeNotification', () => {
  const cipher = new BlockCipher();

  it('reads DATSOK despite stale bytes after the token', () => {
    expect(decodeNotification(parseHex(DATSOK_WITH_STALE_BYTES), cipher)).toEqual({
      kind: 'ack',
      ack: AckKind.DATS,
      token: 'DATSOK',
    });
  });

  it('reads DATCPOK', () => {
    expect(decodeNotification(parseHex(DATCPOK), cipher)).toEqual({
      kind: 'ack',
      ack: AckKind.DATCP,
      token: 'DATCPOK',
    });
  });

  it('reads an error reply with its code', () => {
    expect(decodeNotification(parseHex(ERROR_00), cipher)).toEqual({
      kind: 'error',
      code: '00',
      token: 'ERROR00',
    });
  });

  it('reads the device type reply', () => {
    expect(decodeNotification(parseHex(DEVICE_TYPE), cipher)).toEqual({
      kind: 'deviceInfo',
      info: { rows: 12, columns: 48, variant: 'N' },
      token: 'STYPE12X48N',
    });
  });

  it('reports other tokens as unexpected', () => {
    expect(decodeNotification(parseHex(HELLO), cipher)).toEqual({
      kind: 'unexpected',
      token: 'HELLO',
    });
  });

  it('accepts the framed 19-byte form regardless of type and trailer bytes', () => {
    expect(decodeNotification(framed(DATCPOK, 0x7f, 0xee), cipher)).toEqual({
      kind: 'ack',
      ack: AckKind.DATCP,
      token: 'DATCPOK',
    });
  });

  it('rejects a block whose length prefix exceeds 15', () => {
    // [0x10]DATSOK...
    expect(() => decodeNotification(parseHex('c3e2a71cbc1a8d62774ca41a26444646'), cipher)).toThrow(
      MalformedFrameError
    );
  });
});

describe('extractCiphertext', () => {
  it('returns a bare 16-byte frame unchanged', () => {
    const frame = parseHex(DATCPOK);
    expect(extractCiphertext(frame)).toBe(frame);
  });

  it('slices bytes 2-17 of a framed notification', () => {
    expect(extractCiphertext(framed(HELLO))).toEqual(parseHex(HELLO));
  });

  it('rejects a framed notification with a wrong length byte', () => {
    const frame = framed(HELLO);
    frame[0] = 17;
    expect(() => extractCiphertext(frame)).toThrow('Frame length byte 17 does not match 18');
  });

  it.each([0, 15, 17, 18, 20])('rejects %i-byte frames', (length) => {
    expect(() => extractCiphertext(new Uint8Array(length))).toThrow(MalformedFrameError);
  });
});

describe('parseToken', () => {
  it('strips zero padding inside the announced length', () => {
    const block = new Uint8Array(16);
    block.set([7, 0x44, 0x41, 0x54, 0x53, 0x4f, 0x4b, 0x00, 0x58]);
    expect(parseToken(block)).toBe('DATSOK');
  });

  it('returns an empty token for length zero', () => {
    expect(parseToken(new Uint8Array(16))).toBe('');
  });
});

describe('classifyToken', () => {
  it('requires exact ack tokens', () => {
    expect(classifyToken('DATSOKAY')).toEqual({ kind: 'unexpected', token: 'DATSOKAY' });
    expect(classifyToken('datsok')).toEqual({ kind: 'unexpected', token: 'datsok' });
  });

  it('accepts an error without a code', () => {
    expect(classifyToken('ERROR')).toEqual({ kind: 'error', code: '', token: 'ERROR' });
  });
});

describe('expectAck', () => {
  it('passes the awaited ack', () => {
    expect(() => expectAck(classifyToken('DATSOK'), AckKind.DATS)).not.toThrow();
  });

  it('throws for any other response', () => {
    expect(() => expectAck(classifyToken('DATCPOK'), AckKind.DATS)).toThrow(UnexpectedResponseError);
    expect(() => expectAck(classifyToken('ERROR00'), AckKind.DATS)).toThrow(
      'Expected DATSOK, badge replied "ERROR00"'
    );
  });
});
