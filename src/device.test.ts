import { describe, expect, it } from 'vitest';
import { BadgeDevice } from './device';
import { formatHex } from './encoding/hex';
import {
  BLETimeoutError,
  InvalidBlockLengthError,
  PayloadTooLargeError,
  TransferFailedError,
  ValueOutOfRangeError,
} from './exceptions';
import { Animation, ScrollMode } from './models/enums';
import { BlockCipher } from './protocol/cipher';
import { parseCommandBlock } from './protocol/commands';
import { Characteristic } from './protocol/constants';
import { MemoryTransport, badgeSimulator, encodeResponseFrame } from './transport/memory-transport';

const cipher = new BlockCipher();

function setup(options: { simulate?: boolean; ackTimeoutMs?: number } = {}) {
  const transport = new MemoryTransport({
    responder: options.simulate === false ? undefined : badgeSimulator(cipher),
  });
  const badge = new BadgeDevice(transport, { cipher, ackTimeoutMs: options.ackTimeoutMs });
  return { transport, badge };
}

function commands(transport: MemoryTransport): string[] {
  return transport.writesTo(Characteristic.COMMAND).map((packet) => {
    const { name, args } = parseCommandBlock(cipher.decrypt(packet));
    return `${name} ${formatHex(args)}`.trimEnd();
  });
}

describe('BadgeDevice', () => {
  it('sends single-block commands', async () => {
    const { transport, badge } = setup();

    await badge.powerOn();
    await badge.powerOff();
    await badge.setMode(ScrollMode.STATIC);
    await badge.setSpeed(50);
    await badge.setBrightness(255);
    await badge.playAnimation(Animation.ANIM_2);
    await badge.showImage(3);
    await badge.playImages([1, 2]);
    await badge.deleteImages([4]);

    expect(commands(transport)).toEqual([
      'LEDON',
      'LEDOFF',
      'MODE 01',
      'SPEED 32',
      'LIGHT ff',
      'ANIM 02',
      'IMAG 03',
      'PLAY 02 01 02',
      'DELE 01 04',
    ]);
  });

  it('writes the captured LEDON packet', async () => {
    const { transport, badge } = setup();
    await badge.powerOn();
    expect(formatHex(transport.writes[0].data)).toBe('eb d3 72 ed 98 85 73 17 f2 f5 4c d2 13 0f dc 9c');
  });

  it('rejects invalid arguments before writing', async () => {
    const { transport, badge } = setup();

    await expect(badge.setBrightness(256)).rejects.toThrow(ValueOutOfRangeError);
    await expect(badge.playImages(Array.from({ length: 11 }, (_, id) => id))).rejects.toThrow(
      PayloadTooLargeError
    );
    await expect(badge.sendRawPacket(new Uint8Array(15))).rejects.toThrow(InvalidBlockLengthError);

    expect(transport.writes).toHaveLength(0);
  });

  it('sends text with default settings', async () => {
    const { transport, badge } = setup();

    const result = await badge.sendText('Badger');

    expect(result).toMatchObject({ totalLength: 54, chunkCount: 4 });
    expect(transport.writesTo(Characteristic.IMAGE_UPLOAD)).toHaveLength(4);
    expect(commands(transport)).toEqual(['DATS 00 36 00 00', 'DATCP', 'MODE 03', 'SPEED 32', 'LIGHT c8']);
  });

  it('merges partial settings with the defaults', async () => {
    const { transport, badge } = setup();

    await badge.sendText('Hi', { brightness: 255 });

    expect(commands(transport).slice(-3)).toEqual(['MODE 03', 'SPEED 32', 'LIGHT ff']);
  });

  it('uploads a raw payload with explicit settings', async () => {
    const { transport, badge } = setup();

    await badge.uploadAndDisplay(new Uint8Array(9), ScrollMode.RIGHT, 96, 200);

    expect(commands(transport)).toEqual(['DATS 00 09 00 00', 'DATCP', 'MODE 04', 'SPEED 60', 'LIGHT c8']);
    expect(badge.transferState).toEqual({ kind: 'done' });
  });

  it('runs one operation at a time', async () => {
    const { transport, badge } = setup();

    await Promise.all([badge.sendText('Hi'), badge.powerOff()]);

    expect(commands(transport)).toEqual([
      'DATS 00 12 00 00',
      'DATCP',
      'MODE 03',
      'SPEED 32',
      'LIGHT c8',
      'LEDOFF',
    ]);
  });

  it('keeps working after a failed upload', async () => {
    const { transport, badge } = setup({ simulate: false, ackTimeoutMs: 10 });

    await expect(badge.sendText('Hi')).rejects.toThrow(TransferFailedError);
    await badge.powerOn();

    expect(commands(transport)).toEqual(['DATS 00 12 00 00', 'LEDON']);
  });

  it('returns the reply to CHEC', async () => {
    const { transport, badge } = setup();

    await expect(badge.checkImages()).resolves.toEqual({
      kind: 'deviceInfo',
      info: { rows: 12, columns: 48, variant: 'N' },
      token: 'STYPE12X48N',
    });
    expect(commands(transport)).toEqual(['CHEC']);
  });

  it('times out when CHEC goes unanswered', async () => {
    const { badge } = setup({ simulate: false });

    await expect(badge.checkImages(10)).rejects.toThrow(BLETimeoutError);
    await expect(badge.checkImages(10)).rejects.toThrow('No reply to CHEC within 10ms');
  });

  it('ignores a CHEC reply that arrives after its timeout', async () => {
    const { transport, badge } = setup({ simulate: false });
    await expect(badge.checkImages(10)).rejects.toThrow(BLETimeoutError);

    transport.notify(encodeResponseFrame('STYPE12X48N', cipher));
    transport.setResponder(badgeSimulator(cipher));
    await badge.uploadAndDisplay(new Uint8Array(9), ScrollMode.RIGHT, 96, 200);

    expect(commands(transport)).toEqual([
      'CHEC',
      'DATS 00 09 00 00',
      'DATCP',
      'MODE 04',
      'SPEED 60',
      'LIGHT c8',
    ]);
    expect(badge.transferState).toEqual({ kind: 'done' });
  });

  it('answers CHEC with its own reply, not a stale one', async () => {
    const { transport, badge } = setup();
    transport.notify(encodeResponseFrame('DATCPOK', cipher));

    const reply = await badge.checkImages();

    expect(reply.token).toBe('STYPE12X48N');
  });

  it('forwards raw packets unchanged', async () => {
    const { transport, badge } = setup();
    const packet = Uint8Array.from({ length: 16 }, (_, index) => index);

    await badge.sendRawPacket(packet);

    expect(transport.writes).toEqual([{ characteristic: Characteristic.COMMAND, data: packet }]);
  });
});
