/**
 * Main badge device class.
 */

import { BLEConnectionError, BLETimeoutError, InvalidBlockLengthError } from './exceptions';
import { concatSegments, renderText, type BadgeFont } from './encoding/text';
import { Animation, ScrollMode } from './models/enums';
import { DEFAULT_DISPLAY_SETTINGS, type DisplaySettings } from './models/settings';
import { BlockCipher } from './protocol/cipher';
import { encodeCommand, type BadgeCommand } from './protocol/commands';
import { BLOCK_SIZE, Characteristic, CommandName } from './protocol/constants';
import { decodeNotification, type BadgeResponse } from './protocol/responses';
import { NotificationReader } from './transfer/notification-reader';
import {
  TransferStateMachine,
  type TransferResult,
  type TransferState,
  type UploadOptions,
} from './transfer/state-machine';
import type { BadgeTransport } from './transport/transport';

export interface BadgeDeviceOptions {
  /** Cipher holding the badge key; defaults to the standard badge key */
  cipher?: BlockCipher;

  /** Deadline for DATSOK, DATCPOK and CHEC replies */
  ackTimeoutMs?: number;

  /** Called on every upload state change */
  onStateChange?: (state: TransferState, previous: TransferState) => void;
}

/**
 * LED name badge.
 *
 * Main API for controlling a badge over a connected transport. Operations
 * run one at a time: a call made while another is in flight waits for it.
 *
 * @example
 * ```typescript
 * const transport = await NobleTransport.connect('AA:BB:CC:DD:EE:FF');
 * const badge = new BadgeDevice(transport);
 * await badge.sendText('Hello', { mode: ScrollMode.LEFT });
 * await badge.setBrightness(128);
 * ```
 */
export class BadgeDevice {
  static readonly TIMEOUT_ACK = 5000; // DATSOK, DATCPOK and CHEC replies

  private readonly cipher: BlockCipher;
  private readonly reader: NotificationReader;
  private readonly machine: TransferStateMachine;
  private readonly ackTimeoutMs: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly transport: BadgeTransport,
    options: BadgeDeviceOptions = {}
  ) {
    this.cipher = options.cipher ?? new BlockCipher();
    this.ackTimeoutMs = options.ackTimeoutMs ?? BadgeDevice.TIMEOUT_ACK;
    this.reader = new NotificationReader(transport);
    this.machine = new TransferStateMachine(transport, {
      cipher: this.cipher,
      ackTimeoutMs: this.ackTimeoutMs,
      reader: this.reader,
      onStateChange: options.onStateChange,
    });
  }

  /**
   * State of the current or last upload.
   */
  get transferState(): TransferState {
    return this.machine.state;
  }

  /**
   * Turn the display on.
   */
  async powerOn(): Promise<void> {
    await this.sendCommand({ name: CommandName.LEDON });
  }

  /**
   * Turn the display off. Stored content is kept.
   */
  async powerOff(): Promise<void> {
    await this.sendCommand({ name: CommandName.LEDOFF });
  }

  async setMode(mode: ScrollMode | number): Promise<void> {
    await this.sendCommand({ name: CommandName.MODE, mode });
  }

  /**
   * @param speed - Scroll speed, 0-255
   */
  async setSpeed(speed: number): Promise<void> {
    await this.sendCommand({ name: CommandName.SPEED, speed });
  }

  /**
   * @param level - Brightness, 0-255
   */
  async setBrightness(level: number): Promise<void> {
    await this.sendCommand({ name: CommandName.LIGHT, level });
  }

  /**
   * Upload a bitmap and show it with the given settings.
   *
   * @param payload - Concatenated 9-byte glyph segments
   * @throws {EncodingError} If the payload or a setting cannot be encoded
   * @throws {TransferFailedError} If the badge does not complete the upload
   */
  async uploadAndDisplay(
    payload: Uint8Array,
    mode: ScrollMode | number = DEFAULT_DISPLAY_SETTINGS.mode,
    speed: number = DEFAULT_DISPLAY_SETTINGS.speed,
    brightness: number = DEFAULT_DISPLAY_SETTINGS.brightness,
    options: UploadOptions = {}
  ): Promise<TransferResult> {
    return this.exclusive(() =>
      this.machine.beginUpload(payload, { mode, speed, brightness }, options)
    );
  }

  /**
   * Render text with a bit-packed font and upload it.
   *
   * @param text - Text to show
   * @param settings - Display settings; missing fields use the defaults
   * @param font - Font to render with; defaults to the bundled font
   * @throws {UnsupportedCharacterError} If the font lacks a character
   *
   * @example
   * ```typescript
   * await badge.sendText('Badger', { mode: ScrollMode.STATIC, brightness: 255 });
   * ```
   */
  async sendText(
    text: string,
    settings: Partial<DisplaySettings> = {},
    font?: BadgeFont,
    options: UploadOptions = {}
  ): Promise<TransferResult> {
    const payload = concatSegments(renderText(text, font));
    const { mode, speed, brightness } = { ...DEFAULT_DISPLAY_SETTINGS, ...settings };

    console.log(`Sending text "${text}" (${payload.length} bytes)`);
    return this.uploadAndDisplay(payload, mode, speed, brightness, options);
  }

  /**
   * Play one of the animations built into the firmware.
   */
  async playAnimation(animation: Animation | number): Promise<void> {
    await this.sendCommand({ name: CommandName.ANIM, animation });
  }

  /**
   * Show an image stored on the badge.
   */
  async showImage(imageId: number): Promise<void> {
    await this.sendCommand({ name: CommandName.IMAG, imageId });
  }

  /**
   * Cycle through stored images (at most 10 ids).
   */
  async playImages(imageIds: readonly number[]): Promise<void> {
    await this.sendCommand({ name: CommandName.PLAY, imageIds });
  }

  /**
   * Delete stored images (at most 10 ids).
   */
  async deleteImages(imageIds: readonly number[]): Promise<void> {
    await this.sendCommand({ name: CommandName.DELE, imageIds });
  }

  /**
   * Ask the badge about its stored images and wait for its reply.
   *
   * @returns The decoded reply; badges seen so far answer with their
   *   display type (`STYPE12X48N`)
   * @throws {BLETimeoutError} If no reply arrives within the ack timeout
   */
  async checkImages(timeoutMs: number = this.ackTimeoutMs): Promise<BadgeResponse> {
    const packet = encodeCommand({ name: CommandName.CHEC }, this.cipher);

    return this.exclusive(async () => {
      await this.reader.discardPending();
      await this.transport.write(Characteristic.COMMAND, packet);
      const outcome = await this.reader.next(timeoutMs);

      switch (outcome.kind) {
        case 'frame':
          return decodeNotification(outcome.frame, this.cipher);
        case 'timeout':
        case 'cancelled':
          throw new BLETimeoutError(`No reply to CHEC within ${timeoutMs}ms`);
        case 'error':
          throw new BLEConnectionError('Notification stream failed', { cause: outcome.error });
        case 'ended':
          throw new BLEConnectionError('Notification stream ended');
      }
    });
  }

  /**
   * Write an already encrypted 16-byte packet to the COMMAND characteristic.
   */
  async sendRawPacket(packet: Uint8Array): Promise<void> {
    if (packet.length !== BLOCK_SIZE) {
      throw new InvalidBlockLengthError(packet.length);
    }
    await this.exclusive(() => this.transport.write(Characteristic.COMMAND, packet));
  }

  private async sendCommand(command: BadgeCommand): Promise<void> {
    const packet = encodeCommand(command, this.cipher);
    console.debug(`Sending ${command.name}`);
    await this.exclusive(() => this.transport.write(Characteristic.COMMAND, packet));
  }

  /**
   * Run an operation once every earlier one has settled.
   */
  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
