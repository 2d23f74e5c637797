/**
 * BLE link to a badge over noble.
 *
 * Provides:
 * - Connection by address or peripheral id
 * - Serialized characteristic writes
 * - Queued NOTIFY frames
 */

import type { Characteristic as GattCharacteristic, Peripheral } from '@abandonware/noble';
import { findBadgePeripheral, DEFAULT_SCAN_TIMEOUT_MS } from '../discovery';
import { BLEConnectionError } from '../exceptions';
import { Characteristic, SERVICE_UUID } from '../protocol/constants';
import { NotificationQueue } from './notification-queue';
import { toNobleUuid } from './noble';
import type { BadgeTransport, WritableCharacteristic } from './transport';

export interface NobleTransportOptions {
  /** How long to scan for the badge before giving up */
  scanTimeoutMs?: number;
}

/**
 * Noble-backed {@link BadgeTransport}.
 *
 * COMMAND writes ask for a write response; IMAGE_UPLOAD writes do not,
 * which keeps chunk streaming fast.
 *
 * @example
 * ```typescript
 * const transport = await NobleTransport.connect('AA:BB:CC:DD:EE:FF');
 * const badge = new BadgeDevice(transport);
 * await badge.sendText('Hello');
 * await transport.disconnect();
 * ```
 */
export class NobleTransport implements BadgeTransport {
  private readonly queue = new NotificationQueue();
  private readonly characteristics = new Map<string, GattCharacteristic>();
  private writeChain: Promise<void> = Promise.resolve();
  private connected = false;
  private readonly onDisconnect = (): void => {
    this.connected = false;
    console.log(`Badge ${this.peripheral.id} disconnected`);
    this.queue.clear('Badge disconnected');
  };

  private constructor(private readonly peripheral: Peripheral) {}

  /**
   * Scan for a badge and connect to it.
   *
   * @param target - MAC address or peripheral id, or an already discovered peripheral
   * @throws {BLEConnectionError} If the badge is not found or lacks the badge service
   */
  static async connect(
    target: string | Peripheral,
    options: NobleTransportOptions = {}
  ): Promise<NobleTransport> {
    const peripheral =
      typeof target === 'string'
        ? await findBadgePeripheral(target, options.scanTimeoutMs ?? DEFAULT_SCAN_TIMEOUT_MS)
        : target;

    const transport = new NobleTransport(peripheral);
    await transport.open();
    return transport;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get id(): string {
    return this.peripheral.id;
  }

  private async open(): Promise<void> {
    try {
      await this.peripheral.connectAsync();
      this.connected = true;
      this.peripheral.once('disconnect', this.onDisconnect);

      const { characteristics } =
        await this.peripheral.discoverSomeServicesAndCharacteristicsAsync(
          [toNobleUuid(SERVICE_UUID)],
          Object.values(Characteristic).map(toNobleUuid)
        );
      for (const characteristic of characteristics) {
        this.characteristics.set(characteristic.uuid, characteristic);
      }

      const notify = this.require(Characteristic.NOTIFY);
      this.require(Characteristic.COMMAND);
      this.require(Characteristic.IMAGE_UPLOAD);

      notify.on('data', (data: Buffer) => {
        this.queue.enqueue(Uint8Array.from(data));
      });
      await notify.subscribeAsync();
    } catch (error) {
      await this.disconnect();
      if (error instanceof BLEConnectionError) {
        throw error;
      }
      throw new BLEConnectionError(`Failed to connect to badge ${this.peripheral.id}`, {
        cause: error,
      });
    }

    console.log(`Connected to badge ${this.peripheral.advertisement.localName ?? this.peripheral.id}`);
  }

  async write(characteristic: WritableCharacteristic, data: Uint8Array): Promise<void> {
    const withoutResponse = characteristic === Characteristic.IMAGE_UPLOAD;
    const gatt = this.require(characteristic);

    const write = this.writeChain.then(async () => {
      if (!this.connected) {
        throw new BLEConnectionError('Not connected to badge');
      }
      try {
        await gatt.writeAsync(Buffer.from(data), withoutResponse);
      } catch (error) {
        throw new BLEConnectionError(`Write to ${characteristic} failed`, { cause: error });
      }
    });

    // Later writes queue behind this one whether or not it succeeds
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  notifications(): AsyncIterable<Uint8Array> {
    return this.queue.stream();
  }

  /**
   * Disconnect and reject anything still waiting for a notification.
   */
  async disconnect(): Promise<void> {
    this.peripheral.removeListener('disconnect', this.onDisconnect);
    this.queue.clear('Disconnected');
    if (this.connected) {
      this.connected = false;
      await this.peripheral.disconnectAsync();
    }
  }

  private require(characteristic: Characteristic): GattCharacteristic {
    const gatt = this.characteristics.get(toNobleUuid(characteristic));
    if (!gatt) {
      throw new BLEConnectionError(`Badge does not expose characteristic ${characteristic}`);
    }
    return gatt;
  }
}
