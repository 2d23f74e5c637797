/**
 * Lazy access to the noble BLE central.
 *
 * noble opens the Bluetooth adapter when first required, so it is only
 * loaded once something actually needs the radio.
 */

import type { Peripheral } from '@abandonware/noble';
import { BLEConnectionError, BLETimeoutError } from '../exceptions';

export type Noble = typeof import('@abandonware/noble');

let loading: Promise<Noble> | null = null;

/**
 * Load noble on first use.
 *
 * @throws {BLEConnectionError} If noble or the adapter bindings are unavailable
 */
export function loadNoble(): Promise<Noble> {
  if (!loading) {
    loading = import('@abandonware/noble').then(
      (module: Noble & { default?: Noble }) => module.default ?? module,
      (error: unknown) => {
        loading = null;
        throw new BLEConnectionError('Bluetooth support is unavailable', { cause: error });
      }
    );
  }
  return loading;
}

/**
 * Wait until the adapter reports `poweredOn`.
 *
 * @throws {BLETimeoutError} If the adapter does not come up in time
 */
export async function waitForPoweredOn(noble: Noble, timeoutMs: number): Promise<void> {
  if (noble.state === 'poweredOn') {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const onStateChange = (state: string): void => {
      if (state === 'poweredOn') {
        clearTimeout(timer);
        noble.removeListener('stateChange', onStateChange);
        resolve();
      }
    };
    const timer = setTimeout(() => {
      noble.removeListener('stateChange', onStateChange);
      reject(new BLETimeoutError(`Bluetooth adapter not ready (state: ${noble.state})`));
    }, timeoutMs);

    noble.on('stateChange', onStateChange);
  });
}

/**
 * Scan until `onDiscover` returns true or the timeout passes.
 */
export async function scan(
  noble: Noble,
  timeoutMs: number,
  onDiscover: (peripheral: Peripheral) => boolean
): Promise<void> {
  await waitForPoweredOn(noble, timeoutMs);

  let onPeripheral = (_peripheral: Peripheral): void => {};
  const finished = new Promise<void>((resolve) => {
    const timer = setTimeout(resolve, timeoutMs);
    onPeripheral = (peripheral) => {
      if (onDiscover(peripheral)) {
        clearTimeout(timer);
        resolve();
      }
    };
  });

  noble.on('discover', onPeripheral);
  try {
    await noble.startScanningAsync([], false);
    await finished;
  } finally {
    noble.removeListener('discover', onPeripheral);
    await noble.stopScanningAsync();
  }
}

/**
 * Normalize a UUID to noble's form: lowercase hex without dashes.
 */
export function toNobleUuid(uuid: string): string {
  return uuid.replace(/-/g, '').toLowerCase();
}
