/**
 * BLE discovery for LED name badges.
 */

import type { Peripheral } from '@abandonware/noble';
import { BLEConnectionError } from './exceptions';
import { loadNoble, scan } from './transport/noble';

/**
 * Advertised names of known badge models.
 */
export const DEFAULT_NAME_PATTERN = /LED|BADGE|DSD/i;

export const DEFAULT_SCAN_TIMEOUT_MS = 10000;

export interface DiscoveredBadge {
  /** MAC address; empty on platforms that hide it (macOS) */
  address: string;

  /** Platform peripheral id, usable where no address is exposed */
  id: string;

  name: string | undefined;

  rssi: number;
}

export interface DiscoveryOptions {
  timeoutMs?: number;

  /** Name filter; defaults to {@link DEFAULT_NAME_PATTERN} */
  namePattern?: RegExp;

  /** Report every peripheral, named or not */
  all?: boolean;
}

/**
 * Scan for nearby badges.
 *
 * @returns Badges seen during the scan, strongest signal first
 * @throws {BLEConnectionError} If Bluetooth is unavailable
 *
 * @example
 * ```typescript
 * const badges = await discoverBadges({ timeoutMs: 5000 });
 * console.log(badges.map((badge) => `${badge.name} ${badge.address}`));
 * ```
 */
export async function discoverBadges(options: DiscoveryOptions = {}): Promise<DiscoveredBadge[]> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_SCAN_TIMEOUT_MS;
  const namePattern = options.namePattern ?? DEFAULT_NAME_PATTERN;
  const found = new Map<string, DiscoveredBadge>();

  const noble = await loadNoble();
  await scan(noble, timeoutMs, (peripheral) => {
    const badge = describePeripheral(peripheral);
    if (options.all || (badge.name !== undefined && namePattern.test(badge.name))) {
      found.set(badge.id, badge);
    }
    return false;
  });

  const badges = [...found.values()].sort((a, b) => b.rssi - a.rssi);
  console.log(`Found ${badges.length} badge(s)`);
  return badges;
}

/**
 * Scan until the peripheral with the given address or id shows up.
 *
 * @throws {BLEConnectionError} If it is not seen before the timeout
 */
export async function findBadgePeripheral(
  target: string,
  timeoutMs: number = DEFAULT_SCAN_TIMEOUT_MS
): Promise<Peripheral> {
  const wanted = target.toLowerCase();
  const matches: Peripheral[] = [];

  const noble = await loadNoble();
  await scan(noble, timeoutMs, (peripheral) => {
    if (matchesTarget(peripheral, wanted)) {
      matches.push(peripheral);
      return true;
    }
    return false;
  });

  const [match] = matches;
  if (!match) {
    throw new BLEConnectionError(`Badge ${target} not found within ${timeoutMs}ms`);
  }
  return match;
}

export function describePeripheral(peripheral: Peripheral): DiscoveredBadge {
  return {
    address: peripheral.address,
    id: peripheral.id,
    name: peripheral.advertisement.localName || undefined,
    rssi: peripheral.rssi,
  };
}

function matchesTarget(peripheral: Peripheral, wanted: string): boolean {
  return peripheral.address.toLowerCase() === wanted || peripheral.id.toLowerCase() === wanted;
}
