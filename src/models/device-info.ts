/**
 * Device type report sent by the badge (`STYPE12X48N`).
 */
export interface DeviceInfo {
  /** LED rows */
  rows: number;

  /** LED columns */
  columns: number;

  /** Trailing model suffix, not interpreted */
  variant: string;
}
