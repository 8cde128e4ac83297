/**
 * Device status reported by the earbuds.
 */

import { DeviceStatusFlag } from './enums';

export interface DeviceStatus {
  /**
   * Battery percentages; undefined when the channel is not reported
   */
  batteryLeft?: number;
  batteryRight?: number;
  batteryCase?: number;

  /**
   * Bitmask of DeviceStatusFlag
   */
  flags: number;

  /**
   * Installed firmware build string
   */
  firmwareVersion?: string;
}

/**
 * Check a status flag.
 */
export function hasStatusFlag(status: DeviceStatus, flag: DeviceStatusFlag): boolean {
  return (status.flags & flag) !== 0;
}

/**
 * Battery levels of every reported earbud channel. The case is not included.
 */
export function reportedBatteryLevels(status: DeviceStatus): number[] {
  return [status.batteryLeft, status.batteryRight].filter(
    (level): level is number => level !== undefined
  );
}
