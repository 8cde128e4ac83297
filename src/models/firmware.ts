/**
 * Firmware data structures.
 */

import type { DeviceModel } from './enums';

/**
 * One entry of a firmware image's segment table.
 */
export interface FirmwareSegment {
  id: number;
  /** Byte offset of the segment inside the image */
  offset: number;
  size: number;
  crc32: number;
}

/**
 * Version information derived from a build name.
 */
export interface FirmwareVersionInfo {
  /**
   * Human readable version, or "Unknown" when no heuristic matched
   */
  version: string;

  /**
   * Build date, when the build name encodes one
   */
  buildDate?: Date;
}

/**
 * Progress window for one download-data request.
 */
export interface BlockProgress {
  segmentId: number;
  /** Segment offset the device asked for */
  windowStart: number;
  /** `windowStart + mtu * packets` */
  windowEnd: number;
  packets: number;
  segmentSize: number;
  segmentCrc32: number;
}

/**
 * What the integrity verifier needs to know about the connected device.
 */
export interface TargetDevice {
  model: DeviceModel;
  /** Build string currently installed on the device */
  firmwareVersion?: string;
}
