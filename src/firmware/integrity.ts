/**
 * Pre-transfer firmware integrity checks.
 */

import { createLogger } from '../logger';
import type { TargetDevice } from '../models/firmware';
import { crc32 } from '../protocol/crc';
import type { FirmwareBinary } from './binary';
import { comparableVersion, compareFirmwareVersions } from './version';

const log = createLogger('firmware');

export const MIN_FIRMWARE_SIZE = 1024;
export const MAX_FIRMWARE_SIZE = 2 * 1024 * 1024;

/**
 * Checks in evaluation order.
 */
export enum IntegrityCheck {
  Size = 'Size',
  SegmentBounds = 'SegmentBounds',
  SegmentChecksum = 'SegmentChecksum',
  Model = 'Model',
  Version = 'Version',
}

export type IntegrityResult =
  | { ok: true }
  | { ok: false; failure: IntegrityCheck; message: string };

function failed(failure: IntegrityCheck, message: string): IntegrityResult {
  return { ok: false, failure, message };
}

function checkStructure(binary: FirmwareBinary): IntegrityResult {
  if (binary.size < MIN_FIRMWARE_SIZE || binary.size > MAX_FIRMWARE_SIZE) {
    return failed(
      IntegrityCheck.Size,
      `Image size ${binary.size} outside ${MIN_FIRMWARE_SIZE}..${MAX_FIRMWARE_SIZE} bytes`
    );
  }

  for (const segment of binary.segments) {
    if (segment.offset + segment.size > binary.size) {
      return failed(
        IntegrityCheck.SegmentBounds,
        `Segment ${segment.id} (${segment.offset}+${segment.size}) exceeds image size ${binary.size}`
      );
    }
  }

  return { ok: true };
}

/**
 * Size and segment bound checks only.
 */
export function verifyHeaderStructure(binary: FirmwareBinary): boolean {
  return checkStructure(binary).ok;
}

/**
 * Run every check and report the first one that fails.
 *
 * A binary whose version, or the device's version, cannot be determined
 * fails the version check unless downgrades are allowed.
 */
export function verifyFirmwareDetailed(
  binary: FirmwareBinary,
  device: TargetDevice
): IntegrityResult {
  const structure = checkStructure(binary);
  if (!structure.ok) {
    return structure;
  }

  for (const segment of binary.segments) {
    const actual = crc32(binary.getSegmentBytes(segment));
    if (actual !== segment.crc32) {
      return failed(
        IntegrityCheck.SegmentChecksum,
        `Segment ${segment.id} CRC32 0x${actual.toString(16)} does not match ` +
          `0x${segment.crc32.toString(16)}`
      );
    }
  }

  if (binary.detectedModel !== device.model) {
    return failed(
      IntegrityCheck.Model,
      `Firmware targets ${binary.detectedModel ?? 'an unknown model'}, device is ${device.model}`
    );
  }

  if (!binary.allowDowngrade) {
    const binaryVersion = comparableVersion(binary.buildName);
    const deviceVersion = comparableVersion(device.firmwareVersion);

    if (binaryVersion === undefined || deviceVersion === undefined) {
      return failed(
        IntegrityCheck.Version,
        `Cannot compare firmware version ${binary.buildName} with ` +
          `${device.firmwareVersion ?? 'unknown device version'}`
      );
    }
    if (compareFirmwareVersions(binaryVersion, deviceVersion) < 0) {
      return failed(
        IntegrityCheck.Version,
        `Firmware ${binaryVersion} is older than installed ${deviceVersion}`
      );
    }
  }

  return { ok: true };
}

/**
 * Whether the binary may be installed on the device.
 */
export function verifyFirmware(binary: FirmwareBinary, device: TargetDevice): boolean {
  const result = verifyFirmwareDetailed(binary, device);
  if (!result.ok) {
    log.warn('Integrity check %s failed: %s', result.failure, result.message);
  }
  return result.ok;
}
