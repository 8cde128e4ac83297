/**
 * Firmware image parsing.
 *
 * Image layout (all integers little-endian):
 *   [magic:4][totalSize:4][segmentCount:4]
 *   [segment records: id:4, offset:4, size:4, crc32:4]...
 *   ...segment data...
 *   [crc32:4]
 */

import { createHash } from 'node:crypto';
import { FirmwareParseError, FirmwareParseErrorCode } from '../exceptions';
import { createLogger } from '../logger';
import { getDeviceSpec } from '../models/device-spec';
import { DeviceModel } from '../models/enums';
import type { FirmwareSegment } from '../models/firmware';
import { buildSegmentTable } from '../protocol/commands';
import { extractVersionInfo } from './version';

const log = createLogger('firmware');

export const FIRMWARE_MAGIC = 0xcafecafe;
/** "BCOM": internal debug builds, never flashed */
export const DEBUG_FIRMWARE_MAGIC = 0x42434f4d;
/** Intel HEX prefix of internal builds exported as text */
export const INTERNAL_BUILD_PREFIX = ':02000004FE00FC';

export const IMAGE_HEADER_SIZE = 12;
export const SEGMENT_RECORD_SIZE = 16;
export const IMAGE_TRAILER_SIZE = 4;

/**
 * A parsed firmware image.
 *
 * Immutable apart from `allowDowngrade`.
 *
 * @example
 * ```typescript
 * const binary = new FirmwareBinary(await readFile(path), 'R175XXU0AUA1');
 * console.log(binary.version, binary.detectedModel, binary.segments.length);
 * ```
 */
export class FirmwareBinary {
  readonly magic: number;
  readonly totalSize: number;
  readonly segmentCount: number;
  readonly segments: readonly FirmwareSegment[];
  /** Whole-image CRC32 from the trailer */
  readonly crc32: number;
  readonly version: string;
  readonly buildDate?: Date;
  /** SHA-256 of the raw bytes, hex encoded */
  readonly checksum: string;
  readonly detectedModel?: DeviceModel;

  /**
   * Permit installing a version older than the device's.
   */
  allowDowngrade = false;

  /**
   * @param data - Raw image bytes
   * @param buildName - Build identifier, e.g. "R175XXU0AUA1"
   * @throws {FirmwareParseError} If the image is malformed or an internal build
   */
  constructor(
    readonly data: Uint8Array,
    readonly buildName: string
  ) {
    if (startsWithText(data, INTERNAL_BUILD_PREFIX)) {
      throw new FirmwareParseError(
        'Internal build images cannot be installed',
        FirmwareParseErrorCode.InternalBuild
      );
    }

    if (data.length < IMAGE_HEADER_SIZE + IMAGE_TRAILER_SIZE) {
      throw new FirmwareParseError(
        `Image too small: ${data.length} bytes`,
        FirmwareParseErrorCode.Unknown
      );
    }

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

    this.magic = view.getUint32(0, true);
    if (this.magic === DEBUG_FIRMWARE_MAGIC) {
      throw new FirmwareParseError(
        'Debug build images cannot be installed',
        FirmwareParseErrorCode.InternalBuild
      );
    }
    if (this.magic !== FIRMWARE_MAGIC) {
      throw new FirmwareParseError(
        `Invalid magic 0x${this.magic.toString(16).padStart(8, '0')}`,
        FirmwareParseErrorCode.InvalidMagic
      );
    }

    this.totalSize = view.getUint32(4, true);
    if (this.totalSize === 0) {
      throw new FirmwareParseError('Image declares a total size of 0', FirmwareParseErrorCode.SizeZero);
    }

    this.segmentCount = view.getUint32(8, true);
    if (this.segmentCount === 0) {
      throw new FirmwareParseError('Image has no segments', FirmwareParseErrorCode.NoSegmentsFound);
    }

    const tableEnd = IMAGE_HEADER_SIZE + this.segmentCount * SEGMENT_RECORD_SIZE;
    if (tableEnd + IMAGE_TRAILER_SIZE > data.length) {
      throw new FirmwareParseError(
        `Segment table of ${this.segmentCount} entries exceeds image size ${data.length}`,
        FirmwareParseErrorCode.Unknown
      );
    }

    const segments: FirmwareSegment[] = [];
    for (let i = 0; i < this.segmentCount; i++) {
      const base = IMAGE_HEADER_SIZE + i * SEGMENT_RECORD_SIZE;
      segments.push({
        id: view.getUint32(base, true),
        offset: view.getUint32(base + 4, true),
        size: view.getUint32(base + 8, true),
        crc32: view.getUint32(base + 12, true),
      });
    }
    this.segments = segments;
    this.crc32 = view.getUint32(data.length - IMAGE_TRAILER_SIZE, true);

    const versionInfo = extractVersionInfo(buildName);
    this.version = versionInfo.version;
    this.buildDate = versionInfo.buildDate;
    this.detectedModel = detectModel(data);
    this.checksum = createHash('sha256').update(data).digest('hex');

    log.debug(
      'Parsed %s: %d segments, version %s, model %s',
      buildName,
      this.segmentCount,
      this.version,
      this.detectedModel ?? 'unknown'
    );
  }

  /**
   * Parse an image; same as the constructor.
   */
  static parse(data: Uint8Array, buildName: string): FirmwareBinary {
    return new FirmwareBinary(data, buildName);
  }

  get size(): number {
    return this.data.length;
  }

  getSegmentById(id: number): FirmwareSegment | undefined {
    return this.segments.find((segment) => segment.id === id);
  }

  /**
   * Bytes of a segment. Truncated at the end of the image when the segment
   * lies out of bounds.
   */
  getSegmentBytes(segment: FirmwareSegment): Uint8Array {
    return this.data.subarray(segment.offset, segment.offset + segment.size);
  }

  /**
   * Segment table sent with FOTA_OPEN.
   */
  serializeSegmentTable(): Uint8Array {
    return buildSegmentTable(this.crc32, this.segments);
  }
}

/**
 * First model, in declaration order, whose firmware signature occurs in the image.
 */
export function detectModel(data: Uint8Array): DeviceModel | undefined {
  const haystack = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  return Object.values(DeviceModel).find((model) =>
    haystack.includes(getDeviceSpec(model).firmwareSignature, 0, 'latin1')
  );
}

function startsWithText(data: Uint8Array, text: string): boolean {
  if (data.length < text.length) {
    return false;
  }
  for (let i = 0; i < text.length; i++) {
    if (data[i] !== text.charCodeAt(i)) {
      return false;
    }
  }
  return true;
}
