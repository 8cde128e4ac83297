/**
 * Payload builders for outgoing FOTA messages.
 */

import { ProtocolError } from '../exceptions';
import type { ControlId } from '../models/enums';
import type { FirmwareSegment } from '../models/firmware';
import { ACK_OK } from './constants';

/**
 * Build the FOTA_OPEN segment table.
 *
 * Format:
 *   [crc32:4][count:1] then per segment [id:1][size:4][crc32:4]
 *   - crc32: whole-image CRC32 (little-endian)
 *   - size, crc32: little-endian
 *
 * @throws {ProtocolError} If a value does not fit its field
 */
export function buildSegmentTable(
  imageCrc32: number,
  segments: readonly FirmwareSegment[]
): Uint8Array {
  if (segments.length > 0xff) {
    throw new ProtocolError(`Too many segments for FOTA_OPEN: ${segments.length}`);
  }

  const buffer = new ArrayBuffer(5 + segments.length * 9);
  const view = new DataView(buffer);
  view.setUint32(0, imageCrc32, true);
  view.setUint8(4, segments.length);

  let offset = 5;
  for (const segment of segments) {
    if (segment.id > 0xff) {
      throw new ProtocolError(`Segment id ${segment.id} does not fit in one byte`);
    }
    view.setUint8(offset, segment.id);
    view.setUint32(offset + 1, segment.size, true);
    view.setUint32(offset + 5, segment.crc32, true);
    offset += 9;
  }

  return new Uint8Array(buffer);
}

/**
 * Build a FOTA_CONTROL echo.
 *
 * Format:
 *   [controlId:1][parameter:2]
 *   - parameter: negotiated MTU or segment id (little-endian)
 */
export function buildControlPayload(controlId: ControlId, parameter: number): Uint8Array {
  const buffer = new ArrayBuffer(3);
  const view = new DataView(buffer);
  view.setUint8(0, controlId);
  view.setUint16(1, parameter, true);
  return new Uint8Array(buffer);
}

/**
 * Build one FOTA_DOWNLOAD_DATA packet.
 *
 * Format:
 *   [offset:4][last:1][data:n]
 *   - offset: segment offset of `data` (little-endian)
 *   - last: 1 when this packet reaches the end of the segment
 */
export function buildDownloadDataPayload(
  offset: number,
  data: Uint8Array,
  isLastFragment: boolean
): Uint8Array {
  const result = new Uint8Array(5 + data.length);
  const view = new DataView(result.buffer);
  view.setUint32(0, offset, true);
  view.setUint8(4, isLastFragment ? 1 : 0);
  result.set(data, 5);
  return result;
}

/**
 * Build the acknowledgement sent for FOTA_UPDATE and FOTA_RESULT.
 */
export function buildAckPayload(): Uint8Array {
  return Uint8Array.of(ACK_OK);
}
