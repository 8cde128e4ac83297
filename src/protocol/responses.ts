/**
 * Parsers for incoming message payloads.
 */

import { InvalidResponseError } from '../exceptions';
import { ControlId, UpdateId } from '../models/enums';
import type { DeviceStatus } from '../models/status';

/**
 * FOTA_OPEN response.
 */
export interface SessionResult {
  resultCode: number;
}

/**
 * FOTA_CONTROL block sent by the device.
 */
export type ControlMessage =
  | { controlId: ControlId.SendMtu; mtu: number }
  | { controlId: ControlId.ReadyToDownload; segmentId: number };

/**
 * FOTA_DOWNLOAD_DATA request sent by the device.
 */
export interface DownloadRequest {
  /** Segment offset of the first requested packet */
  offset: number;
  /** Number of MTU-sized packets requested */
  packets: number;
}

/**
 * FOTA_UPDATE notification.
 */
export type UpdateMessage =
  | { updateId: UpdateId.Percent; percent: number }
  | { updateId: UpdateId.StateChange; state: number; resultCode: number };

/**
 * FOTA_RESULT notification.
 */
export interface ResultMessage {
  result: number;
  errorCode: number;
}

const BATTERY_NOT_REPORTED = 0xff;

function view(data: Uint8Array): DataView {
  return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

function requireLength(data: Uint8Array, length: number, what: string): void {
  if (data.length < length) {
    throw new InvalidResponseError(
      `${what} too short: ${data.length} bytes (need at least ${length})`
    );
  }
}

/**
 * Parse a FOTA_OPEN response.
 *
 * Format: [result:1]
 */
export function parseSessionResult(data: Uint8Array): SessionResult {
  requireLength(data, 1, 'Session result');
  return { resultCode: data[0] };
}

/**
 * Parse a FOTA_CONTROL block.
 *
 * Format: [controlId:1][parameter:2 LE]
 *
 * @throws {InvalidResponseError} If the payload is short or the control id unknown
 */
export function parseControlMessage(data: Uint8Array): ControlMessage {
  requireLength(data, 3, 'Control block');
  const parameter = view(data).getUint16(1, true);

  switch (data[0]) {
    case ControlId.SendMtu:
      return { controlId: ControlId.SendMtu, mtu: parameter };
    case ControlId.ReadyToDownload:
      return { controlId: ControlId.ReadyToDownload, segmentId: parameter };
    default:
      throw new InvalidResponseError(
        `Unknown control id 0x${data[0].toString(16).padStart(2, '0')}`
      );
  }
}

/**
 * Parse a FOTA_DOWNLOAD_DATA request.
 *
 * Format: [offset:4 LE][packets:1]
 */
export function parseDownloadRequest(data: Uint8Array): DownloadRequest {
  requireLength(data, 5, 'Download request');
  return {
    offset: view(data).getUint32(0, true),
    packets: data[4],
  };
}

/**
 * Parse a FOTA_UPDATE notification.
 *
 * Format:
 *   [0x00][percent:1]
 *   [0x01][state:1][result:1]
 */
export function parseUpdateMessage(data: Uint8Array): UpdateMessage {
  requireLength(data, 2, 'Update notification');

  switch (data[0]) {
    case UpdateId.Percent:
      return { updateId: UpdateId.Percent, percent: data[1] };
    case UpdateId.StateChange:
      requireLength(data, 3, 'State change notification');
      return { updateId: UpdateId.StateChange, state: data[1], resultCode: data[2] };
    default:
      throw new InvalidResponseError(
        `Unknown update id 0x${data[0].toString(16).padStart(2, '0')}`
      );
  }
}

/**
 * Parse a FOTA_RESULT notification.
 *
 * Format: [result:1][errorCode:1]
 */
export function parseResultMessage(data: Uint8Array): ResultMessage {
  requireLength(data, 2, 'Result notification');
  return { result: data[0], errorCode: data[1] };
}

/**
 * Parse a STATUS_UPDATED payload.
 *
 * Format: [batteryL:1][batteryR:1][batteryCase:1][flags:1][versionLength:1][version:ascii]
 *   - battery values of 0xFF are not reported
 *   - version is optional
 */
export function parseStatusUpdate(data: Uint8Array): DeviceStatus {
  requireLength(data, 4, 'Status update');

  const battery = (value: number): number | undefined =>
    value === BATTERY_NOT_REPORTED ? undefined : value;

  const status: DeviceStatus = {
    batteryLeft: battery(data[0]),
    batteryRight: battery(data[1]),
    batteryCase: battery(data[2]),
    flags: data[3],
  };

  if (data.length > 4) {
    const versionLength = data[4];
    requireLength(data, 5 + versionLength, 'Status update version');
    if (versionLength > 0) {
      status.firmwareVersion = new TextDecoder('ascii').decode(
        data.subarray(5, 5 + versionLength)
      );
    }
  }

  return status;
}
