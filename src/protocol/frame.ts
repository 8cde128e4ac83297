/**
 * SPP frame encoding and decoding.
 *
 * Wire layout:
 *   [SOM:1][HEADER:2][ID:1][PAYLOAD:0..N][CRC16:2 LE][EOM:1]
 *
 * Legacy header: [TYPE:1][SIZE:1]
 * Packed header: 16-bit little-endian, bits 0-9 = size, bit 12 = response,
 * bit 13 = fragment. SIZE counts id + payload + crc.
 */

import { FrameDecodeError, FrameDecodeErrorCode, ProtocolError } from '../exceptions';
import {
  ALTERNATIVE_PROFILE,
  type DeviceSpec,
  type ProtocolProfile,
  supports,
} from '../models/device-spec';
import { DeviceFeature, MessageType } from '../models/enums';
import {
  CRC_SIZE,
  FRAME_OVERHEAD,
  HEADER_FRAGMENT_BIT,
  HEADER_RESPONSE_BIT,
  HEADER_SIZE_MASK,
  MAX_LEGACY_PAYLOAD,
  MAX_MODERN_PAYLOAD,
  MIN_FRAME_SIZE,
} from './constants';
import { crc16 } from './crc';

/**
 * A single protocol message.
 */
export interface Frame {
  readonly type: MessageType;
  readonly id: number;
  readonly payload: Uint8Array;
  /** Only meaningful on devices with the packed header */
  readonly isFragment: boolean;
}

/**
 * Markers and header format used to encode or decode frames.
 */
export interface FrameFormat {
  som: number;
  eom: number;
  legacyHeader: boolean;
}

/**
 * Build a frame for encoding.
 */
export function createFrame(
  id: number,
  payload: Uint8Array = new Uint8Array(0),
  type: MessageType = MessageType.Request,
  isFragment: boolean = false
): Frame {
  return { type, id, payload, isFragment };
}

/**
 * Value of the header SIZE field: id + payload + crc.
 */
export function frameSize(frame: Frame): number {
  return 1 + frame.payload.length + CRC_SIZE;
}

/**
 * Number of bytes the frame occupies on the wire.
 */
export function totalPacketSize(frame: Frame): number {
  return frame.payload.length + FRAME_OVERHEAD;
}

/**
 * Resolve the frame format for a device.
 *
 * @param alternative - `true` for the default alternative profile, or a
 *   custom profile; alternative mode always uses the packed header
 */
export function resolveFrameFormat(
  spec: DeviceSpec,
  alternative: boolean | ProtocolProfile = false
): FrameFormat {
  if (alternative !== false) {
    const profile = alternative === true ? ALTERNATIVE_PROFILE : alternative;
    return { som: profile.som, eom: profile.eom, legacyHeader: false };
  }

  return {
    som: spec.som,
    eom: spec.eom,
    legacyHeader: supports(spec, DeviceFeature.LegacyHeader),
  };
}

/**
 * Encode a frame for a device.
 *
 * @throws {ProtocolError} If the id or payload does not fit the header
 */
export function encodeFrame(
  frame: Frame,
  spec: DeviceSpec,
  alternative: boolean | ProtocolProfile = false
): Uint8Array {
  return encodeWithFormat(frame, resolveFrameFormat(spec, alternative));
}

/**
 * Encode a frame with an explicit format.
 */
export function encodeWithFormat(frame: Frame, format: FrameFormat): Uint8Array {
  if (!Number.isInteger(frame.id) || frame.id < 0 || frame.id > 0xff) {
    throw new ProtocolError(`Message id ${frame.id} does not fit in one byte`);
  }

  const maxPayload = format.legacyHeader ? MAX_LEGACY_PAYLOAD : MAX_MODERN_PAYLOAD;
  if (frame.payload.length > maxPayload) {
    throw new ProtocolError(
      `Payload of ${frame.payload.length} bytes exceeds maximum ${maxPayload}`
    );
  }

  const size = frameSize(frame);
  const payloadEnd = 4 + frame.payload.length;
  const bytes = new Uint8Array(totalPacketSize(frame));
  const view = new DataView(bytes.buffer);

  bytes[0] = format.som;

  if (format.legacyHeader) {
    bytes[1] = frame.type;
    bytes[2] = size;
  } else {
    let header = size;
    if (frame.isFragment) {
      header |= HEADER_FRAGMENT_BIT;
    }
    if (frame.type === MessageType.Response) {
      header |= HEADER_RESPONSE_BIT;
    }
    view.setUint16(1, header, true);
  }

  bytes[3] = frame.id;
  bytes.set(frame.payload, 4);

  const crc = crc16(bytes.subarray(3, payloadEnd));
  view.setUint16(payloadEnd, crc, true);

  bytes[payloadEnd + CRC_SIZE] = format.eom;

  return bytes;
}

/**
 * Decode the frame at the start of `bytes` for a device.
 *
 * Bytes after the frame are ignored.
 *
 * @throws {FrameDecodeError} If the bytes do not start with a valid frame
 */
export function decodeFrame(
  bytes: Uint8Array,
  spec: DeviceSpec,
  alternative: boolean | ProtocolProfile = false
): Frame {
  return decodeWithFormat(bytes, resolveFrameFormat(spec, alternative));
}

/**
 * Decode a frame with an explicit format.
 */
export function decodeWithFormat(bytes: Uint8Array, format: FrameFormat): Frame {
  if (bytes.length < MIN_FRAME_SIZE) {
    throw new FrameDecodeError(
      `Frame too small: ${bytes.length} bytes (need at least ${MIN_FRAME_SIZE})`,
      FrameDecodeErrorCode.TooSmall
    );
  }

  if (bytes[0] !== format.som) {
    throw new FrameDecodeError(
      `Invalid start marker 0x${bytes[0].toString(16).padStart(2, '0')}`,
      FrameDecodeErrorCode.InvalidStartMarker
    );
  }

  let type: MessageType;
  let size: number;
  let isFragment = false;

  if (format.legacyHeader) {
    const rawType = bytes[1];
    if (rawType !== MessageType.Request && rawType !== MessageType.Response) {
      throw new FrameDecodeError(
        `Unknown message type ${rawType} in legacy header`,
        FrameDecodeErrorCode.Overflow
      );
    }
    type = rawType === MessageType.Response ? MessageType.Response : MessageType.Request;
    size = bytes[2];
  } else {
    const header = bytes[1] | (bytes[2] << 8);
    isFragment = (header & HEADER_FRAGMENT_BIT) !== 0;
    type = (header & HEADER_RESPONSE_BIT) !== 0 ? MessageType.Response : MessageType.Request;
    size = header & HEADER_SIZE_MASK;
  }

  if (size < 1 + CRC_SIZE) {
    throw new FrameDecodeError(
      `Declared size ${size} is smaller than id + crc`,
      FrameDecodeErrorCode.SizeMismatch
    );
  }

  // SOM + header + size + EOM
  const requiredLength = size + 4;
  if (bytes.length < requiredLength) {
    throw new FrameDecodeError(
      `Frame declares ${requiredLength} bytes but only ${bytes.length} are available`,
      FrameDecodeErrorCode.IndexOutOfRange,
      requiredLength
    );
  }

  const id = bytes[3];
  const payloadEnd = 4 + size - 1 - CRC_SIZE;
  const payload = bytes.slice(4, payloadEnd);

  // CRC over id + payload + crc (high byte first) reduces to zero
  const checked = new Uint8Array(size);
  checked.set(bytes.subarray(3, payloadEnd));
  checked[size - 2] = bytes[payloadEnd + 1];
  checked[size - 1] = bytes[payloadEnd];
  if (crc16(checked) !== 0) {
    throw new FrameDecodeError(
      `Checksum mismatch for message 0x${id.toString(16).padStart(2, '0')}`,
      FrameDecodeErrorCode.ChecksumInvalid
    );
  }

  if (bytes[requiredLength - 1] !== format.eom) {
    throw new FrameDecodeError(
      `Invalid end marker 0x${bytes[requiredLength - 1].toString(16).padStart(2, '0')}`,
      FrameDecodeErrorCode.InvalidEndMarker
    );
  }

  return { type, id, payload, isFragment };
}
