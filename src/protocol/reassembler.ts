/**
 * Incremental frame extraction from an unaligned byte stream.
 */

import { FrameDecodeError, FrameDecodeErrorCode } from '../exceptions';
import { createLogger } from '../logger';
import { getDeviceSpec, type ProtocolProfile } from '../models/device-spec';
import type { DeviceModel } from '../models/enums';
import {
  MAX_CONSECUTIVE_FAILURES,
  MAX_DECODE_ITERATIONS,
  MAX_PACKET_SIZE,
  MIN_DECODABLE_SIZE,
} from './constants';
import {
  decodeWithFormat,
  type Frame,
  type FrameFormat,
  resolveFrameFormat,
  totalPacketSize,
} from './frame';

const log = createLogger('frame');

/**
 * Growable byte buffer holding bytes not yet decoded.
 */
export class ReassemblyBuffer {
  private data = new Uint8Array(0);

  get length(): number {
    return this.data.length;
  }

  /**
   * View of the pending bytes. Invalidated by the next mutation.
   */
  get bytes(): Uint8Array {
    return this.data;
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) {
      return;
    }
    const next = new Uint8Array(this.data.length + chunk.length);
    next.set(this.data);
    next.set(chunk, this.data.length);
    this.data = next;
  }

  /**
   * Remove `count` bytes from the front.
   */
  drop(count: number): void {
    this.data = this.data.slice(Math.min(count, this.data.length));
  }

  /**
   * Keep only the newest `count` bytes.
   */
  truncateTo(count: number): void {
    if (this.data.length > count) {
      this.data = this.data.slice(this.data.length - count);
    }
  }

  clear(): void {
    this.data = new Uint8Array(0);
  }
}

/**
 * Callback receiving every decode failure met while scanning.
 */
export type InvalidFrameHandler = (error: FrameDecodeError) => void;

/**
 * Extract every complete frame from the buffer.
 *
 * Consumed bytes are removed from the buffer. An incomplete frame at the end
 * stays in the buffer for the next call. Corrupted bytes are skipped by
 * resynchronizing on the next start marker.
 *
 * @param buffer - Pending stream bytes, mutated in place
 * @param model - Connected device model
 * @param alternative - Decode with the alternative protocol profile
 * @param onInvalid - Receives each decode error
 * @returns Frames in stream order
 */
export function decodeChunk(
  buffer: ReassemblyBuffer,
  model: DeviceModel,
  alternative: boolean | ProtocolProfile = false,
  onInvalid?: InvalidFrameHandler
): Frame[] {
  return decodeChunkWithFormat(
    buffer,
    resolveFrameFormat(getDeviceSpec(model), alternative),
    onInvalid
  );
}

/**
 * Same as {@link decodeChunk} with an explicit frame format.
 */
export function decodeChunkWithFormat(
  buffer: ReassemblyBuffer,
  format: FrameFormat,
  onInvalid?: InvalidFrameHandler
): Frame[] {
  const frames: Frame[] = [];
  let iterations = 0;
  let consecutiveFailures = 0;

  while (buffer.length >= MIN_DECODABLE_SIZE) {
    if (++iterations > MAX_DECODE_ITERATIONS) {
      log.warn('Iteration limit reached, discarding %d buffered bytes', buffer.length);
      buffer.clear();
      break;
    }

    let frame: Frame;
    try {
      frame = decodeWithFormat(buffer.bytes, format);
    } catch (error) {
      if (!(error instanceof FrameDecodeError)) {
        throw error;
      }

      let skipTo: number | undefined;
      if (isIncomplete(buffer.bytes, format, error)) {
        skipTo = completeFrameOffset(buffer.bytes, format);
        if (skipTo === undefined) {
          // Wait for the rest of the frame
          break;
        }
      }

      onInvalid?.(error);
      consecutiveFailures++;
      log.debug('Decode failed (%s), resynchronizing', error.code);

      if (consecutiveFailures > MAX_CONSECUTIVE_FAILURES) {
        log.warn('Too many consecutive decode failures, discarding buffer');
        buffer.clear();
        break;
      }

      buffer.drop(skipTo ?? nextStartMarker(buffer.bytes, format.som));
      if (isAllZero(buffer.bytes)) {
        buffer.clear();
        break;
      }
      continue;
    }

    consecutiveFailures = 0;
    frames.push(frame);
    buffer.drop(totalPacketSize(frame));

    if (isAllZero(buffer.bytes)) {
      buffer.clear();
    }
  }

  return frames;
}

function isIncomplete(
  bytes: Uint8Array,
  format: FrameFormat,
  error: FrameDecodeError
): boolean {
  if (bytes[0] !== format.som) {
    return false;
  }
  if (error.code === FrameDecodeErrorCode.TooSmall) {
    return true;
  }
  return (
    error.code === FrameDecodeErrorCode.IndexOutOfRange &&
    error.requiredLength !== undefined &&
    error.requiredLength <= MAX_PACKET_SIZE
  );
}

/**
 * Offset of the first later start marker at which a whole valid frame is
 * already buffered. A stray start marker can declare a frame far longer than
 * the stream will ever deliver.
 */
function completeFrameOffset(bytes: Uint8Array, format: FrameFormat): number | undefined {
  let index = bytes.indexOf(format.som, 1);
  while (index !== -1) {
    try {
      decodeWithFormat(bytes.subarray(index), format);
      return index;
    } catch (error) {
      if (!(error instanceof FrameDecodeError)) {
        throw error;
      }
    }
    index = bytes.indexOf(format.som, index + 1);
  }
  return undefined;
}

/**
 * Number of bytes to drop to reach the next start marker after offset 0.
 */
function nextStartMarker(bytes: Uint8Array, som: number): number {
  const index = bytes.indexOf(som, 1);
  return index === -1 ? 1 : index;
}

function isAllZero(bytes: Uint8Array): boolean {
  return bytes.length > 0 && bytes.every((byte) => byte === 0);
}
