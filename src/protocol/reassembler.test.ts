import { describe, expect, it, vi } from 'vitest';
import { FrameDecodeErrorCode } from '../exceptions';
import { getDeviceSpec } from '../models/device-spec';
import { DeviceModel, MessageType } from '../models/enums';
import { createFrame, encodeFrame } from './frame';
import { decodeChunk, ReassemblyBuffer } from './reassembler';

const MODEL = DeviceModel.BudsPro;
const spec = getDeviceSpec(MODEL);

// GET_STATUS request, 7 bytes on the wire
const STATUS_REQUEST = [0xfd, 0x03, 0x00, 0x62, 0xe4, 0x4c, 0xdd];

function bufferOf(...chunks: number[][]): ReassemblyBuffer {
  const buffer = new ReassemblyBuffer();
  for (const chunk of chunks) {
    buffer.append(Uint8Array.from(chunk));
  }
  return buffer;
}

describe('ReassemblyBuffer', () => {
  it('appends, drops and truncates', () => {
    const buffer = bufferOf([1, 2, 3], [4, 5]);
    expect(Array.from(buffer.bytes)).toEqual([1, 2, 3, 4, 5]);

    buffer.drop(2);
    expect(Array.from(buffer.bytes)).toEqual([3, 4, 5]);

    buffer.truncateTo(2);
    expect(Array.from(buffer.bytes)).toEqual([4, 5]);

    buffer.drop(10);
    expect(buffer.length).toBe(0);
  });
});

describe('decodeChunk', () => {
  it('extracts consecutive frames and empties the buffer', () => {
    const second = Array.from(encodeFrame(createFrame(0x60, Uint8Array.of(1, 2, 3)), spec));
    const buffer = bufferOf([...STATUS_REQUEST, ...second]);

    const frames = decodeChunk(buffer, MODEL);

    expect(frames.map((frame) => frame.id)).toEqual([0x62, 0x60]);
    expect(Array.from(frames[1].payload)).toEqual([1, 2, 3]);
    expect(buffer.length).toBe(0);
  });

  it('keeps a partial frame until the rest arrives', () => {
    const buffer = bufferOf(STATUS_REQUEST.slice(0, 5));

    expect(decodeChunk(buffer, MODEL)).toEqual([]);
    expect(buffer.length).toBe(5);

    buffer.append(Uint8Array.from(STATUS_REQUEST.slice(5)));
    const frames = decodeChunk(buffer, MODEL);

    expect(frames).toHaveLength(1);
    expect(frames[0].id).toBe(0x62);
    expect(buffer.length).toBe(0);
  });

  it('does nothing with fewer than five bytes', () => {
    const buffer = bufferOf([0x01, 0x02, 0x03, 0x04]);

    expect(decodeChunk(buffer, MODEL)).toEqual([]);
    expect(buffer.length).toBe(4);
  });

  it('keeps a trailing frame whose declared length has not arrived', () => {
    // Second frame declares size 10 (14 bytes) but only 8 are buffered
    const buffer = bufferOf(STATUS_REQUEST, [0xfd, 0x0a, 0x00, 0x62, 0x01, 0x02, 0x03, 0x04]);

    const frames = decodeChunk(buffer, MODEL);

    expect(frames).toHaveLength(1);
    expect(Array.from(buffer.bytes)).toEqual([0xfd, 0x0a, 0x00, 0x62, 0x01, 0x02, 0x03, 0x04]);
  });

  it('skips garbage before a start marker', () => {
    const onInvalid = vi.fn();
    const buffer = bufferOf([0x01, 0x02, ...STATUS_REQUEST]);

    const frames = decodeChunk(buffer, MODEL, false, onInvalid);

    expect(frames).toHaveLength(1);
    expect(onInvalid).toHaveBeenCalledTimes(1);
    expect(onInvalid.mock.calls[0][0].code).toBe(FrameDecodeErrorCode.InvalidStartMarker);
  });

  it('resynchronizes after a corrupted frame', () => {
    const corrupted = [0xfd, 0x03, 0x00, 0x62, 0xe4, 0x4d, 0xdd];
    const onInvalid = vi.fn();
    const buffer = bufferOf(corrupted, STATUS_REQUEST);

    const frames = decodeChunk(buffer, MODEL, false, onInvalid);

    expect(frames).toHaveLength(1);
    expect(onInvalid.mock.calls[0][0].code).toBe(FrameDecodeErrorCode.ChecksumInvalid);
    expect(buffer.length).toBe(0);
  });

  it('clears an all-zero remainder', () => {
    const buffer = bufferOf(STATUS_REQUEST, [0, 0, 0]);

    expect(decodeChunk(buffer, MODEL)).toHaveLength(1);
    expect(buffer.length).toBe(0);
  });

  it('clears the buffer after too many consecutive failures', () => {
    // Each 6-byte group declares size 2, which is invalid
    const bad = [0xfd, 0x02, 0x00, 0x62, 0x00, 0x01];
    const onInvalid = vi.fn();
    const buffer = bufferOf(bad, bad, bad, bad, bad, bad, bad);

    const frames = decodeChunk(buffer, MODEL, false, onInvalid);

    expect(frames).toEqual([]);
    expect(onInvalid).toHaveBeenCalledTimes(6);
    expect(buffer.length).toBe(0);
  });

  it('stops after the iteration limit and discards the rest', () => {
    const chunks = Array.from({ length: 101 }, () => STATUS_REQUEST);
    const buffer = bufferOf(...chunks);

    const frames = decodeChunk(buffer, MODEL);

    expect(frames).toHaveLength(100);
    expect(buffer.length).toBe(0);
  });

  it('skips a stray start marker declaring a long frame', () => {
    const control = Array.from(
      encodeFrame(createFrame(0xbb, Uint8Array.of(0x00, 0xf4, 0x01), MessageType.Response), spec)
    );
    const onInvalid = vi.fn();
    const buffer = bufferOf([0xfd, ...control]);

    const frames = decodeChunk(buffer, MODEL, false, onInvalid);

    expect(frames.map((frame) => frame.id)).toEqual([0xbb]);
    expect(Array.from(frames[0].payload)).toEqual([0x00, 0xf4, 0x01]);
    expect(onInvalid.mock.calls[0][0].code).toBe(FrameDecodeErrorCode.IndexOutOfRange);
    expect(buffer.length).toBe(0);
  });

  it.each([
    { name: 'packed', model: DeviceModel.BudsPro, marker: 0xfd },
    { name: 'legacy', model: DeviceModel.Buds, marker: 0xfe },
  ])('drains a run of $name start markers', ({ model, marker }) => {
    const buffer = bufferOf(Array.from({ length: 1000 }, () => marker));

    expect(decodeChunk(buffer, model)).toEqual([]);
    expect(buffer.length).toBe(0);
  });

  it('decodes with the alternative profile', () => {
    const bytes = encodeFrame(createFrame(0x62), spec, true);
    const buffer = bufferOf(Array.from(bytes));

    expect(decodeChunk(buffer, MODEL).length).toBe(0);
    buffer.clear();
    buffer.append(bytes);
    expect(decodeChunk(buffer, MODEL, true).map((frame) => frame.id)).toEqual([0x62]);
  });
});
