import { describe, expect, it } from 'vitest';
import { InvalidResponseError, ProtocolError } from '../exceptions';
import { ControlId, UpdateId } from '../models/enums';
import {
  buildAckPayload,
  buildControlPayload,
  buildDownloadDataPayload,
  buildSegmentTable,
} from './commands';
import {
  parseControlMessage,
  parseDownloadRequest,
  parseResultMessage,
  parseSessionResult,
  parseStatusUpdate,
  parseUpdateMessage,
} from './responses';

describe('buildSegmentTable', () => {
  it('writes the image crc, count and one record per segment', () => {
    const table = buildSegmentTable(0x11223344, [
      { id: 0, offset: 28, size: 2000, crc32: 0xaabbccdd },
      { id: 1, offset: 2028, size: 16, crc32: 0x01020304 },
    ]);

    expect(Array.from(table)).toEqual([
      0x44, 0x33, 0x22, 0x11, // image crc32
      0x02, // count
      0x00, 0xd0, 0x07, 0x00, 0x00, 0xdd, 0xcc, 0xbb, 0xaa, // id 0, 2000, crc
      0x01, 0x10, 0x00, 0x00, 0x00, 0x04, 0x03, 0x02, 0x01, // id 1, 16, crc
    ]);
  });

  it('rejects segment ids above one byte', () => {
    expect(() =>
      buildSegmentTable(0, [{ id: 0x100, offset: 0, size: 1, crc32: 0 }])
    ).toThrow(ProtocolError);
  });
});

describe('outgoing payloads', () => {
  it('builds a control echo', () => {
    expect(Array.from(buildControlPayload(ControlId.SendMtu, 512))).toEqual([0x00, 0x00, 0x02]);
    expect(Array.from(buildControlPayload(ControlId.ReadyToDownload, 3))).toEqual([
      0x01, 0x03, 0x00,
    ]);
  });

  it('builds a download data packet', () => {
    const payload = buildDownloadDataPayload(0x0100, Uint8Array.of(0xaa, 0xbb), true);

    expect(Array.from(payload)).toEqual([0x00, 0x01, 0x00, 0x00, 0x01, 0xaa, 0xbb]);
  });

  it('builds the acknowledgement', () => {
    expect(Array.from(buildAckPayload())).toEqual([0x01]);
  });
});

describe('parseControlMessage', () => {
  it('parses the MTU block', () => {
    expect(parseControlMessage(Uint8Array.of(0x00, 0x00, 0x02))).toEqual({
      controlId: ControlId.SendMtu,
      mtu: 512,
    });
  });

  it('parses the ready-to-download block', () => {
    expect(parseControlMessage(Uint8Array.of(0x01, 0x02, 0x00))).toEqual({
      controlId: ControlId.ReadyToDownload,
      segmentId: 2,
    });
  });

  it('rejects unknown control ids and short payloads', () => {
    expect(() => parseControlMessage(Uint8Array.of(0x07, 0x00, 0x00))).toThrow(
      'Unknown control id 0x07'
    );
    expect(() => parseControlMessage(Uint8Array.of(0x00, 0x01))).toThrow(InvalidResponseError);
  });
});

describe('device notifications', () => {
  it('parses the session result', () => {
    expect(parseSessionResult(Uint8Array.of(0x03))).toEqual({ resultCode: 3 });
    expect(() => parseSessionResult(new Uint8Array(0))).toThrow(InvalidResponseError);
  });

  it('parses a download request', () => {
    expect(parseDownloadRequest(Uint8Array.of(0x00, 0x02, 0x00, 0x00, 0x04))).toEqual({
      offset: 512,
      packets: 4,
    });
  });

  it('parses progress and state change updates', () => {
    expect(parseUpdateMessage(Uint8Array.of(0x00, 42))).toEqual({
      updateId: UpdateId.Percent,
      percent: 42,
    });
    expect(parseUpdateMessage(Uint8Array.of(0x01, 0x02, 0x00))).toEqual({
      updateId: UpdateId.StateChange,
      state: 2,
      resultCode: 0,
    });
    expect(() => parseUpdateMessage(Uint8Array.of(0x01, 0x02))).toThrow(
      'State change notification too short'
    );
  });

  it('parses the final result', () => {
    expect(parseResultMessage(Uint8Array.of(0x01, 0x05))).toEqual({ result: 1, errorCode: 5 });
  });
});

describe('parseStatusUpdate', () => {
  it('parses battery, flags and version', () => {
    const version = new TextEncoder().encode('R190XXU0AUA1');
    const status = parseStatusUpdate(Uint8Array.of(80, 75, 0xff, 0x01, version.length, ...version));

    expect(status).toEqual({
      batteryLeft: 80,
      batteryRight: 75,
      batteryCase: undefined,
      flags: 0x01,
      firmwareVersion: 'R190XXU0AUA1',
    });
  });

  it('accepts a payload without version', () => {
    expect(parseStatusUpdate(Uint8Array.of(50, 50, 10, 0)).firmwareVersion).toBeUndefined();
  });

  it('rejects a version longer than the payload', () => {
    expect(() => parseStatusUpdate(Uint8Array.of(50, 50, 10, 0, 5, 0x41))).toThrow(
      InvalidResponseError
    );
  });
});
