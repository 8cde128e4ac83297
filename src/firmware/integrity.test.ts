import { describe, expect, it } from 'vitest';
import { DeviceModel } from '../models/enums';
import { buildFirmwareImage, patternBytes } from '../testing/firmware';
import { FirmwareBinary } from './binary';
import {
  IntegrityCheck,
  verifyFirmware,
  verifyFirmwareDetailed,
  verifyHeaderStructure,
} from './integrity';

const device = { model: DeviceModel.BudsPro, firmwareVersion: 'R190XXU0AUA1' };

function image(): Uint8Array {
  return buildFirmwareImage({
    segments: [{ id: 0, data: patternBytes(2000) }],
    signature: 'R190',
    size: 2048,
  });
}

function binary(data: Uint8Array = image(), buildName = 'R190XXU0AUB1'): FirmwareBinary {
  return new FirmwareBinary(data, buildName);
}

describe('verifyFirmwareDetailed', () => {
  it('accepts a matching newer image', () => {
    expect(verifyFirmwareDetailed(binary(), device)).toEqual({ ok: true });
  });

  it('accepts the installed version', () => {
    expect(verifyFirmwareDetailed(binary(image(), 'R190XXU0AUA1'), device).ok).toBe(true);
  });

  it('rejects images below the minimum size', () => {
    const small = buildFirmwareImage({
      segments: [{ id: 0, data: patternBytes(100) }],
      signature: 'R190',
      size: 512,
    });

    expect(verifyFirmwareDetailed(binary(small), device)).toEqual({
      ok: false,
      failure: IntegrityCheck.Size,
      message: 'Image size 512 outside 1024..2097152 bytes',
    });
  });

  it('rejects segments extending past the image', () => {
    const data = image();
    new DataView(data.buffer).setUint32(12 + 8, 3000, true);

    expect(verifyFirmwareDetailed(binary(data), device)).toEqual({
      ok: false,
      failure: IntegrityCheck.SegmentBounds,
      message: 'Segment 0 (28+3000) exceeds image size 2048',
    });
  });

  it('rejects corrupted segment data', () => {
    const data = image();
    data[100] ^= 0xff;

    const result = verifyFirmwareDetailed(binary(data), device);
    expect(result.ok ? null : result.failure).toBe(IntegrityCheck.SegmentChecksum);
  });

  it('rejects firmware for another model', () => {
    expect(
      verifyFirmwareDetailed(binary(), { ...device, model: DeviceModel.Buds2 })
    ).toEqual({
      ok: false,
      failure: IntegrityCheck.Model,
      message: 'Firmware targets BudsPro, device is Buds2',
    });
  });

  it('rejects a downgrade', () => {
    const older = binary(image(), 'R190XXU0AUA1');

    expect(
      verifyFirmwareDetailed(older, { ...device, firmwareVersion: 'R190XXU0AUB1' })
    ).toEqual({
      ok: false,
      failure: IntegrityCheck.Version,
      message: 'Firmware A.U.A1 is older than installed A.U.B1',
    });
  });

  it('allows a downgrade when permitted', () => {
    const older = binary(image(), 'R190XXU0AUA1');
    older.allowDowngrade = true;

    expect(
      verifyFirmwareDetailed(older, { ...device, firmwareVersion: 'R190XXU0AUB1' }).ok
    ).toBe(true);
  });

  it('rejects when either version is unknown', () => {
    const unnamed = binary(image(), 'custom-build');
    const noDeviceVersion = verifyFirmwareDetailed(binary(), { model: DeviceModel.BudsPro });

    expect(verifyFirmwareDetailed(unnamed, device).ok).toBe(false);
    expect(noDeviceVersion).toEqual({
      ok: false,
      failure: IntegrityCheck.Version,
      message: 'Cannot compare firmware version R190XXU0AUB1 with unknown device version',
    });
  });
});

describe('verifyHeaderStructure', () => {
  it('checks size and bounds only', () => {
    const data = image();
    data[100] ^= 0xff;

    expect(verifyHeaderStructure(binary(data))).toBe(true);

    new DataView(data.buffer).setUint32(12 + 8, 3000, true);
    expect(verifyHeaderStructure(binary(data))).toBe(false);
  });
});

describe('verifyFirmware', () => {
  it('returns the verdict as a boolean', () => {
    expect(verifyFirmware(binary(), device)).toBe(true);
    expect(verifyFirmware(binary(), { ...device, model: DeviceModel.Buds3 })).toBe(false);
  });
});
