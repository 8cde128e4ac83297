import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EarbudsDevice } from './device';
import { FirmwareParseError, FirmwareTransferErrorCode } from './exceptions';
import { getDeviceSpec } from './models/device-spec';
import { ConnectionState, DeviceModel, DeviceStatusFlag } from './models/enums';
import { MessageId } from './protocol/constants';
import { useFakeClock } from './testing/clock';
import { FakeTransport } from './testing/fake-transport';
import { buildFirmwareImage, patternBytes } from './testing/firmware';

const IMAGE = buildFirmwareImage({
  segments: [{ id: 0, data: patternBytes(2000) }],
  signature: 'R190',
  size: 2048,
});

describe('EarbudsDevice', () => {
  let directory: string;
  let transport: FakeTransport;
  let device: EarbudsDevice;

  beforeEach(async () => {
    useFakeClock();
    directory = await mkdtemp(join(tmpdir(), 'budlink-device-'));
    transport = new FakeTransport();
    device = new EarbudsDevice({
      transport,
      address: 'AA:BB:CC:DD:EE:FF',
      model: DeviceModel.BudsPro,
      recoveryDirectory: directory,
    });
    device.connection.deviceStatus.update({
      batteryLeft: 80,
      batteryRight: 80,
      flags: 0,
      firmwareVersion: 'R190XXU0AUB1',
    });
  });

  afterEach(async () => {
    const teardown = device.cancelFirmwareUpdate();
    await vi.advanceTimersByTimeAsync(5_000);
    await teardown;
    await device.disconnect();
    vi.useRealTimers();
    await rm(directory, { recursive: true, force: true });
  });

  it('connects through the transport with the model service', async () => {
    expect(await device.connect()).toBe(true);

    expect(device.isConnected).toBe(true);
    expect(device.connectionState.state).toBe(ConnectionState.Connected);
    expect(transport.connectCalls).toEqual([
      {
        address: 'AA:BB:CC:DD:EE:FF',
        serviceUuid: getDeviceSpec(DeviceModel.BudsPro).serviceUuid,
      },
    ]);
  });

  it('exposes the reported status', () => {
    expect(device.model).toBe(DeviceModel.BudsPro);
    expect(device.status.firmwareVersion).toBe('R190XXU0AUB1');
  });

  describe('installFirmware', () => {
    beforeEach(async () => {
      await device.connect();
    });

    it('rejects an older image by default', async () => {
      await expect(device.installFirmware(IMAGE, 'R190XXU0AUA1')).rejects.toMatchObject({
        code: FirmwareTransferErrorCode.IntegrityCheckFail,
      });
    });

    it('installs an older image when downgrades are allowed', async () => {
      const binary = await device.installFirmware(IMAGE, 'R190XXU0AUA1', {
        allowDowngrade: true,
      });

      expect(binary.allowDowngrade).toBe(true);
      expect(binary.version).toBe('A.U.A1');
      expect(device.transfer.isInProgress).toBe(true);
      expect(transport.sentWithId(DeviceModel.BudsPro, MessageId.FOTA_OPEN)).toHaveLength(1);
      expect(await device.recoveryStore.hasRecord()).toBe(true);
    });

    it('throws parse errors for malformed images', async () => {
      await expect(device.installFirmware(new Uint8Array(8), 'R190XXU0AUB2')).rejects.toBeInstanceOf(
        FirmwareParseError
      );
      expect(transport.sent).toEqual([]);
    });
  });

  it('reports an interrupted update flagged by the device', async () => {
    expect(await device.checkForInterruptedUpdate()).toBe(false);

    device.connection.deviceStatus.update({ flags: DeviceStatusFlag.FirmwareUpdateInProgress });

    expect(await device.checkForInterruptedUpdate()).toBe(true);
  });

  it('fails recovery when nothing is saved', async () => {
    await expect(device.recoverFirmware()).rejects.toMatchObject({
      code: FirmwareTransferErrorCode.RecoveryFailed,
    });
  });

  it('summarizes diagnostics', async () => {
    await device.connect();

    const lines = device.getDiagnosticsReport().split('\n');

    expect(lines.slice(0, 2)).toEqual([
      'Quality: 100/100',
      'Connection attempts: 1 (1 succeeded, 0 failed)',
    ]);
  });
});
