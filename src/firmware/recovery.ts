/**
 * Resumes a firmware update that was interrupted.
 */

import { parseConfig, type RecoveryConfig, RecoveryConfigSchema, type RecoveryOptions } from '../config';
import {
  FirmwareParseError,
  FirmwareTransferError,
  FirmwareTransferErrorCode,
} from '../exceptions';
import { createLogger, errorMessage } from '../logger';
import { DeviceStatusFlag } from '../models/enums';
import { type DeviceStatus, hasStatusFlag } from '../models/status';
import type { DeviceConnection } from '../transport/connection';
import { sleep } from '../utils';
import { FirmwareBinary } from './binary';
import { verifyFirmware } from './integrity';
import type { RecoveryStore } from './recovery-store';
import type { FirmwareTransferManager } from './transfer';

const log = createLogger('recovery');

/** Marker some devices put in their version string while in recovery */
const RECOVERY_VERSION_MARKER = 'RECOVERY';

/**
 * Detects interrupted updates and reinstalls the saved image.
 *
 * @example
 * ```typescript
 * const recovery = new RecoveryManager(connection, transfer, new RecoveryStore());
 * if (await recovery.detectInterrupted()) {
 *   await recovery.startRecovery();
 * }
 * ```
 */
export class RecoveryManager {
  private readonly config: RecoveryConfig;

  constructor(
    private readonly connection: DeviceConnection,
    private readonly transfer: FirmwareTransferManager,
    readonly store: RecoveryStore,
    options: RecoveryOptions = {}
  ) {
    this.config = parseConfig(RecoveryConfigSchema, options, 'recovery options');
  }

  /**
   * Whether an update was interrupted.
   *
   * True when a recovery record is saved, or the device reports an update in
   * progress or a recovery firmware.
   */
  async detectInterrupted(
    status: DeviceStatus = this.connection.deviceStatus.status
  ): Promise<boolean> {
    if (await this.store.hasRecord()) {
      return true;
    }
    if (hasStatusFlag(status, DeviceStatusFlag.FirmwareUpdateInProgress)) {
      return true;
    }
    return status.firmwareVersion?.toUpperCase().includes(RECOVERY_VERSION_MARKER) ?? false;
  }

  /**
   * Reinstall the saved image and wait for the transfer to finish.
   *
   * Version checks are skipped: the saved image may be older than whatever
   * the device reports while recovering.
   *
   * @throws {FirmwareTransferError} If nothing can be recovered or the
   *   transfer fails or does not finish in time
   */
  async startRecovery(): Promise<void> {
    const saved = await this.store.load();
    if (!saved) {
      throw new FirmwareTransferError(
        FirmwareTransferErrorCode.RecoveryFailed,
        'No saved firmware to recover from.'
      );
    }

    let binary: FirmwareBinary;
    try {
      binary = new FirmwareBinary(saved.data, saved.record.buildName);
    } catch (error) {
      if (error instanceof FirmwareParseError) {
        throw new FirmwareTransferError(
          FirmwareTransferErrorCode.ParseFail,
          `Saved firmware is unreadable: ${error.message}`
        );
      }
      throw error;
    }
    binary.allowDowngrade = true;

    if (!verifyFirmware(binary, { model: this.connection.model })) {
      throw new FirmwareTransferError(FirmwareTransferErrorCode.IntegrityCheckFail);
    }

    if (!this.connection.isConnected && !(await this.connection.connect())) {
      throw new FirmwareTransferError(
        FirmwareTransferErrorCode.Disconnected,
        'Could not connect to the earbuds to recover the firmware.'
      );
    }

    log.info('Recovering firmware %s', binary.buildName);
    this.transfer.enterRecoveryMode();

    let finished = false;
    let failure: FirmwareTransferError | null = null;
    const onFinished = (): void => {
      finished = true;
    };
    const onFailed = (error: FirmwareTransferError): void => {
      failure = error;
    };
    this.transfer.on('finished', onFinished);
    this.transfer.on('failed', onFailed);

    try {
      await this.transfer.install(binary);
      await this.waitForOutcome(() => finished, () => failure);
      await this.store.clear();
      log.info('Firmware recovery finished');
    } finally {
      this.transfer.off('finished', onFinished);
      this.transfer.off('failed', onFailed);
    }
  }

  /**
   * Delete saved recovery data.
   */
  async clear(): Promise<void> {
    await this.store.clear();
  }

  private async waitForOutcome(
    isFinished: () => boolean,
    failure: () => FirmwareTransferError | null
  ): Promise<void> {
    const deadline = Date.now() + this.config.completionTimeoutMs;

    for (;;) {
      const error = failure();
      if (error) {
        throw error;
      }
      if (isFinished()) {
        return;
      }
      if (!this.transfer.isInProgress) {
        throw new FirmwareTransferError(
          FirmwareTransferErrorCode.RecoveryFailed,
          'Firmware recovery stopped without a result.'
        );
      }
      if (Date.now() >= deadline) {
        await this.transfer.cancel().catch((cancelError: unknown) => {
          log.warn('Cancel after recovery timeout failed: %s', errorMessage(cancelError));
        });
        throw new FirmwareTransferError(
          FirmwareTransferErrorCode.RecoveryFailed,
          `Firmware recovery did not finish within ${this.config.completionTimeoutMs}ms.`
        );
      }
      await sleep(this.config.pollIntervalMs);
    }
  }
}
