/**
 * Main earbuds device class.
 */

import {
  type ConnectionOptions,
  defaultRecoveryDirectory,
  type DiagnosticsOptions,
  type RecoveryOptions,
  type TransferOptions,
} from './config';
import { FirmwareBinary } from './firmware/binary';
import { RecoveryManager } from './firmware/recovery';
import { RecoveryStore } from './firmware/recovery-store';
import { FirmwareTransferManager, type TransferDependencies } from './firmware/transfer';
import { createLogger } from './logger';
import type { DeviceModel } from './models/enums';
import type { DeviceStatus } from './models/status';
import { type ConnectOptions, DeviceConnection } from './transport/connection';
import type { ConnectionStateManager } from './transport/connection-state';
import type { ConnectionDiagnostics } from './transport/diagnostics';
import type { Transport } from './transport/transport';

const log = createLogger('device');

export interface EarbudsDeviceOptions {
  transport: Transport;
  address: string;
  model: DeviceModel;
  /** Connection tuning; address and model come from the fields above */
  connection?: Omit<ConnectionOptions, 'address' | 'model'>;
  diagnostics?: DiagnosticsOptions;
  transfer?: TransferOptions;
  recovery?: RecoveryOptions;
  /** Where recovery data is kept (defaults to `BUDLINK_RECOVERY_DIR` or `~/.budlink/recovery`) */
  recoveryDirectory?: string;
  /** Health-check status source; defaults to the last status the device reported */
  readStatus?: TransferDependencies['readStatus'];
}

export interface InstallOptions {
  /** Permit installing a version older than the one on the device */
  allowDowngrade?: boolean;
}

/**
 * Bluetooth earbuds.
 *
 * Main API: connection management, firmware updates and recovery of
 * interrupted updates for one pair of earbuds.
 *
 * @example
 * ```typescript
 * const device = new EarbudsDevice({
 *   transport,
 *   address: '00:11:22:33:44:55',
 *   model: DeviceModel.BudsPro,
 * });
 * await device.connect();
 * device.transfer.on('progress', (percent) => console.log(`${percent}%`));
 * await device.installFirmware(image, 'R190XXU0AUA1');
 * ```
 */
export class EarbudsDevice {
  readonly connection: DeviceConnection;
  readonly transfer: FirmwareTransferManager;
  readonly recovery: RecoveryManager;
  readonly recoveryStore: RecoveryStore;

  constructor(options: EarbudsDeviceOptions) {
    this.connection = new DeviceConnection(
      options.transport,
      { ...options.connection, address: options.address, model: options.model },
      options.diagnostics
    );
    this.recoveryStore = new RecoveryStore(
      options.recoveryDirectory ?? defaultRecoveryDirectory()
    );
    this.transfer = new FirmwareTransferManager(this.connection, options.transfer, {
      recoveryStore: this.recoveryStore,
      readStatus: options.readStatus,
    });
    this.recovery = new RecoveryManager(
      this.connection,
      this.transfer,
      this.recoveryStore,
      options.recovery
    );
  }

  get model(): DeviceModel {
    return this.connection.model;
  }

  get isConnected(): boolean {
    return this.connection.isConnected;
  }

  get connectionState(): ConnectionStateManager {
    return this.connection.state;
  }

  get diagnostics(): ConnectionDiagnostics {
    return this.connection.diagnostics;
  }

  /**
   * Last status the earbuds reported.
   */
  get status(): DeviceStatus {
    return this.connection.deviceStatus.status;
  }

  /**
   * Connect to the earbuds.
   *
   * @returns false if every attempt failed
   */
  async connect(options?: ConnectOptions): Promise<boolean> {
    return this.connection.connect(options);
  }

  async disconnect(): Promise<void> {
    await this.connection.disconnect();
  }

  /**
   * Parse a firmware image and start installing it.
   *
   * Resolves once the transfer has started; follow it through the
   * `transfer` events.
   *
   * @param data - Raw image bytes
   * @param buildName - Build identifier, e.g. "R190XXU0AUA1"
   * @returns The parsed image
   * @throws {FirmwareParseError} If the image is malformed
   * @throws {FirmwareTransferError} If a precondition fails
   */
  async installFirmware(
    data: Uint8Array,
    buildName: string,
    options: InstallOptions = {}
  ): Promise<FirmwareBinary> {
    const binary = new FirmwareBinary(data, buildName);
    binary.allowDowngrade = options.allowDowngrade ?? false;

    log.info('Installing %s (%s) on %s', buildName, binary.version, this.model);
    await this.transfer.install(binary);
    return binary;
  }

  /**
   * Cancel a running firmware transfer.
   */
  async cancelFirmwareUpdate(): Promise<void> {
    await this.transfer.cancel();
  }

  /**
   * Whether a previous firmware update was interrupted.
   */
  async checkForInterruptedUpdate(): Promise<boolean> {
    return this.recovery.detectInterrupted();
  }

  /**
   * Reinstall the firmware of an interrupted update.
   *
   * @throws {FirmwareTransferError} If recovery fails
   */
  async recoverFirmware(): Promise<void> {
    await this.recovery.startRecovery();
  }

  /**
   * Human-readable connection diagnostics.
   */
  getDiagnosticsReport(): string {
    return this.connection.diagnostics.getReport();
  }
}
