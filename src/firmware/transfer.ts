/**
 * Firmware-over-the-air transfer state machine.
 *
 * Protocol outline:
 *   host   -> FOTA_OPEN (segment table)
 *   device -> FOTA_OPEN (session result)
 *   device -> FOTA_CONTROL (MTU, then ready-to-download per segment)
 *   device -> FOTA_DOWNLOAD_DATA (offset, packet count), repeatedly
 *   host   -> FOTA_DOWNLOAD_DATA packets
 *   device -> FOTA_UPDATE (copy progress, state change)
 *   device -> FOTA_RESULT
 */

import { parseConfig, type TransferConfig, TransferConfigSchema, type TransferOptions } from '../config';
import { TypedEventEmitter } from '../events';
import {
  FirmwareTransferError,
  FirmwareTransferErrorCode,
  InvalidResponseError,
  type TransportError,
} from '../exceptions';
import { createLogger, errorMessage } from '../logger';
import { ControlId, DeviceStatusFlag, TransferState, UpdateId } from '../models/enums';
import type { BlockProgress } from '../models/firmware';
import { type DeviceStatus, hasStatusFlag, reportedBatteryLevels } from '../models/status';
import {
  buildAckPayload,
  buildControlPayload,
  buildDownloadDataPayload,
} from '../protocol/commands';
import { MessageId } from '../protocol/constants';
import type { Frame } from '../protocol/frame';
import {
  parseControlMessage,
  parseDownloadRequest,
  parseResultMessage,
  parseSessionResult,
  parseUpdateMessage,
} from '../protocol/responses';
import type { DeviceConnection } from '../transport/connection';
import { sleep } from '../utils';
import type { FirmwareBinary } from './binary';
import { verifyFirmwareDetailed } from './integrity';
import type { RecoveryStore } from './recovery-store';
import { type TimerKind, TransferTimer } from './timers';

const log = createLogger('transfer');

export interface TransferEvents {
  stateChanged: [state: TransferState];
  /** Device-side copy progress */
  progress: [percent: number, bytesDone: number, totalSize: number];
  blockChanged: [block: BlockProgress];
  mtuChanged: [mtu: number];
  segmentChanged: [segmentId: number];
  finished: [];
  failed: [error: FirmwareTransferError];
  statusMessage: [message: string];
  /** Teardown started */
  cancelled: [];
}

export interface TransferDependencies {
  /** Persists recovery data before a transfer starts */
  recoveryStore?: RecoveryStore;
  /**
   * Reads battery and activity state for the health check.
   * Defaults to the connection's last reported status.
   */
  readStatus?: () => Promise<DeviceStatus>;
}

/**
 * Per-transfer fields, dropped by cancel().
 */
interface TransferSession {
  binary: FirmwareBinary;
  abort: AbortController;
  mtu: number;
  segmentId: number;
  progress: number;
}

const TIMER_ERRORS: Record<TimerKind, FirmwareTransferErrorCode> = {
  session: FirmwareTransferErrorCode.SessionTimeout,
  control: FirmwareTransferErrorCode.ControlTimeout,
  transfer: FirmwareTransferErrorCode.TransferTimeout,
  healthCheck: FirmwareTransferErrorCode.DeviceBusy,
};

/**
 * Drives a firmware update over a device connection.
 *
 * `install()` checks preconditions and opens the update session; the rest of
 * the transfer reacts to device messages. Outcomes are reported through the
 * `finished` and `failed` events, after which the link is reset by `cancel()`.
 *
 * @example
 * ```typescript
 * const transfer = new FirmwareTransferManager(connection);
 * transfer.on('progress', (percent) => console.log(`${percent}%`));
 * transfer.on('failed', (error) => console.error(error.message));
 * await transfer.install(new FirmwareBinary(data, buildName));
 * ```
 */
export class FirmwareTransferManager extends TypedEventEmitter<TransferEvents> {
  private readonly config: TransferConfig;
  private readonly recoveryStore: RecoveryStore | null;
  private readonly readStatus: () => Promise<DeviceStatus>;
  private readonly timers: Record<TimerKind, TransferTimer>;

  private _state = TransferState.Ready;
  private session: TransferSession | null = null;
  private teardown: Promise<void> | null = null;
  /** install() is checking preconditions and has no session yet */
  private claimed = false;
  private rejectHealthCheck: ((error: FirmwareTransferError) => void) | null = null;

  constructor(
    private readonly connection: DeviceConnection,
    options: TransferOptions = {},
    dependencies: TransferDependencies = {}
  ) {
    super();
    this.config = parseConfig(TransferConfigSchema, options, 'transfer options');
    this.recoveryStore = dependencies.recoveryStore ?? null;
    this.readStatus =
      dependencies.readStatus ?? (async () => this.connection.deviceStatus.status);

    const onElapsed = (timer: TransferTimer): void => this.handleTimerElapsed(timer);
    this.timers = {
      session: new TransferTimer('session', this.config.sessionTimeoutMs, onElapsed),
      control: new TransferTimer('control', this.config.controlTimeoutMs, onElapsed),
      transfer: new TransferTimer('transfer', this.config.transferTimeoutMs, onElapsed),
      healthCheck: new TransferTimer('healthCheck', this.config.healthCheckTimeoutMs, onElapsed),
    };

    connection.on('message', this.handleMessage);
  }

  get state(): TransferState {
    return this._state;
  }

  /**
   * A transfer is between install() and teardown.
   */
  get isInProgress(): boolean {
    return this._state !== TransferState.Ready && this._state !== TransferState.RecoveryMode;
  }

  get mtu(): number {
    return this.session?.mtu ?? 0;
  }

  get currentSegmentId(): number | undefined {
    return this.session?.segmentId;
  }

  /**
   * Last reported copy progress in percent.
   */
  get progress(): number {
    return this.session?.progress ?? 0;
  }

  /**
   * Whether a timer is currently armed.
   */
  isTimerArmed(kind: TimerKind): boolean {
    return this.timers[kind].armed;
  }

  /**
   * Mark the manager as recovering an interrupted update.
   *
   * @returns false while a transfer is in progress
   */
  enterRecoveryMode(): boolean {
    if (this.isBusy) {
      return false;
    }
    this.setState(TransferState.RecoveryMode);
    return true;
  }

  /**
   * Start installing a firmware image.
   *
   * Resolves once the update session request is sent; the transfer then
   * continues in the background.
   *
   * @throws {FirmwareTransferError} If a precondition fails (state is left
   *   at Ready and nothing is sent) or the session request cannot be sent
   */
  async install(binary: FirmwareBinary): Promise<void> {
    if (this.isBusy) {
      throw new FirmwareTransferError(FirmwareTransferErrorCode.InProgress);
    }

    this.claimed = true;
    try {
      await this.checkPreconditions(binary);
    } finally {
      this.claimed = false;
    }

    this.session = {
      binary,
      abort: new AbortController(),
      mtu: 0,
      segmentId: 0,
      progress: 0,
    };
    const session = this.session;
    this.attachHooks();

    this.setState(TransferState.PreparingUpdate);
    this.setState(TransferState.VerifyingFirmware);
    this.setState(TransferState.CheckingDeviceHealth);
    this.setState(TransferState.BackingUpFirmware);
    await this.backUp(binary);

    if (this.session !== session) {
      throw new FirmwareTransferError(
        FirmwareTransferErrorCode.Disconnected,
        'Firmware update was cancelled before the session started'
      );
    }

    this.setState(TransferState.InitializingSession);
    this.timers.session.start();
    this.timers.transfer.start();
    this.statusMessage(`Opening update session for ${binary.buildName}`);

    try {
      await this.connection.sendRequest(MessageId.FOTA_OPEN, binary.serializeSegmentTable());
    } catch (error) {
      const failure = new FirmwareTransferError(
        FirmwareTransferErrorCode.BluetoothError,
        `Failed to open update session: ${errorMessage(error)}`
      );
      this.fail(failure);
      throw failure;
    }
  }

  /**
   * Abort the current transfer and reset the link.
   *
   * Safe to call repeatedly and concurrently: callers during a teardown share
   * it, and calls with no transfer only make sure the state is Ready.
   */
  async cancel(): Promise<void> {
    if (this.teardown) {
      return this.teardown;
    }

    const session = this.session;
    session?.abort.abort();
    this.detachHooks();
    this.session = null;
    this.setState(TransferState.Ready);
    this.stopTimers();

    if (!session) {
      return;
    }

    log.info('Tearing down firmware transfer');
    try {
      this.emit('cancelled');
    } catch (error) {
      log.error('cancelled listener failed: %s', errorMessage(error));
    }

    this.teardown = this.resetLink().finally(() => {
      this.teardown = null;
    });
    return this.teardown;
  }

  private get isBusy(): boolean {
    return this.isInProgress || this.claimed || this.teardown !== null;
  }

  private async checkPreconditions(binary: FirmwareBinary): Promise<void> {
    try {
      if (!this.connection.isConnected) {
        throw new FirmwareTransferError(
          FirmwareTransferErrorCode.Disconnected,
          'The earbuds must be connected to update the firmware.'
        );
      }

      if (binary.size === 0 || binary.size > this.config.maxBinarySize) {
        throw new FirmwareTransferError(
          FirmwareTransferErrorCode.InvalidBinary,
          `Firmware image of ${binary.size} bytes is empty or exceeds ${this.config.maxBinarySize} bytes`
        );
      }

      const integrity = verifyFirmwareDetailed(binary, {
        model: this.connection.model,
        firmwareVersion: this.connection.deviceStatus.status.firmwareVersion,
      });
      if (!integrity.ok) {
        throw new FirmwareTransferError(
          FirmwareTransferErrorCode.IntegrityCheckFail,
          `Firmware integrity check failed: ${integrity.message}`
        );
      }

      const status = await this.readStatusWithDeadline();

      const levels = reportedBatteryLevels(status);
      if (levels.length === 0) {
        throw new FirmwareTransferError(
          FirmwareTransferErrorCode.BatteryTooLow,
          `Battery level unknown, at least ${this.config.minBatteryPercent}% is required.`
        );
      }
      const lowest = Math.min(...levels);
      if (lowest < this.config.minBatteryPercent) {
        throw new FirmwareTransferError(
          FirmwareTransferErrorCode.BatteryTooLow,
          `Battery at ${lowest}%, at least ${this.config.minBatteryPercent}% is required.`
        );
      }

      if (
        hasStatusFlag(status, DeviceStatusFlag.AudioPlaying) ||
        hasStatusFlag(status, DeviceStatusFlag.CallActive)
      ) {
        throw new FirmwareTransferError(FirmwareTransferErrorCode.DeviceInUse);
      }
    } catch (error) {
      this.setState(TransferState.Ready);
      if (error instanceof FirmwareTransferError) {
        log.warn('Install rejected (%s): %s', error.code, error.message);
        throw error;
      }
      throw new FirmwareTransferError(FirmwareTransferErrorCode.Unknown, errorMessage(error));
    }
  }

  /**
   * Read device status while the health-check timer is armed.
   */
  private readStatusWithDeadline(): Promise<DeviceStatus> {
    return new Promise<DeviceStatus>((resolve, reject) => {
      this.rejectHealthCheck = reject;
      this.timers.healthCheck.start();
      this.readStatus().then(resolve, reject);
    }).finally(() => {
      this.timers.healthCheck.stop();
      this.rejectHealthCheck = null;
    });
  }

  private async backUp(binary: FirmwareBinary): Promise<void> {
    if (!this.recoveryStore) {
      return;
    }

    try {
      await this.recoveryStore.save(binary);
      const installed = this.connection.deviceStatus.status.firmwareVersion;
      if (installed !== undefined) {
        await this.recoveryStore.writeBackupInfo(this.connection.model, installed);
      }
    } catch (error) {
      // Recovery data is a convenience; the update itself can proceed
      log.warn('Could not save recovery data: %s', errorMessage(error));
    }
  }

  private readonly handleMessage = (frame: Frame): void => {
    const session = this.session;
    if (!session) {
      return;
    }

    this.processMessage(frame, session).catch((error: unknown) => {
      if (error instanceof InvalidResponseError) {
        log.warn('Ignoring malformed 0x%s message: %s', frame.id.toString(16), error.message);
        return;
      }
      if (this.session !== session) {
        return;
      }
      this.fail(
        new FirmwareTransferError(
          FirmwareTransferErrorCode.BluetoothError,
          `Failed to answer 0x${frame.id.toString(16)}: ${errorMessage(error)}`
        )
      );
    });
  };

  private async processMessage(frame: Frame, session: TransferSession): Promise<void> {
    switch (frame.id) {
      case MessageId.FOTA_OPEN:
        return this.onSessionResult(frame, session);
      case MessageId.FOTA_CONTROL:
        return this.onControl(frame, session);
      case MessageId.FOTA_DOWNLOAD_DATA:
        return this.onDownloadRequest(frame, session);
      case MessageId.FOTA_UPDATE:
        return this.onUpdate(frame, session);
      case MessageId.FOTA_RESULT:
        return this.onResult(frame, session);
      default:
        return;
    }
  }

  private async onSessionResult(frame: Frame, session: TransferSession): Promise<void> {
    const { resultCode } = parseSessionResult(frame.payload);
    this.timers.session.stop();
    log.debug('Session result %d', resultCode);

    if (resultCode !== 0) {
      this.fail(
        new FirmwareTransferError(
          FirmwareTransferErrorCode.SessionFail,
          `The earbuds refused the update session (code ${resultCode}).`
        )
      );
      return;
    }

    if (this.session === session) {
      this.timers.control.start();
      this.statusMessage('Update session opened');
    }
  }

  private async onControl(frame: Frame, session: TransferSession): Promise<void> {
    const control = parseControlMessage(frame.payload);

    if (control.controlId === ControlId.SendMtu) {
      this.timers.control.stop();
      session.mtu = control.mtu;
      log.debug('MTU negotiated: %d', control.mtu);
      this.emit('mtuChanged', control.mtu);
      await this.connection.sendResponse(
        MessageId.FOTA_CONTROL,
        buildControlPayload(ControlId.SendMtu, control.mtu)
      );
      return;
    }

    session.segmentId = control.segmentId;
    log.debug('Device ready to download segment %d', control.segmentId);
    this.emit('segmentChanged', control.segmentId);
    await this.connection.sendResponse(
      MessageId.FOTA_CONTROL,
      buildControlPayload(ControlId.ReadyToDownload, control.segmentId)
    );
  }

  private async onDownloadRequest(frame: Frame, session: TransferSession): Promise<void> {
    const request = parseDownloadRequest(frame.payload);
    const segment = session.binary.getSegmentById(session.segmentId);

    if (!segment) {
      this.fail(
        new FirmwareTransferError(
          FirmwareTransferErrorCode.Unknown,
          `The earbuds requested unknown segment ${session.segmentId}.`
        )
      );
      return;
    }
    if (session.mtu === 0) {
      this.fail(
        new FirmwareTransferError(
          FirmwareTransferErrorCode.Unknown,
          'The earbuds requested data before negotiating an MTU.'
        )
      );
      return;
    }

    if (this._state !== TransferState.Uploading) {
      this.setState(TransferState.Uploading);
    }

    this.emit('blockChanged', {
      segmentId: segment.id,
      windowStart: request.offset,
      windowEnd: request.offset + session.mtu * request.packets,
      packets: request.packets,
      segmentSize: segment.size,
      segmentCrc32: segment.crc32,
    });

    const bytes = session.binary.getSegmentBytes(segment);
    for (let i = 0; i < request.packets; i++) {
      if (session.abort.signal.aborted) {
        return;
      }

      const start = request.offset + i * session.mtu;
      if (start >= bytes.length) {
        break;
      }
      const end = Math.min(start + session.mtu, bytes.length);

      await this.connection.sendRequest(
        MessageId.FOTA_DOWNLOAD_DATA,
        buildDownloadDataPayload(start, bytes.subarray(start, end), end === bytes.length)
      );
    }
  }

  private async onUpdate(frame: Frame, session: TransferSession): Promise<void> {
    const update = parseUpdateMessage(frame.payload);

    if (update.updateId === UpdateId.Percent) {
      const totalSize = session.binary.totalSize;
      const bytesDone = Math.round((totalSize * update.percent) / 100);
      session.progress = update.percent;
      log.debug('Copy progress %d%% (%d/%d bytes)', update.percent, bytesDone, totalSize);
      this.emit('progress', update.percent, bytesDone, totalSize);

      if (update.percent >= 100 && this._state === TransferState.Uploading) {
        this.setState(TransferState.VerifyingUpdate);
      }
      return;
    }

    await this.connection.sendResponse(MessageId.FOTA_UPDATE, buildAckPayload());
    log.debug('Device state %d, result %d', update.state, update.resultCode);

    if (update.resultCode === 0) {
      this.complete(session);
    } else {
      this.fail(
        new FirmwareTransferError(
          FirmwareTransferErrorCode.CopyFail,
          `The earbuds failed to copy the firmware (code ${update.resultCode}).`
        )
      );
    }
  }

  private async onResult(frame: Frame, session: TransferSession): Promise<void> {
    const result = parseResultMessage(frame.payload);
    await this.connection.sendResponse(MessageId.FOTA_RESULT, buildAckPayload());
    log.debug('Result %d, error code %d', result.result, result.errorCode);

    if (result.result === 0) {
      this.complete(session);
    } else {
      this.fail(
        new FirmwareTransferError(
          FirmwareTransferErrorCode.VerifyFail,
          `The earbuds rejected the firmware (error ${result.errorCode}).`
        )
      );
    }
  }

  private complete(session: TransferSession): void {
    if (this.session !== session) {
      return;
    }

    this.setState(TransferState.Finalizing);
    this.statusMessage('Firmware transferred; the earbuds will now install it');
    log.info('Firmware transfer of %s finished', session.binary.buildName);

    try {
      this.emit('finished');
    } catch (error) {
      log.error('finished listener failed: %s', errorMessage(error));
    }

    if (this.recoveryStore) {
      this.recoveryStore.clear().catch((error: unknown) => {
        log.warn('Could not clear recovery data: %s', errorMessage(error));
      });
    }

    this.scheduleCancel();
  }

  /**
   * Report a terminal error and tear the transfer down.
   */
  private fail(error: FirmwareTransferError): void {
    log.error('Firmware transfer failed (%s): %s', error.code, error.message);
    try {
      this.emit('failed', error);
    } catch (listenerError) {
      log.error('failed listener threw: %s', errorMessage(listenerError));
    }
    this.scheduleCancel();
  }

  private handleTimerElapsed(timer: TransferTimer): void {
    timer.stop();

    const error = new FirmwareTransferError(TIMER_ERRORS[timer.kind]);
    try {
      if (timer.kind === 'healthCheck') {
        this.rejectHealthCheck?.(error);
        this.emit('failed', error);
        return;
      }
      if (!this.session) {
        log.debug('Ignoring %s timeout after teardown', timer.kind);
        return;
      }
      this.fail(error);
    } catch (handlerError) {
      log.error('Timeout handling failed: %s', errorMessage(handlerError));
      this.scheduleCancel();
    }
  }

  private scheduleCancel(): void {
    this.cancel().catch((error: unknown) => {
      log.error('Teardown failed: %s', errorMessage(error));
    });
  }

  /**
   * Return the link to a known-good state after a transfer.
   */
  private async resetLink(): Promise<void> {
    if (this.connection.isConnected) {
      try {
        await this.connection.sendRequest(MessageId.FOTA_ABORT);
      } catch (error) {
        log.debug('Abort request not delivered: %s', errorMessage(error));
      }
    }

    await sleep(this.config.abortSettleMs);
    await this.connection.disconnect('Firmware transfer ended');
    await sleep(this.config.reconnectDelayMs);

    if (await this.connection.connect()) {
      return;
    }

    this.statusMessage('Reconnect failed, retrying');
    await sleep(this.config.reconnectRetryDelayMs);
    if (await this.connection.connect({ timeoutMs: this.config.reconnectRetryTimeoutMs })) {
      return;
    }

    log.warn('Could not reconnect after firmware transfer');
    this.statusMessage('Could not reconnect to the earbuds. Reconnect manually.');
  }

  private attachHooks(): void {
    this.detachHooks();
    this.connection.on('disconnected', this.handleDisconnected);
    this.connection.on('transportError', this.handleTransportError);
  }

  private detachHooks(): void {
    this.connection.off('disconnected', this.handleDisconnected);
    this.connection.off('transportError', this.handleTransportError);
  }

  private readonly handleDisconnected = (reason: string): void => {
    this.fail(
      new FirmwareTransferError(
        FirmwareTransferErrorCode.Disconnected,
        `The earbuds disconnected during the firmware update: ${reason}`
      )
    );
  };

  private readonly handleTransportError = (error: TransportError): void => {
    this.fail(
      new FirmwareTransferError(
        FirmwareTransferErrorCode.BluetoothError,
        `Bluetooth error during the firmware update: ${error.message}`
      )
    );
  };

  private stopTimers(): void {
    for (const timer of Object.values(this.timers)) {
      timer.stop();
    }
  }

  private setState(state: TransferState): void {
    if (this._state === state) {
      return;
    }
    log.debug('%s -> %s', this._state, state);
    this._state = state;
    this.emit('stateChanged', state);
  }

  private statusMessage(message: string): void {
    this.emit('statusMessage', message);
  }
}
