/**
 * SPP connection to a pair of earbuds.
 *
 * Provides:
 * - Connection with bounded retries and exponential backoff
 * - Serialized frame sending with per-send timeouts
 * - A single consumption loop turning inbound bytes into frames
 * - Connection state, diagnostics and device status tracking
 */

import {
  type ConnectionConfig,
  ConnectionConfigSchema,
  type ConnectionOptions,
  type DiagnosticsOptions,
  parseConfig,
} from '../config';
import { TypedEventEmitter } from '../events';
import {
  InvalidResponseError,
  TimeoutError,
  TransportError,
  TransportErrorCode,
} from '../exceptions';
import { createLogger, errorMessage } from '../logger';
import {
  ALTERNATIVE_PROFILE,
  type DeviceSpec,
  getDeviceSpec,
  type ProtocolProfile,
  supports,
} from '../models/device-spec';
import { ConnectionState, DeviceFeature, type DeviceModel, MessageType } from '../models/enums';
import { MessageId } from '../protocol/constants';
import { createFrame, encodeFrame, type Frame } from '../protocol/frame';
import { decodeChunk, ReassemblyBuffer } from '../protocol/reassembler';
import { parseStatusUpdate } from '../protocol/responses';
import { sleep, withTimeout } from '../utils';
import { ConnectionStateManager } from './connection-state';
import { DeviceStatusStore } from './device-status';
import { ConnectionDiagnostics } from './diagnostics';
import { NotificationQueue } from './notification-queue';
import type { Transport } from './transport';

const log = createLogger('connection');

export interface ConnectionEvents {
  connected: [];
  disconnected: [reason: string];
  /** Frame decoded with the device's own protocol */
  message: [frame: Frame];
  /** Frame decoded while alternative mode is enabled */
  alternativeMessage: [frame: Frame];
  transportError: [error: TransportError];
}

export interface ConnectOptions {
  /** Per-attempt timeout (defaults to the configured connect timeout) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Connection manager for one device.
 *
 * @example
 * ```typescript
 * const connection = new DeviceConnection(transport, {
 *   address: '00:11:22:33:44:55',
 *   model: DeviceModel.BudsPro,
 * });
 * connection.on('message', (frame) => console.log(frame.id));
 * if (await connection.connect()) {
 *   await connection.sendRequest(MessageId.GET_STATUS);
 * }
 * ```
 */
export class DeviceConnection extends TypedEventEmitter<ConnectionEvents> {
  readonly state = new ConnectionStateManager();
  readonly diagnostics: ConnectionDiagnostics;
  readonly deviceStatus = new DeviceStatusStore();

  private readonly config: ConnectionConfig;
  private readonly inbound = new NotificationQueue();
  private readonly buffer = new ReassemblyBuffer();
  private alternative = false;
  private consuming = false;
  private disconnecting = false;
  private sendChain: Promise<void> = Promise.resolve();
  private connectAttempt: Promise<boolean> | null = null;

  constructor(
    private readonly transport: Transport,
    options: ConnectionOptions,
    diagnosticsOptions: DiagnosticsOptions = {}
  ) {
    super();
    this.config = parseConfig(ConnectionConfigSchema, options, 'connection options');
    this.diagnostics = new ConnectionDiagnostics(diagnosticsOptions);

    transport.on('data', this.handleData);
    transport.on('disconnected', this.handleLinkLost);
    transport.on('error', this.handleTransportError);
  }

  get address(): string {
    return this.config.address;
  }

  get model(): DeviceModel {
    return this.config.model;
  }

  get spec(): DeviceSpec {
    return getDeviceSpec(this.config.model);
  }

  /**
   * Connected state reached and the byte stream is established.
   */
  get isConnected(): boolean {
    return (
      this.state.state === ConnectionState.Connected && this.transport.isStreamConnected
    );
  }

  get isAlternativeMode(): boolean {
    return this.alternative;
  }

  private get alternativeProfile(): ProtocolProfile {
    return this.config.alternativeProfile ?? ALTERNATIVE_PROFILE;
  }

  private get serviceUuid(): string {
    return this.alternative ? this.alternativeProfile.serviceUuid : this.spec.serviceUuid;
  }

  /**
   * Switch to the secondary protocol profile.
   *
   * Takes effect for the next frames sent and decoded; the service UUID
   * applies from the next connect.
   *
   * @returns false if the model has no alternative protocol
   */
  setAlternativeMode(enabled: boolean): boolean {
    if (enabled && !supports(this.spec, DeviceFeature.AlternativeProtocol)) {
      log.warn('%s has no alternative protocol', this.spec.displayName);
      return false;
    }
    this.alternative = enabled;
    return true;
  }

  /**
   * Connect to the device.
   *
   * Retries failed attempts with exponential backoff. Concurrent callers
   * share the attempt in progress.
   *
   * @returns true once connected, false if every attempt failed
   */
  async connect(options: ConnectOptions = {}): Promise<boolean> {
    if (this.isConnected) {
      return true;
    }
    if (this.connectAttempt) {
      return this.connectAttempt;
    }
    if (!this.state.setConnecting()) {
      log.warn('Cannot connect while %s', this.state.state);
      return false;
    }
    return this.runConnectAttempt(options);
  }

  /**
   * Drop the current stream and connect again.
   *
   * Counts against the state manager's reconnect limit.
   */
  async reconnect(options: ConnectOptions = {}): Promise<boolean> {
    if (this.connectAttempt) {
      return this.connectAttempt;
    }
    if (!this.state.setReconnecting()) {
      return false;
    }

    this.stopSession();
    this.disconnecting = true;
    try {
      await this.transport.disconnect();
    } catch (error) {
      log.warn('Ignoring disconnect failure before reconnect: %s', errorMessage(error));
    } finally {
      this.disconnecting = false;
    }
    return this.runConnectAttempt(options);
  }

  /**
   * Disconnect from the device.
   */
  async disconnect(reason: string = 'Disconnected by user'): Promise<void> {
    if (this.state.state === ConnectionState.Disconnected && !this.transport.isStreamConnected) {
      return;
    }

    this.disconnecting = true;
    this.state.setDisconnecting();
    this.stopSession();

    try {
      await this.transport.disconnect();
    } catch (error) {
      log.warn('Transport disconnect failed: %s', errorMessage(error));
    } finally {
      this.disconnecting = false;
    }

    this.diagnostics.recordDisconnection(reason);
    this.state.setDisconnected();
    log.info('Disconnected: %s', reason);
    this.emit('disconnected', reason);
  }

  /**
   * Send a frame.
   *
   * Sends are serialized: each waits for the previous one to finish.
   *
   * @throws {TransportError} If not connected, the send fails or times out
   */
  async send(frame: Frame): Promise<void> {
    const bytes = encodeFrame(
      frame,
      this.spec,
      this.alternative ? this.alternativeProfile : false
    );

    const result = this.sendChain.then(() => this.write(frame.id, bytes));
    // The caller observes failures through `result`; the chain only orders sends
    this.sendChain = result.catch(() => undefined);
    return result;
  }

  async sendRequest(id: number, payload?: Uint8Array): Promise<void> {
    return this.send(createFrame(id, payload, MessageType.Request));
  }

  async sendResponse(id: number, payload?: Uint8Array): Promise<void> {
    return this.send(createFrame(id, payload, MessageType.Response));
  }

  private async runConnectAttempt(options: ConnectOptions): Promise<boolean> {
    const attempt = this.establish(options).finally(() => {
      this.connectAttempt = null;
    });
    this.connectAttempt = attempt;
    return attempt;
  }

  private async establish(options: ConnectOptions): Promise<boolean> {
    const timeoutMs = options.timeoutMs ?? this.config.connectTimeoutMs;
    const signal = options.signal;
    let backoffMs = this.config.initialBackoffMs;
    let lastError = 'Connection cancelled';

    for (let attempt = 1; attempt <= this.config.maxConnectAttempts; attempt++) {
      if (signal?.aborted) {
        break;
      }

      this.diagnostics.recordConnectionAttempt(this.config.address);
      log.debug(
        'Connecting to %s (attempt %d/%d)',
        this.config.address,
        attempt,
        this.config.maxConnectAttempts
      );

      try {
        await withTimeout(
          (attemptSignal) =>
            this.transport.connect(this.config.address, this.serviceUuid, attemptSignal),
          timeoutMs,
          `Connection attempt timed out after ${timeoutMs}ms`,
          signal
        );

        if (!this.transport.isStreamConnected) {
          throw new TransportError('Stream not established', TransportErrorCode.ConnectFailed);
        }

        this.startSession();
        this.state.setConnected();
        this.diagnostics.recordSuccessfulConnection();
        log.info('Connected to %s', this.config.address);
        this.emit('connected');
        return true;
      } catch (error) {
        lastError = errorMessage(error);
        this.diagnostics.recordFailedConnection(lastError);
        log.warn('Connection attempt %d failed: %s', attempt, lastError);

        if (attempt < this.config.maxConnectAttempts) {
          await sleep(backoffMs, signal);
          backoffMs = Math.min(backoffMs * 2, this.config.maxBackoffMs);
        }
      }
    }

    this.state.setError(`Failed to connect: ${lastError}`);
    return false;
  }

  private async write(id: number, bytes: Uint8Array): Promise<void> {
    if (!this.isConnected) {
      throw new TransportError('Not connected to device', TransportErrorCode.NotConnected);
    }

    try {
      await withTimeout(
        () => this.transport.send(bytes),
        this.config.sendTimeoutMs,
        `Send of message 0x${id.toString(16)} timed out after ${this.config.sendTimeoutMs}ms`
      );
      this.diagnostics.recordMessageSent(id);
    } catch (error) {
      const message = errorMessage(error);
      this.diagnostics.recordSendFailure(message);
      if (error instanceof TimeoutError) {
        throw new TransportError(message, TransportErrorCode.Timeout);
      }
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(`Failed to send: ${message}`, TransportErrorCode.SendFailed);
    }
  }

  private startSession(): void {
    this.buffer.clear();
    this.inbound.clear('Session restarted');
    this.consuming = true;
    this.consume().catch((error: unknown) => {
      log.error('Consumption loop stopped: %s', errorMessage(error));
    });
    this.diagnostics.startHeartbeat(() => this.sendRequest(MessageId.GET_STATUS));
  }

  private stopSession(): void {
    this.consuming = false;
    this.inbound.clear('Connection closed');
    this.diagnostics.stopHeartbeat();
  }

  /**
   * The only writer of the reassembly buffer.
   */
  private async consume(): Promise<void> {
    while (this.consuming) {
      let chunk: Uint8Array;
      try {
        chunk = await this.inbound.dequeue();
      } catch {
        // Queue cleared: the session ended
        break;
      }
      this.processChunks([chunk, ...this.inbound.drain()]);
    }
    this.buffer.clear();
  }

  private processChunks(chunks: Uint8Array[]): void {
    for (const chunk of chunks) {
      this.buffer.append(chunk);
    }

    if (this.buffer.length > this.config.maxBufferBytes) {
      log.warn(
        'Reassembly buffer exceeded %d bytes, keeping newest %d',
        this.config.maxBufferBytes,
        this.config.truncatedBufferBytes
      );
      this.buffer.truncateTo(this.config.truncatedBufferBytes);
    }

    const alternative = this.alternative;
    const frames = decodeChunk(
      this.buffer,
      this.config.model,
      alternative ? this.alternativeProfile : false,
      (error) => this.diagnostics.recordInvalidMessage(`${error.code}: ${error.message}`)
    );

    for (const frame of frames) {
      this.dispatch(frame, alternative);
    }
  }

  private dispatch(frame: Frame, alternative: boolean): void {
    this.diagnostics.recordMessageReceived(frame.id);

    if (!alternative && frame.id === MessageId.STATUS_UPDATED) {
      try {
        this.deviceStatus.update(parseStatusUpdate(frame.payload));
      } catch (error) {
        if (!(error instanceof InvalidResponseError)) {
          throw error;
        }
        this.diagnostics.recordInvalidMessage(error.message);
      }
    }

    try {
      this.emit(alternative ? 'alternativeMessage' : 'message', frame);
    } catch (error) {
      log.error('Message listener failed for 0x%s: %s', frame.id.toString(16), errorMessage(error));
    }
  }

  private readonly handleData = (bytes: Uint8Array): void => {
    if (!this.consuming) {
      log.debug('Dropping %d bytes received outside a session', bytes.length);
      return;
    }
    this.inbound.enqueue(bytes);
  };

  private readonly handleLinkLost = (reason: string): void => {
    if (this.disconnecting || this.connectAttempt) {
      return;
    }
    if (this.state.state === ConnectionState.Disconnected) {
      return;
    }

    log.warn('Link lost: %s', reason);
    this.stopSession();
    this.diagnostics.recordDisconnection(reason);
    this.state.setDisconnected();
    this.emit('disconnected', reason);
  };

  private readonly handleTransportError = (error: TransportError): void => {
    log.warn('Transport error (%s): %s', error.code, error.message);
    this.diagnostics.recordTransportError(`${error.code}: ${error.message}`);
    this.emit('transportError', error);

    if (this.config.autoReconnect && this.state.state === ConnectionState.Connected) {
      this.reconnect().catch((reconnectError: unknown) => {
        log.error('Automatic reconnect failed: %s', errorMessage(reconnectError));
      });
    }
  };
}
