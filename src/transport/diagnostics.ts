/**
 * Connection diagnostics: event history, counters, quality score and
 * heartbeat liveness probing.
 */

import {
  type DiagnosticsConfig,
  DiagnosticsConfigSchema,
  type DiagnosticsOptions,
  parseConfig,
} from '../config';
import { TypedEventEmitter } from '../events';
import { createLogger, errorMessage } from '../logger';
import { DiagnosticEventType } from '../models/enums';

const log = createLogger('diagnostics');

export interface DiagnosticEvent {
  timestamp: Date;
  type: DiagnosticEventType;
  message: string;
}

export interface DiagnosticCounters {
  connectionAttempts: number;
  successfulConnections: number;
  failedConnections: number;
  disconnections: number;
  messagesSent: number;
  messagesReceived: number;
  invalidMessages: number;
}

export interface DiagnosticsEvents {
  event: [event: DiagnosticEvent];
  /** Heartbeat considers the link dead; disconnecting is left to the caller */
  connectionDead: [reason: string];
}

/**
 * Sends one lightweight request; rejects when it fails or times out.
 */
export type HeartbeatProbe = () => Promise<void>;

function emptyCounters(): DiagnosticCounters {
  return {
    connectionAttempts: 0,
    successfulConnections: 0,
    failedConnections: 0,
    disconnections: 0,
    messagesSent: 0,
    messagesReceived: 0,
    invalidMessages: 0,
  };
}

/**
 * Observes a connection and keeps a bounded diagnostic record of it.
 */
export class ConnectionDiagnostics extends TypedEventEmitter<DiagnosticsEvents> {
  // Quality penalties
  static readonly PENALTY_TRANSPORT_ERROR = 20;
  static readonly PENALTY_MISSED_HEARTBEAT = 15;
  static readonly PENALTY_SEND_FAILURE = 10;
  static readonly PENALTY_INVALID_MESSAGE = 5;
  static readonly MAX_QUALITY = 100;

  private readonly config: DiagnosticsConfig;
  private history: DiagnosticEvent[] = [];
  private _counters = emptyCounters();
  private _quality = ConnectionDiagnostics.MAX_QUALITY;

  private heartbeatTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatProbe: HeartbeatProbe | null = null;
  private heartbeatGeneration = 0;
  private missedHeartbeats = 0;
  private lastHeartbeatSuccess = 0;
  private deadReported = false;

  constructor(options: DiagnosticsOptions = {}) {
    super();
    this.config = parseConfig(DiagnosticsConfigSchema, options, 'diagnostics options');
  }

  /**
   * Link quality from 0 (dead) to 100.
   */
  get quality(): number {
    return this._quality;
  }

  get counters(): Readonly<DiagnosticCounters> {
    return { ...this._counters };
  }

  get isHeartbeatActive(): boolean {
    return this.heartbeatProbe !== null;
  }

  get consecutiveMissedHeartbeats(): number {
    return this.missedHeartbeats;
  }

  /**
   * Most recent events, oldest first.
   */
  getRecentEvents(count: number = this.config.historySize): DiagnosticEvent[] {
    return this.history.slice(-count);
  }

  recordConnectionAttempt(address: string): void {
    this._counters.connectionAttempts++;
    this.record(DiagnosticEventType.ConnectionAttempt, `Connecting to ${address}`);
  }

  recordSuccessfulConnection(): void {
    this._counters.successfulConnections++;
    this._quality = ConnectionDiagnostics.MAX_QUALITY;
    this.record(DiagnosticEventType.ConnectionSuccess, 'Connected');
  }

  recordFailedConnection(reason: string): void {
    this._counters.failedConnections++;
    this.record(DiagnosticEventType.ConnectionFailure, reason);
  }

  recordDisconnection(reason: string): void {
    this._counters.disconnections++;
    this.record(DiagnosticEventType.Disconnection, reason);
  }

  recordTransportError(reason: string): void {
    this.penalize(ConnectionDiagnostics.PENALTY_TRANSPORT_ERROR);
    this.record(DiagnosticEventType.TransportError, reason);
  }

  recordMessageSent(messageId: number): void {
    this._counters.messagesSent++;
    this.record(DiagnosticEventType.MessageSent, `Sent 0x${hex(messageId)}`);
  }

  recordMessageReceived(messageId: number): void {
    this._counters.messagesReceived++;
    this.record(DiagnosticEventType.MessageReceived, `Received 0x${hex(messageId)}`);
  }

  recordInvalidMessage(reason: string): void {
    this._counters.invalidMessages++;
    this.penalize(ConnectionDiagnostics.PENALTY_INVALID_MESSAGE);
    this.record(DiagnosticEventType.InvalidMessage, reason);
  }

  recordSendFailure(reason: string): void {
    this.penalize(ConnectionDiagnostics.PENALTY_SEND_FAILURE);
    this.record(DiagnosticEventType.SendFailure, reason);
  }

  /**
   * Probe the link periodically while connected.
   *
   * Replaces any running heartbeat.
   */
  startHeartbeat(probe: HeartbeatProbe): void {
    this.stopHeartbeat();
    this.heartbeatProbe = probe;
    this.heartbeatGeneration++;
    this.missedHeartbeats = 0;
    this.lastHeartbeatSuccess = Date.now();
    this.deadReported = false;
    this.scheduleHeartbeat();
  }

  stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearTimeout(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.heartbeatProbe = null;
    this.heartbeatGeneration++;
  }

  /**
   * Clear history and counters. Heartbeat state is kept.
   */
  reset(): void {
    this.history = [];
    this._counters = emptyCounters();
    this._quality = ConnectionDiagnostics.MAX_QUALITY;
  }

  /**
   * Multi-line human readable summary.
   */
  getReport(): string {
    const c = this._counters;
    const lines = [
      `Quality: ${this._quality}/${ConnectionDiagnostics.MAX_QUALITY}`,
      `Connection attempts: ${c.connectionAttempts} ` +
        `(${c.successfulConnections} succeeded, ${c.failedConnections} failed)`,
      `Disconnections: ${c.disconnections}`,
      `Messages: ${c.messagesSent} sent, ${c.messagesReceived} received, ` +
        `${c.invalidMessages} invalid`,
      `Heartbeat: ${this.isHeartbeatActive ? `active, ${this.missedHeartbeats} missed` : 'inactive'}`,
      'Recent events:',
      ...this.getRecentEvents(10).map(
        (event) => `  ${event.timestamp.toISOString()} ${event.type}: ${event.message}`
      ),
    ];
    return lines.join('\n');
  }

  private scheduleHeartbeat(): void {
    this.heartbeatTimer = setTimeout(() => {
      this.heartbeatTimer = null;
      this.beat().catch((error: unknown) => {
        log.error('Heartbeat failed unexpectedly: %s', errorMessage(error));
      });
    }, this.config.heartbeatIntervalMs);
  }

  private async beat(): Promise<void> {
    const probe = this.heartbeatProbe;
    const generation = this.heartbeatGeneration;
    if (!probe) {
      return;
    }

    try {
      await probe();
      this.missedHeartbeats = 0;
      this.lastHeartbeatSuccess = Date.now();
      this.deadReported = false;
      this.record(DiagnosticEventType.HeartbeatSuccess, 'Heartbeat acknowledged');
    } catch (error) {
      this.missedHeartbeats++;
      this.penalize(ConnectionDiagnostics.PENALTY_MISSED_HEARTBEAT);
      this.record(
        DiagnosticEventType.HeartbeatMissed,
        `Heartbeat ${this.missedHeartbeats} missed: ${errorMessage(error)}`
      );
    }

    // Stopped or restarted while the probe was in flight
    if (this.heartbeatGeneration !== generation) {
      return;
    }

    const silentFor = Date.now() - this.lastHeartbeatSuccess;
    if (
      this.missedHeartbeats >= this.config.maxMissedHeartbeats ||
      silentFor > this.config.deadAfterMs
    ) {
      this.markDead(
        this.missedHeartbeats >= this.config.maxMissedHeartbeats
          ? `${this.missedHeartbeats} consecutive heartbeats missed`
          : `No heartbeat response for ${silentFor}ms`
      );
    }

    this.scheduleHeartbeat();
  }

  private markDead(reason: string): void {
    this._quality = 0;
    if (this.deadReported) {
      return;
    }
    this.deadReported = true;
    log.warn('Connection appears dead: %s', reason);
    this.record(DiagnosticEventType.ConnectionDead, reason);
    this.emit('connectionDead', reason);
  }

  private penalize(amount: number): void {
    this._quality = Math.max(0, this._quality - amount);
  }

  private record(type: DiagnosticEventType, message: string): void {
    const event: DiagnosticEvent = { timestamp: new Date(), type, message };
    this.history.push(event);
    if (this.history.length > this.config.historySize) {
      this.history.shift();
    }
    this.emit('event', event);
  }
}

function hex(value: number): string {
  return value.toString(16).padStart(2, '0');
}
