/**
 * Validated connection lifecycle state.
 */

import { TypedEventEmitter } from '../events';
import { createLogger } from '../logger';
import { ConnectionState } from '../models/enums';

const log = createLogger('state');

export interface ConnectionStateEvents {
  stateChanged: [previous: ConnectionState, current: ConnectionState];
}

/**
 * Guards every connection state transition.
 *
 * Transitions are requested through the `setX` methods, which return `false`
 * and leave the state unchanged when the transition is not legal from the
 * current state. No I/O happens here.
 *
 * Legal predecessors:
 * - Connected: Connecting, Reconnecting, Disconnected
 * - Connecting: Disconnected, Error
 * - Disconnected: Disconnecting, Error, Connected, Connecting, Reconnecting
 * - Disconnecting: Connected, Reconnecting
 * - Error: any
 * - Reconnecting: Connected, Error (at most MAX_RECONNECT_ATTEMPTS times)
 */
export class ConnectionStateManager extends TypedEventEmitter<ConnectionStateEvents> {
  static readonly MAX_RECONNECT_ATTEMPTS = 5;

  private _state = ConnectionState.Disconnected;
  private _lastError: string | null = null;
  private _lastTransition = new Date();
  private _reconnectAttempts = 0;

  get state(): ConnectionState {
    return this._state;
  }

  get lastError(): string | null {
    return this._lastError;
  }

  get lastTransition(): Date {
    return this._lastTransition;
  }

  get reconnectAttempts(): number {
    return this._reconnectAttempts;
  }

  /**
   * Connected or Disconnected.
   */
  get isStable(): boolean {
    return (
      this._state === ConnectionState.Connected ||
      this._state === ConnectionState.Disconnected
    );
  }

  get isTransitional(): boolean {
    return (
      this._state === ConnectionState.Connecting ||
      this._state === ConnectionState.Disconnecting ||
      this._state === ConnectionState.Reconnecting
    );
  }

  get isOperationInProgress(): boolean {
    return (
      this._state === ConnectionState.Connecting ||
      this._state === ConnectionState.Reconnecting
    );
  }

  get canConnect(): boolean {
    return (
      this._state === ConnectionState.Disconnected ||
      this._state === ConnectionState.Error
    );
  }

  setConnected(): boolean {
    const applied = this.transition(ConnectionState.Connected, [
      ConnectionState.Connecting,
      ConnectionState.Reconnecting,
      ConnectionState.Disconnected,
    ]);
    if (applied) {
      this._reconnectAttempts = 0;
      this._lastError = null;
    }
    return applied;
  }

  setConnecting(): boolean {
    return this.transition(ConnectionState.Connecting, [
      ConnectionState.Disconnected,
      ConnectionState.Error,
    ]);
  }

  setDisconnected(): boolean {
    const applied = this.transition(ConnectionState.Disconnected, [
      ConnectionState.Disconnecting,
      ConnectionState.Error,
      ConnectionState.Connected,
      ConnectionState.Connecting,
      ConnectionState.Reconnecting,
    ]);
    if (applied) {
      this._reconnectAttempts = 0;
    }
    return applied;
  }

  setDisconnecting(): boolean {
    return this.transition(ConnectionState.Disconnecting, [
      ConnectionState.Connected,
      ConnectionState.Reconnecting,
    ]);
  }

  /**
   * Enter the Error state. Always allowed.
   */
  setError(message: string): boolean {
    this._lastError = message;
    log.warn('Connection error: %s', message);
    this.apply(ConnectionState.Error);
    return true;
  }

  /**
   * Start a reconnect attempt.
   *
   * Once the attempt counter exceeds the maximum the state is forced to Error
   * and `false` is returned.
   */
  setReconnecting(): boolean {
    if (
      this._state !== ConnectionState.Connected &&
      this._state !== ConnectionState.Error
    ) {
      log.debug('Rejected transition %s -> Reconnecting', this._state);
      return false;
    }

    this._reconnectAttempts++;
    if (this._reconnectAttempts > ConnectionStateManager.MAX_RECONNECT_ATTEMPTS) {
      this.setError(
        `Maximum reconnection attempts (${ConnectionStateManager.MAX_RECONNECT_ATTEMPTS}) exceeded`
      );
      return false;
    }

    this.apply(ConnectionState.Reconnecting);
    return true;
  }

  private transition(target: ConnectionState, from: ConnectionState[]): boolean {
    if (!from.includes(this._state)) {
      log.debug('Rejected transition %s -> %s', this._state, target);
      return false;
    }
    this.apply(target);
    return true;
  }

  private apply(target: ConnectionState): void {
    const previous = this._state;
    this._state = target;
    this._lastTransition = new Date();
    if (previous !== target) {
      log.debug('%s -> %s', previous, target);
      this.emit('stateChanged', previous, target);
    }
  }
}
