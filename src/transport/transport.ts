/**
 * Contract between the core and a platform Bluetooth SPP binding.
 */

import type { TypedEventEmitter } from '../events';
import type { TransportError } from '../exceptions';

export interface TransportEvents {
  /** The RFCOMM stream is open */
  connected: [];
  /** The stream closed, locally or remotely */
  disconnected: [reason: string];
  /** Raw bytes, with no alignment to frame boundaries */
  data: [bytes: Uint8Array];
  error: [error: TransportError];
}

/**
 * Platform Bluetooth SPP transport.
 *
 * Implementations must reject `connect` and `send` with a `TransportError`,
 * and must always have an `error` listener attached before emitting it.
 */
export interface Transport
  extends Pick<TypedEventEmitter<TransportEvents>, 'on' | 'off' | 'once'> {
  /**
   * Open the stream to a device.
   *
   * @param address - Device Bluetooth address
   * @param serviceUuid - SPP service to connect to
   * @param signal - Aborts the attempt
   */
  connect(address: string, serviceUuid: string, signal?: AbortSignal): Promise<void>;

  disconnect(): Promise<void>;

  send(bytes: Uint8Array): Promise<void>;

  /** Whether the byte stream is actually established */
  readonly isStreamConnected: boolean;
}
