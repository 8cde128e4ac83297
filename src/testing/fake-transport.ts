/**
 * In-process transport for tests.
 */

import { TypedEventEmitter } from '../events';
import { TransportError, TransportErrorCode } from '../exceptions';
import { getDeviceSpec } from '../models/device-spec';
import { type DeviceModel, MessageType } from '../models/enums';
import { createFrame, decodeFrame, encodeFrame, type Frame } from '../protocol/frame';
import type { Transport, TransportEvents } from '../transport/transport';

export interface ConnectCall {
  address: string;
  serviceUuid: string;
}

/**
 * Transport double: records writes and lets tests inject device traffic.
 */
export class FakeTransport extends TypedEventEmitter<TransportEvents> implements Transport {
  readonly sent: Uint8Array[] = [];
  readonly connectCalls: ConnectCall[] = [];

  /** Number of upcoming connect() calls that fail */
  failConnects = 0;
  /** Runs on every send; throw to fail it */
  sendHandler: ((bytes: Uint8Array) => Promise<void> | void) | null = null;

  private connected = false;

  get isStreamConnected(): boolean {
    return this.connected;
  }

  async connect(address: string, serviceUuid: string): Promise<void> {
    this.connectCalls.push({ address, serviceUuid });
    if (this.failConnects > 0) {
      this.failConnects--;
      throw new TransportError('Connection refused', TransportErrorCode.ConnectFailed);
    }
    this.connected = true;
    this.emit('connected');
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    this.emit('disconnected', 'Closed locally');
  }

  async send(bytes: Uint8Array): Promise<void> {
    if (!this.connected) {
      throw new TransportError('Stream closed', TransportErrorCode.NotConnected);
    }
    this.sent.push(bytes);
    await this.sendHandler?.(bytes);
  }

  /**
   * Deliver raw bytes as if the device sent them.
   */
  receive(bytes: Uint8Array): void {
    this.emit('data', bytes);
  }

  /**
   * Encode and deliver a device message.
   */
  receiveFrame(
    model: DeviceModel,
    id: number,
    payload: Uint8Array = new Uint8Array(0),
    type: MessageType = MessageType.Response
  ): void {
    this.receive(encodeFrame(createFrame(id, payload, type), getDeviceSpec(model)));
  }

  fail(error: TransportError): void {
    this.emit('error', error);
  }

  /**
   * Simulate the remote side closing the stream.
   */
  dropLink(reason: string = 'Link lost'): void {
    this.connected = false;
    this.emit('disconnected', reason);
  }

  /**
   * Decode everything written so far.
   */
  sentFrames(model: DeviceModel): Frame[] {
    const spec = getDeviceSpec(model);
    return this.sent.map((bytes) => decodeFrame(bytes, spec));
  }

  /**
   * Decoded writes with one message id.
   */
  sentWithId(model: DeviceModel, id: number): Frame[] {
    return this.sentFrames(model).filter((frame) => frame.id === id);
  }
}
