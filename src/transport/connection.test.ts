import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TransportError, TransportErrorCode } from '../exceptions';
import { ALTERNATIVE_PROFILE, getDeviceSpec, SERVICE_UUID } from '../models/device-spec';
import { ConnectionState, DeviceModel } from '../models/enums';
import { MessageId } from '../protocol/constants';
import { createFrame, encodeFrame, type Frame } from '../protocol/frame';
import { flush, useFakeClock } from '../testing/clock';
import { FakeTransport } from '../testing/fake-transport';
import { DeviceConnection } from './connection';

const MODEL = DeviceModel.BudsPro;
const ADDRESS = 'AA:BB:CC:DD:EE:FF';

// GET_STATUS request, 7 bytes on the wire
const STATUS_REQUEST = Uint8Array.of(0xfd, 0x03, 0x00, 0x62, 0xe4, 0x4c, 0xdd);

describe('DeviceConnection', () => {
  let transport: FakeTransport;
  let connection: DeviceConnection;

  beforeEach(() => {
    useFakeClock();
    transport = new FakeTransport();
    connection = new DeviceConnection(transport, { address: ADDRESS, model: MODEL });
  });

  afterEach(async () => {
    await connection.disconnect();
    vi.useRealTimers();
  });

  describe('connect', () => {
    it('opens the stream on the model service', async () => {
      const connected = vi.fn();
      connection.on('connected', connected);

      await expect(connection.connect()).resolves.toBe(true);

      expect(connection.isConnected).toBe(true);
      expect(connection.state.state).toBe(ConnectionState.Connected);
      expect(transport.connectCalls).toEqual([{ address: ADDRESS, serviceUuid: SERVICE_UUID }]);
      expect(connected).toHaveBeenCalledTimes(1);
      expect(connection.diagnostics.counters.successfulConnections).toBe(1);
    });

    it('retries with exponential backoff', async () => {
      transport.failConnects = 2;

      const result = connection.connect();
      // 500ms, then 1000ms between attempts
      await vi.advanceTimersByTimeAsync(1_500);

      await expect(result).resolves.toBe(true);
      expect(transport.connectCalls).toHaveLength(3);
      expect(connection.diagnostics.counters.failedConnections).toBe(2);
    });

    it('enters Error when every attempt fails', async () => {
      transport.failConnects = 3;

      const result = connection.connect();
      await vi.advanceTimersByTimeAsync(1_500);

      await expect(result).resolves.toBe(false);
      expect(connection.state.state).toBe(ConnectionState.Error);
      expect(connection.state.lastError).toBe('Failed to connect: Connection refused');
    });

    it('shares an attempt already in progress', async () => {
      const first = connection.connect();
      const second = connection.connect();

      await expect(Promise.all([first, second])).resolves.toEqual([true, true]);
      expect(transport.connectCalls).toHaveLength(1);
    });

    it('is a no-op when already connected', async () => {
      await connection.connect();

      await expect(connection.connect()).resolves.toBe(true);
      expect(transport.connectCalls).toHaveLength(1);
    });
  });

  describe('receiving', () => {
    it('reassembles frames split across chunks', async () => {
      const messages: Frame[] = [];
      connection.on('message', (frame) => messages.push(frame));
      await connection.connect();

      transport.receive(STATUS_REQUEST.subarray(0, 3));
      transport.receive(STATUS_REQUEST.subarray(3));
      await flush();

      expect(messages.map((frame) => frame.id)).toEqual([MessageId.GET_STATUS]);
      expect(connection.diagnostics.counters.messagesReceived).toBe(1);
    });

    it('tracks status updates', async () => {
      await connection.connect();
      const version = new TextEncoder().encode('R190XXU0AUA1');

      transport.receiveFrame(
        MODEL,
        MessageId.STATUS_UPDATED,
        Uint8Array.of(80, 75, 0xff, 0x01, version.length, ...version)
      );
      await flush();

      expect(connection.deviceStatus.status).toEqual({
        batteryLeft: 80,
        batteryRight: 75,
        batteryCase: undefined,
        flags: 0x01,
        firmwareVersion: 'R190XXU0AUA1',
      });
    });

    it('keeps only the newest bytes when the buffer overflows', async () => {
      const capped = new DeviceConnection(transport, {
        address: ADDRESS,
        model: MODEL,
        maxBufferBytes: 40,
        truncatedBufferBytes: 10,
      });
      const messages: Frame[] = [];
      capped.on('message', (frame) => messages.push(frame));
      await capped.connect();

      // Six frames declaring an invalid size reach the failure limit
      const bad = [0xfd, 0x02, 0x00, 0x62, 0x00, 0x01];
      const garbage = Array.from({ length: 6 }, () => bad).flat();
      transport.receive(Uint8Array.from([...garbage, ...STATUS_REQUEST]));
      await flush();

      expect(messages).toHaveLength(1);
      expect(capped.diagnostics.counters.invalidMessages).toBe(1);
      await capped.disconnect();
    });

    it('records a link lost by the remote side', async () => {
      const disconnected = vi.fn();
      connection.on('disconnected', disconnected);
      await connection.connect();

      transport.dropLink('Remote closed');

      expect(disconnected).toHaveBeenCalledWith('Remote closed');
      expect(connection.state.state).toBe(ConnectionState.Disconnected);
      expect(connection.diagnostics.counters.disconnections).toBe(1);
    });
  });

  describe('send', () => {
    it('encodes and writes the frame', async () => {
      await connection.connect();

      await connection.sendRequest(MessageId.GET_STATUS);

      expect(transport.sent).toEqual([STATUS_REQUEST]);
      expect(connection.diagnostics.counters.messagesSent).toBe(1);
    });

    it('preserves order of concurrent sends', async () => {
      await connection.connect();

      await Promise.all([
        connection.sendRequest(0x10),
        connection.sendResponse(0x11),
        connection.sendRequest(0x12),
      ]);

      expect(transport.sentFrames(MODEL).map((frame) => frame.id)).toEqual([0x10, 0x11, 0x12]);
    });

    it('fails when not connected', async () => {
      await expect(connection.sendRequest(0x62)).rejects.toMatchObject({
        code: TransportErrorCode.NotConnected,
      });
    });

    it('wraps transport failures', async () => {
      await connection.connect();
      transport.sendHandler = () => {
        throw new Error('radio off');
      };

      await expect(connection.sendRequest(0x62)).rejects.toThrow(
        new TransportError('Failed to send: radio off', TransportErrorCode.SendFailed)
      );
      expect(connection.diagnostics.quality).toBe(90);
    });

    it('times out a stalled send', async () => {
      await connection.connect();
      transport.sendHandler = () => new Promise<void>(() => undefined);

      const assertion = expect(connection.sendRequest(0x62)).rejects.toMatchObject({
        code: TransportErrorCode.Timeout,
      });
      await vi.advanceTimersByTimeAsync(5_000);

      await assertion;
    });
  });

  describe('disconnect', () => {
    it('closes the stream and reports once', async () => {
      const disconnected = vi.fn();
      connection.on('disconnected', disconnected);
      await connection.connect();

      await connection.disconnect();

      expect(disconnected).toHaveBeenCalledTimes(1);
      expect(disconnected).toHaveBeenCalledWith('Disconnected by user');
      expect(transport.isStreamConnected).toBe(false);
      expect(connection.state.state).toBe(ConnectionState.Disconnected);
      expect(connection.diagnostics.isHeartbeatActive).toBe(false);
    });
  });

  describe('transport errors', () => {
    it('reports the error without reconnecting by default', async () => {
      const errors = vi.fn();
      connection.on('transportError', errors);
      await connection.connect();

      transport.fail(new TransportError('reset', TransportErrorCode.Unknown));
      await flush();

      expect(errors).toHaveBeenCalledTimes(1);
      expect(connection.diagnostics.quality).toBe(80);
      expect(transport.connectCalls).toHaveLength(1);
    });

    it('reconnects when enabled', async () => {
      const auto = new DeviceConnection(transport, {
        address: ADDRESS,
        model: MODEL,
        autoReconnect: true,
      });
      auto.on('transportError', () => undefined);
      await auto.connect();

      transport.fail(new TransportError('reset', TransportErrorCode.Unknown));
      await flush();

      expect(transport.connectCalls).toHaveLength(2);
      expect(auto.state.state).toBe(ConnectionState.Connected);
      expect(auto.state.reconnectAttempts).toBe(0);
      await auto.disconnect();
    });
  });

  describe('alternative mode', () => {
    it('is refused by models without the alternative protocol', () => {
      expect(connection.setAlternativeMode(true)).toBe(false);
      expect(connection.isAlternativeMode).toBe(false);
    });

    it('uses the alternative profile for the service and framing', async () => {
      const alt = new DeviceConnection(transport, {
        address: ADDRESS,
        model: DeviceModel.Buds2Pro,
      });
      const messages: Frame[] = [];
      alt.on('alternativeMessage', (frame) => messages.push(frame));

      expect(alt.setAlternativeMode(true)).toBe(true);
      await alt.connect();
      transport.receive(
        encodeFrame(createFrame(0x62), getDeviceSpec(DeviceModel.Buds2Pro), true)
      );
      await flush();

      expect(transport.connectCalls[0].serviceUuid).toBe(ALTERNATIVE_PROFILE.serviceUuid);
      expect(messages.map((frame) => frame.id)).toEqual([0x62]);
      await alt.disconnect();
    });
  });
});
