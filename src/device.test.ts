import { describe, it, expect, vi } from 'vitest';
import { TimeFlipDevice } from './device';
import {
  BLEConnectionError,
  CommandExecutionError,
  InvalidArgumentError,
  InvalidResponseError,
  LoginRequiredError,
  MalformedResultError,
  NotConnectedError,
  NotTargetDeviceError,
} from './exceptions';
import { Characteristic } from './protocol/constants';
import { encodeHistoryRecord } from './protocol/history';
import { MemoryBleLink } from './transport/memory-link';

const FACET = Characteristic.facet;
const INPUT = Characteristic.commandInput;
const RESULT = Characteristic.commandResult;

function silentLogger() {
  return { log: vi.fn(), debug: vi.fn(), warn: vi.fn() };
}

function result(...leading: number[]): Uint8Array {
  const data = new Uint8Array(21);
  data.set(leading);
  return data;
}

function historyPacket(records: Array<[number, number]>): Uint8Array {
  const data = new Uint8Array(21);
  records.forEach(([facet, durationSeconds], i) => {
    data.set(encodeHistoryRecord({ facet, durationSeconds }), i * 3);
  });
  return data;
}

async function connectedDevice(password?: string) {
  const link = new MemoryBleLink().setValue(FACET, [0x05]);
  const device = new TimeFlipDevice(link, { logger: silentLogger(), password });
  await device.connect();
  return { link, device };
}

async function loggedInDevice() {
  const ctx = await connectedDevice();
  await ctx.device.login();
  return ctx;
}

function writes(link: MemoryBleLink) {
  return link.callsOf('write').map((c) => ({ characteristic: c.characteristic, data: c.data }));
}

describe('TimeFlipDevice', () => {
  describe('connect', () => {
    it('should probe the facet characteristic after connecting', async () => {
      const { link, device } = await connectedDevice();

      expect(device.state).toBe('connected');
      expect(link.calls).toEqual([{ op: 'connect' }, { op: 'read', characteristic: FACET }]);
    });

    it('should report transport failures as BLEConnectionError', async () => {
      const link = new MemoryBleLink()
        .setValue(FACET, [0x05])
        .failNext('connect', new Error('radio off'));
      const device = new TimeFlipDevice(link, { logger: silentLogger() });

      await expect(device.connect()).rejects.toThrow('Failed to connect: radio off');
      await expect(device.connect()).resolves.toBeUndefined();
    });

    it('should reject peers that fail the facet probe', async () => {
      const link = new MemoryBleLink().failNext('read', new Error('unknown attribute'), FACET);
      const device = new TimeFlipDevice(link, { logger: silentLogger() });

      await expect(device.connect()).rejects.toBeInstanceOf(NotTargetDeviceError);
      expect(device.state).toBe('disconnected');
      expect(link.calls.map((c) => c.op)).toEqual(['connect', 'read', 'disconnect']);
      expect(link.isConnected).toBe(false);
    });

    it('should do nothing when already connected', async () => {
      const { link, device } = await connectedDevice();

      await device.connect();

      expect(link.callsOf('connect')).toHaveLength(1);
    });
  });

  describe('disconnect', () => {
    it('should require a connection', async () => {
      const link = new MemoryBleLink();
      const device = new TimeFlipDevice(link, { logger: silentLogger() });

      await expect(device.disconnect()).rejects.toBeInstanceOf(NotConnectedError);
      expect(link.calls).toHaveLength(0);
    });

    it('should unsubscribe from facets before disconnecting', async () => {
      const { link, device } = await loggedInDevice();
      await device.startFacetNotifications(() => undefined);
      const before = link.calls.length;

      await device.disconnect();

      expect(link.calls.slice(before)).toEqual([
        { op: 'unsubscribe', characteristic: FACET },
        { op: 'disconnect' },
      ]);
      expect(device.state).toBe('disconnected');
    });

    it('should clear the session even when unsubscribing fails', async () => {
      const { link, device } = await loggedInDevice();
      await device.startFacetNotifications(() => undefined);
      link.failNext('unsubscribe', new Error('gatt busy'));

      await expect(device.disconnect()).rejects.toThrow(
        'Failed to stop facet notifications: gatt busy'
      );
      expect(link.callsOf('disconnect')).toHaveLength(1);
      expect(device.state).toBe('disconnected');
      expect(device.isNotifying).toBe(false);
    });

    it('should reset the session when the link reports a lost connection', async () => {
      const logger = silentLogger();
      const link = new MemoryBleLink().setValue(FACET, [0x05]);
      const device = new TimeFlipDevice(link, { logger });
      await device.connect();
      await device.login();
      await device.startFacetNotifications(() => undefined);

      link.dropConnection();

      expect(device.state).toBe('disconnected');
      expect(logger.warn).toHaveBeenCalledWith('Connection to TimeFlip device lost');
      await expect(device.batteryLevel()).rejects.toBeInstanceOf(NotConnectedError);
    });

    it('should pass through BLEConnectionError from the link', async () => {
      const { link, device } = await connectedDevice();
      const failure = new BLEConnectionError('link lost');
      link.failNext('disconnect', failure);

      await expect(device.disconnect()).rejects.toBe(failure);
      expect(device.isConnected).toBe(false);
    });
  });

  describe('login', () => {
    it('should write the default password and infer success from the facet', async () => {
      const { link, device } = await connectedDevice();

      await expect(device.login()).resolves.toBe(true);

      expect(writes(link)).toEqual([
        { characteristic: Characteristic.passwordInput, data: new TextEncoder().encode('000000') },
      ]);
      expect(link.callsOf('write')[0].withResponse).toBe(true);
      expect(link.calls.at(-1)).toEqual({ op: 'read', characteristic: FACET });
      expect(device.state).toBe('authenticated');
    });

    it('should use the configured password', async () => {
      const { link, device } = await connectedDevice('123456');

      await device.login();

      expect(link.callsOf('write')[0].data).toEqual(Uint8Array.of(0x31, 0x32, 0x33, 0x34, 0x35, 0x36));
    });

    it('should report failure when the facet reads empty', async () => {
      const { link, device } = await connectedDevice();
      link.queueRead(FACET, []);

      await expect(device.login('999999')).resolves.toBe(false);
      expect(device.isAuthenticated).toBe(false);
      expect(device.state).toBe('connected');
    });

    it('should reject non-ASCII passwords without writing', async () => {
      const { link, device } = await connectedDevice();

      await expect(device.login('pässwd')).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(link.callsOf('write')).toHaveLength(0);
    });

    it('should require a connection', async () => {
      const device = new TimeFlipDevice(new MemoryBleLink(), { logger: silentLogger() });

      await expect(device.login()).rejects.toBeInstanceOf(NotConnectedError);
    });

    it('should stop facet notifications when a new login fails', async () => {
      const { link, device } = await loggedInDevice();
      await device.startFacetNotifications(() => undefined);
      link.queueRead(FACET, []);

      await device.login('111111');

      expect(link.isSubscribed(FACET)).toBe(false);
      expect(device.state).toBe('connected');
    });

    it('should clear authentication when a failed login cannot unsubscribe', async () => {
      const { link, device } = await loggedInDevice();
      await device.startFacetNotifications(() => undefined);
      link.queueRead(FACET, []).failNext('unsubscribe', new Error('gatt busy'));

      await expect(device.login('111111')).rejects.toThrow(
        new BLEConnectionError('Failed to stop facet notifications: gatt busy')
      );
      expect(device.isAuthenticated).toBe(false);
      expect(device.state).toBe('connected');
    });
  });

  describe('login-gated operations', () => {
    it.each<[string, (device: TimeFlipDevice) => Promise<unknown>]>([
      ['currentFacet', (d) => d.currentFacet()],
      ['calibrationVersion', (d) => d.calibrationVersion()],
      ['setCalibrationVersion', (d) => d.setCalibrationVersion(1)],
      ['status', (d) => d.status()],
      ['setAutoPause', (d) => d.setAutoPause(10)],
      ['pause', (d) => d.pause()],
      ['unpause', (d) => d.unpause()],
      ['setLock', (d) => d.setLock(true)],
      ['clearHistory', (d) => d.clearHistory()],
      ['resetCalibration', (d) => d.resetCalibration()],
      ['history', (d) => d.history()],
      ['startFacetNotifications', (d) => d.startFacetNotifications(() => undefined)],
      ['stopFacetNotifications', (d) => d.stopFacetNotifications()],
    ])('%s should fail with LoginRequiredError without touching the link', async (_name, op) => {
      const { link, device } = await connectedDevice();
      const before = link.calls.length;

      await expect(op(device)).rejects.toBeInstanceOf(LoginRequiredError);
      expect(link.calls).toHaveLength(before);
    });
  });

  describe('getters', () => {
    it('should read the battery level', async () => {
      const { link, device } = await connectedDevice();
      link.setValue(Characteristic.batteryLevel, [87]);

      await expect(device.batteryLevel()).resolves.toBe(87);
    });

    it('should read text characteristics', async () => {
      const { link, device } = await connectedDevice();
      link
        .setValue(Characteristic.firmwareRevision, new TextEncoder().encode('v1.2.3'))
        .setValue(Characteristic.deviceName, [...new TextEncoder().encode('TimeFlip'), 0, 0]);

      await expect(device.firmwareRevision()).resolves.toBe('v1.2.3');
      await expect(device.deviceName()).resolves.toBe('TimeFlip');
    });

    it('should require a connection for battery level', async () => {
      const device = new TimeFlipDevice(new MemoryBleLink(), { logger: silentLogger() });

      await expect(device.batteryLevel()).rejects.toBeInstanceOf(NotConnectedError);
    });

    it('should read the current facet', async () => {
      const { link, device } = await loggedInDevice();
      link.queueRead(FACET, [0x3f]);

      await expect(device.currentFacet()).resolves.toBe(63);
    });

    it('should read the calibration version', async () => {
      const { link, device } = await loggedInDevice();
      link.setValue(Characteristic.calibrationVersion, [0x04, 0x03, 0x02, 0x01]);

      await expect(device.calibrationVersion()).resolves.toBe(0x01020304);
    });

    it('should write the calibration version as 4 bytes little-endian', async () => {
      const { link, device } = await loggedInDevice();

      await device.setCalibrationVersion(258);

      expect(link.calls.at(-1)).toEqual({
        op: 'write',
        characteristic: Characteristic.calibrationVersion,
        data: Uint8Array.of(0x02, 0x01, 0x00, 0x00),
        withResponse: true,
      });
    });

    it('should reject calibration versions wider than 32 bits', async () => {
      const { link, device } = await loggedInDevice();
      const before = link.calls.length;

      await expect(device.setCalibrationVersion(2 ** 32)).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(link.calls).toHaveLength(before);
    });
  });

  describe('status', () => {
    it('should run a verified status command and decode the output', async () => {
      const { link, device } = await loggedInDevice();
      link.queueRead(INPUT, [0x10, 0x02]).queueRead(RESULT, result(0x02, 0x01, 0x64, 0x00));

      await expect(device.status()).resolves.toEqual({
        locked: false,
        paused: true,
        autoPauseMinutes: 100,
      });
      expect(link.callsOf('write').at(-1)?.data).toEqual(Uint8Array.of(0x10));
    });

    it('should fail when the device does not confirm the command', async () => {
      const { link, device } = await loggedInDevice();
      link.queueRead(INPUT, [0x10, 0x01]);

      await expect(device.status()).rejects.toBeInstanceOf(CommandExecutionError);
    });

    it('should fail on short output', async () => {
      const { link, device } = await loggedInDevice();
      link.queueRead(INPUT, [0x10, 0x02]).queueRead(RESULT, [0x01, 0x02, 0x00, 0x64]);

      await expect(device.status()).rejects.toBeInstanceOf(MalformedResultError);
    });
  });

  describe('setAutoPause', () => {
    it('should send a verified auto-pause command', async () => {
      const { link, device } = await loggedInDevice();
      link.queueRead(INPUT, [0x05, 0x02]);

      await device.setAutoPause(300);

      expect(link.callsOf('write').at(-1)?.data).toEqual(Uint8Array.of(0x05, 0x2c, 0x01));
      expect(link.calls.at(-1)).toEqual({ op: 'read', characteristic: INPUT });
    });

    it('should reject 70000 before writing anything', async () => {
      const { link, device } = await loggedInDevice();
      const before = link.calls.length;

      await expect(device.setAutoPause(70000)).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(link.calls).toHaveLength(before);
    });

    it('should fail when the device reports an error status', async () => {
      const { link, device } = await loggedInDevice();
      link.queueRead(INPUT, [0x05, 0x01]);

      await expect(device.setAutoPause(5)).rejects.toThrow('Unable to execute the command auto_pause');
    });
  });

  describe('one-shot commands', () => {
    it.each<[string, (device: TimeFlipDevice) => Promise<void>, number[]]>([
      ['pause', (d) => d.pause(), [0x06, 0x01]],
      ['unpause', (d) => d.unpause(), [0x06, 0x02]],
      ['setLock(true)', (d) => d.setLock(true), [0x04, 0x01]],
      ['setLock(false)', (d) => d.setLock(false), [0x04, 0x02]],
      ['clearHistory', (d) => d.clearHistory(), [0x02]],
      ['resetCalibration', (d) => d.resetCalibration(), [0x03]],
    ])('%s should write its command without reading back', async (_name, op, bytes) => {
      const { link, device } = await loggedInDevice();
      const before = link.calls.length;

      await op(device);

      expect(link.calls.slice(before)).toEqual([
        { op: 'write', characteristic: INPUT, data: Uint8Array.from(bytes), withResponse: true },
      ]);
    });
  });

  describe('history', () => {
    it('should drain packets until the sentinel and decode them', async () => {
      const { link, device } = await loggedInDevice();
      link.queueRead(
        RESULT,
        historyPacket([[4, 7], [1, 10], [2, 20], [1, 30], [3, 40], [2, 50], [1, 60]]),
        historyPacket([[4, 9], [3, 70], [6, 1], [6, 1], [6, 1], [6, 1], [6, 1]]),
        new Uint8Array(21)
      );
      const before = link.calls.length;

      const history = await device.history();

      expect(history).toEqual(
        new Map([
          [4, [7, 9]],
          [1, [10, 30, 60]],
          [2, [20, 50]],
          [3, [40, 70]],
        ])
      );
      expect(link.calls.slice(before).map((c) => `${c.op}:${c.characteristic}`)).toEqual([
        `write:${INPUT}`,
        `read:${RESULT}`,
        `read:${RESULT}`,
        `read:${RESULT}`,
      ]);
    });

    it('should return an empty history when only the sentinel arrives', async () => {
      const { link, device } = await loggedInDevice();
      link.queueRead(RESULT, new Uint8Array(21));

      await expect(device.history()).resolves.toEqual(new Map());
    });

    it('should fail when the device sends no output', async () => {
      const { link, device } = await loggedInDevice();
      link.queueRead(RESULT, []);

      await expect(device.history()).rejects.toThrow(
        'The result of the command history is malformed, please check if you are logged in'
      );
    });
  });

  describe('facet notifications', () => {
    it('should deliver decoded facets to the handler', async () => {
      const { link, device } = await loggedInDevice();
      const handler = vi.fn();

      await device.startFacetNotifications(handler);
      await link.emit(FACET, [0x07]);
      await link.emit(FACET, [0x3f]);

      expect(device.state).toBe('notifying');
      expect(handler.mock.calls).toEqual([[7], [63]]);
    });

    it('should propagate handler failures to the dispatcher', async () => {
      const { link, device } = await loggedInDevice();
      const failure = new Error('handler broke');

      await device.startFacetNotifications(async () => {
        throw failure;
      });

      await expect(link.emit(FACET, [0x01])).rejects.toBe(failure);
    });

    it('should reject out-of-range facet values', async () => {
      const { link, device } = await loggedInDevice();
      const handler = vi.fn();
      await device.startFacetNotifications(handler);

      await expect(link.emit(FACET, [0x40])).rejects.toBeInstanceOf(InvalidResponseError);
      expect(handler).not.toHaveBeenCalled();
    });

    it('should replace a running subscription', async () => {
      const { link, device } = await loggedInDevice();
      const first = vi.fn();
      const second = vi.fn();

      await device.startFacetNotifications(first);
      await device.startFacetNotifications(second);
      await link.emit(FACET, [0x02]);

      expect(link.calls.slice(-3).map((c) => c.op)).toEqual(['subscribe', 'unsubscribe', 'subscribe']);
      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledWith(2);
    });

    it('should report subscribe failures as BLEConnectionError', async () => {
      const { link, device } = await loggedInDevice();
      link.failNext('subscribe', new Error('gatt busy'));

      await expect(device.startFacetNotifications(() => undefined)).rejects.toBeInstanceOf(
        BLEConnectionError
      );
      expect(device.state).toBe('authenticated');
      expect(link.isSubscribed(FACET)).toBe(false);
    });

    it('should report unsubscribe failures as BLEConnectionError', async () => {
      const { link, device } = await loggedInDevice();
      await device.startFacetNotifications(() => undefined);
      link.failNext('unsubscribe', new Error('gatt busy'));

      await expect(device.stopFacetNotifications()).rejects.toThrow(
        'Failed to stop facet notifications: gatt busy'
      );
    });

    it('should stop delivering after stop', async () => {
      const { link, device } = await loggedInDevice();
      await device.startFacetNotifications(() => undefined);

      await device.stopFacetNotifications();

      expect(device.state).toBe('authenticated');
      expect(link.isSubscribed(FACET)).toBe(false);
    });
  });
});
