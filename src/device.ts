/**
 * Main TimeFlip BLE device class.
 */

import {
  BLEConnectionError,
  InvalidArgumentError,
  MalformedResultError,
  NotTargetDeviceError,
  TimeFlipError,
} from './exceptions';
import { FacetNotificationStream, type FacetHandler } from './facets';
import type { Logger } from './logger';
import type { HistoryByFacet } from './models/history';
import type { SessionPhase } from './models/session';
import type { StatusSnapshot } from './models/status';
import {
  COMMANDS,
  buildAutoPauseCommand,
  buildLockCommand,
  buildPauseCommand,
} from './protocol/commands';
import {
  COMMAND_RESULT_LENGTH,
  Characteristic,
  DEFAULT_PASSWORD,
} from './protocol/constants';
import { CommandExecutor } from './protocol/executor';
import { decodeHistoryPackets, isSentinelPacket } from './protocol/history';
import {
  encodeCalibrationVersion,
  parseFacet,
  parseStatus,
  readUintLE,
} from './protocol/responses';
import { SessionState, requireSession } from './session';
import type { BleLink } from './transport/link';

export interface TimeFlipDeviceOptions {
  /**
   * Password used by {@link TimeFlipDevice.login} when none is given
   * (default "000000")
   */
  password?: string;

  /**
   * Log sink (default: console)
   */
  logger?: Logger;
}

const ASCII_PATTERN = /^[\x00-\x7f]*$/;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodeText(data: Uint8Array): string {
  return new TextDecoder('utf-8').decode(data).replace(/\0+$/, '');
}

/**
 * TimeFlip spinning-top timer.
 *
 * Main API for talking to a TimeFlip over an injected {@link BleLink}.
 *
 * @example
 * ```typescript
 * const device = new TimeFlipDevice(link);
 * await device.connect();
 * await device.login();
 * await device.startFacetNotifications((facet) => {
 *   console.log(isPauseFacet(facet) ? 'paused' : `facet ${facet}`);
 * });
 * console.log(await device.history());
 * await device.disconnect();
 * ```
 */
export class TimeFlipDevice {
  private readonly session = new SessionState();
  private readonly executor: CommandExecutor;
  private readonly facets: FacetNotificationStream;
  private readonly logger: Logger;

  constructor(
    private link: BleLink,
    private options: TimeFlipDeviceOptions = {}
  ) {
    this.logger = options.logger ?? console;
    this.executor = new CommandExecutor(link, this.logger);
    this.facets = new FacetNotificationStream(link, this.session, this.logger);
    link.onDisconnect?.(() => this.handleConnectionLost());
  }

  get isConnected(): boolean {
    return this.session.connected;
  }

  /**
   * Result of the last login heuristic. True means "probably logged in".
   */
  get isAuthenticated(): boolean {
    return this.session.authenticated;
  }

  get isNotifying(): boolean {
    return this.session.notifying;
  }

  get state(): SessionPhase {
    return this.session.phase;
  }

  /**
   * Connect the link and check that the peer is a TimeFlip.
   *
   * BLE connection alone says nothing about the peer, so the facet
   * characteristic is read as a probe. A no-op when already connected.
   *
   * @throws {BLEConnectionError} If the link fails to connect
   * @throws {NotTargetDeviceError} If the facet probe fails
   */
  async connect(): Promise<void> {
    if (this.session.connected) {
      this.logger.debug('Already connected');
      return;
    }

    try {
      await this.link.connect();
    } catch (error) {
      throw error instanceof BLEConnectionError
        ? error
        : new BLEConnectionError(`Failed to connect: ${describe(error)}`, { cause: error });
    }
    this.session.markConnected();

    try {
      await this.link.read(Characteristic.facet);
    } catch (error) {
      await this.dropLinkAfterFailedProbe();
      throw new NotTargetDeviceError({ cause: error });
    }

    this.logger.log('Connected to TimeFlip device');
  }

  /**
   * Stop facet notifications (if running) and disconnect the link.
   *
   * Session flags are cleared even when a step fails.
   *
   * @throws {NotConnectedError} If not connected
   * @throws {BLEConnectionError} If unsubscribing or disconnecting failed
   */
  async disconnect(): Promise<void> {
    requireSession(this.session, 'connected');

    const failures: unknown[] = [];
    if (this.session.notifying) {
      try {
        await this.facets.stop();
      } catch (error) {
        failures.push(error);
      }
    }

    try {
      await this.link.disconnect();
    } catch (error) {
      failures.push(error);
    } finally {
      this.session.reset();
    }

    if (failures.length > 0) {
      for (const extra of failures.slice(1)) {
        this.logger.warn(`Additional disconnect failure: ${describe(extra)}`);
      }
      const [first] = failures;
      throw first instanceof BLEConnectionError
        ? first
        : new BLEConnectionError(`Failed to disconnect: ${describe(first)}`, { cause: first });
    }

    this.logger.log('Disconnected from TimeFlip device');
  }

  /**
   * Log in to unlock the protected commands.
   *
   * The device never says whether the password was accepted. Success is
   * inferred from the facet characteristic, which reads empty until a login
   * succeeds. A true result is best-effort: protected commands can still fail
   * with MalformedResultError or CommandExecutionError afterwards.
   *
   * @param password - ASCII password (default from options, else "000000")
   * @returns Whether the login appears to have succeeded
   * @throws {NotConnectedError} If not connected
   * @throws {InvalidArgumentError} If the password is not ASCII
   */
  async login(password: string = this.options.password ?? DEFAULT_PASSWORD): Promise<boolean> {
    requireSession(this.session, 'connected');

    if (!ASCII_PATTERN.test(password)) {
      throw new InvalidArgumentError('Password must be ASCII');
    }

    await this.write(Characteristic.passwordInput, new TextEncoder().encode(password));
    const facet = await this.read(Characteristic.facet);
    const authenticated = facet.length > 0;

    try {
      if (!authenticated && this.session.notifying) {
        await this.facets.stop();
      }
    } finally {
      this.session.markAuthenticated(authenticated);
    }

    this.logger.log(authenticated ? 'Login accepted' : 'Login appears to have failed');
    return authenticated;
  }

  /**
   * Read the battery level.
   *
   * @returns Percentage from 0 to 100
   */
  async batteryLevel(): Promise<number> {
    requireSession(this.session, 'connected');
    return readUintLE(await this.read(Characteristic.batteryLevel));
  }

  async firmwareRevision(): Promise<string> {
    requireSession(this.session, 'connected');
    return decodeText(await this.read(Characteristic.firmwareRevision));
  }

  async deviceName(): Promise<string> {
    requireSession(this.session, 'connected');
    return decodeText(await this.read(Characteristic.deviceName));
  }

  /**
   * Read the facet currently facing up (63 while paused).
   */
  async currentFacet(): Promise<number> {
    requireSession(this.session, 'authenticated');
    return parseFacet(await this.read(Characteristic.facet));
  }

  /**
   * Calibration version synced with the device. Reset along with the battery.
   */
  async calibrationVersion(): Promise<number> {
    requireSession(this.session, 'authenticated');
    return readUintLE(await this.read(Characteristic.calibrationVersion));
  }

  /**
   * @throws {InvalidArgumentError} If version is not an unsigned 32-bit integer
   */
  async setCalibrationVersion(version: number): Promise<void> {
    requireSession(this.session, 'authenticated');
    await this.write(Characteristic.calibrationVersion, encodeCalibrationVersion(version));
  }

  /**
   * Query lock, pause and auto-pause state. Never cached.
   */
  async status(): Promise<StatusSnapshot> {
    requireSession(this.session, 'authenticated');
    return parseStatus(await this.executor.runCommandAndReadOutput(COMMANDS.status, true));
  }

  /**
   * Set the idle time after which the device pauses counting.
   *
   * @param minutes - 0 to 65535, checked before anything is written
   * @throws {InvalidArgumentError} If minutes is out of range
   * @throws {CommandExecutionError} If the device rejects the command
   */
  async setAutoPause(minutes: number): Promise<void> {
    requireSession(this.session, 'authenticated');
    await this.executor.runCommand(buildAutoPauseCommand(minutes), true);
  }

  async pause(): Promise<void> {
    requireSession(this.session, 'authenticated');
    await this.executor.runCommand(buildPauseCommand(true));
  }

  async unpause(): Promise<void> {
    requireSession(this.session, 'authenticated');
    await this.executor.runCommand(buildPauseCommand(false));
  }

  /**
   * Lock or unlock facet changes.
   */
  async setLock(locked: boolean): Promise<void> {
    requireSession(this.session, 'authenticated');
    await this.executor.runCommand(buildLockCommand(locked));
  }

  async clearHistory(): Promise<void> {
    requireSession(this.session, 'authenticated');
    await this.executor.runCommand(COMMANDS.history_delete);
  }

  async resetCalibration(): Promise<void> {
    requireSession(this.session, 'authenticated');
    await this.executor.runCommand(COMMANDS.calibration_reset);
  }

  /**
   * Download the recorded history.
   *
   * Packets are read until the all-zero end packet. The command channel is
   * held for the whole download.
   *
   * @returns Durations in seconds per facet, in recording order
   * @throws {MalformedResultError} If a packet is not 21 bytes
   */
  async history(): Promise<HistoryByFacet> {
    requireSession(this.session, 'authenticated');

    const command = COMMANDS.history;
    const packets = await this.executor.exclusive(async () => {
      await this.executor.send(command, false);

      const received: Uint8Array[] = [];
      for (;;) {
        const packet = await this.executor.readResult(command);
        if (packet.length !== COMMAND_RESULT_LENGTH) {
          throw new MalformedResultError(command.name);
        }
        received.push(packet);
        if (isSentinelPacket(packet)) {
          return received;
        }
      }
    });

    this.logger.debug(`History download complete (${packets.length - 1} packets)`);
    return decodeHistoryPackets(packets);
  }

  /**
   * Call `handler` with every facet change pushed by the device.
   *
   * @throws {LoginRequiredError} If not logged in
   */
  async startFacetNotifications(handler: FacetHandler): Promise<void> {
    await this.facets.start(handler);
  }

  async stopFacetNotifications(): Promise<void> {
    await this.facets.stop();
  }

  private async read(characteristic: string): Promise<Uint8Array> {
    try {
      return await this.link.read(characteristic);
    } catch (error) {
      throw this.transportError('read', characteristic, error);
    }
  }

  private async write(characteristic: string, data: Uint8Array): Promise<void> {
    try {
      await this.link.write(characteristic, data, true);
    } catch (error) {
      throw this.transportError('write', characteristic, error);
    }
  }

  private transportError(op: string, characteristic: string, error: unknown): TimeFlipError {
    return error instanceof TimeFlipError
      ? error
      : new BLEConnectionError(`Failed to ${op} ${characteristic}: ${describe(error)}`, {
          cause: error,
        });
  }

  private handleConnectionLost(): void {
    if (!this.session.connected) {
      return;
    }
    this.logger.warn('Connection to TimeFlip device lost');
    this.session.reset();
  }

  private async dropLinkAfterFailedProbe(): Promise<void> {
    try {
      await this.link.disconnect();
    } catch (error) {
      this.logger.warn(`Failed to disconnect from non-TimeFlip peer: ${describe(error)}`);
    } finally {
      this.session.reset();
    }
  }
}
