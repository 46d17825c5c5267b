/**
 * Command builders for the TimeFlip command input characteristic.
 */

import { InvalidArgumentError } from '../exceptions';
import {
  CommandCode,
  MAX_AUTO_PAUSE_MINUTES,
  STATUS_FLAG_FALSE,
  STATUS_FLAG_TRUE,
} from './constants';

/**
 * An opcode plus its fixed-size arguments.
 */
export interface Command {
  readonly name: string;
  readonly opcode: CommandCode;
  readonly args: Uint8Array;
}

function defineCommand(
  name: string,
  opcode: CommandCode,
  args: ArrayLike<number> = []
): Command {
  return Object.freeze({ name, opcode, args: Uint8Array.from(args) });
}

function encodeFlag(value: boolean): number {
  return value ? STATUS_FLAG_TRUE : STATUS_FLAG_FALSE;
}

/**
 * Serialize a command as written to the device: [opcode][args...]
 */
export function encodeCommand(command: Command): Uint8Array {
  const bytes = new Uint8Array(1 + command.args.length);
  bytes[0] = command.opcode;
  bytes.set(command.args, 1);
  return bytes;
}

/**
 * Request the history stream, read back from the command result characteristic.
 */
export function buildHistoryCommand(): Command {
  return defineCommand('history', CommandCode.HISTORY);
}

export function buildHistoryDeleteCommand(): Command {
  return defineCommand('history_delete', CommandCode.HISTORY_DELETE);
}

export function buildCalibrationResetCommand(): Command {
  return defineCommand('calibration_reset', CommandCode.CALIBRATION_RESET);
}

export function buildLockCommand(locked: boolean): Command {
  return defineCommand(locked ? 'lock_on' : 'lock_off', CommandCode.LOCK, [
    encodeFlag(locked),
  ]);
}

export function buildPauseCommand(paused: boolean): Command {
  return defineCommand(paused ? 'pause_on' : 'pause_off', CommandCode.PAUSE, [
    encodeFlag(paused),
  ]);
}

/**
 * Build the auto-pause command.
 *
 * Format: [0x05][minutes:2 LE]
 *
 * @param minutes - Idle minutes before the device pauses counting
 * @throws {InvalidArgumentError} If minutes is not an integer in 0..65535
 */
export function buildAutoPauseCommand(minutes: number): Command {
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new InvalidArgumentError(
      `Auto-pause time must be a non-negative integer, got ${minutes}`
    );
  }
  if (minutes > MAX_AUTO_PAUSE_MINUTES) {
    throw new InvalidArgumentError(
      `Auto-pause time must fit in two bytes, got ${minutes}`
    );
  }

  return defineCommand('auto_pause', CommandCode.AUTO_PAUSE, [
    minutes & 0xff,
    (minutes >> 8) & 0xff,
  ]);
}

export function buildStatusCommand(): Command {
  return defineCommand('status', CommandCode.STATUS);
}

/**
 * Fixed commands keyed by name.
 */
export const COMMANDS = {
  history: buildHistoryCommand(),
  history_delete: buildHistoryDeleteCommand(),
  calibration_reset: buildCalibrationResetCommand(),
  lock_on: buildLockCommand(true),
  lock_off: buildLockCommand(false),
  pause_on: buildPauseCommand(true),
  pause_off: buildPauseCommand(false),
  status: buildStatusCommand(),
} as const satisfies Record<string, Command>;
