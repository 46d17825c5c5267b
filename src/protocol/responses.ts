/**
 * Response validation and parsing.
 */

import { InvalidArgumentError, InvalidResponseError, MalformedResultError } from '../exceptions';
import type { StatusSnapshot } from '../models/status';
import {
  COMMAND_OK,
  COMMAND_RESULT_LENGTH,
  MAX_CALIBRATION_VERSION,
  MAX_FACET_ID,
  PAUSE_FACET_ID,
  STATUS_FLAG_TRUE,
} from './constants';

/**
 * Decode an unsigned little-endian integer of up to 6 bytes.
 *
 * An empty array decodes to 0.
 */
export function readUintLE(data: Uint8Array): number {
  if (data.length > 6) {
    throw new InvalidResponseError(
      `Integer field too wide: ${data.length} bytes (max 6)`
    );
  }

  let value = 0;
  for (let i = data.length - 1; i >= 0; i--) {
    value = value * 256 + data[i];
  }
  return value;
}

/**
 * Check the echo read back from the command input characteristic.
 *
 * Format: [opcode:1][status:1]
 *
 * @returns True only for an exact opcode echo with an OK status
 */
export function isCommandAck(echo: Uint8Array, opcode: number): boolean {
  return echo.length >= 2 && echo[0] === opcode && echo[1] === COMMAND_OK;
}

/**
 * Ensure command output has the fixed result length.
 *
 * @throws {MalformedResultError} If data is not exactly 21 bytes
 */
export function validateCommandResult(data: Uint8Array, command: string): void {
  if (data.length !== COMMAND_RESULT_LENGTH) {
    throw new MalformedResultError(command);
  }
}

/**
 * Parse status command output.
 *
 * Format: [locked:1][paused:1][autoPause:2 LE][padding:17]
 */
export function parseStatus(data: Uint8Array): StatusSnapshot {
  validateCommandResult(data, 'status');

  return {
    locked: data[0] === STATUS_FLAG_TRUE,
    paused: data[1] === STATUS_FLAG_TRUE,
    autoPauseMinutes: readUintLE(data.subarray(2, 4)),
  };
}

/**
 * Decode a facet characteristic value.
 *
 * @throws {InvalidResponseError} If the value is empty or not a facet id
 */
export function parseFacet(data: Uint8Array): number {
  if (data.length === 0) {
    throw new InvalidResponseError('Facet value is empty');
  }

  const facet = readUintLE(data);
  if (facet > MAX_FACET_ID) {
    throw new InvalidResponseError(
      `Facet id out of range: ${facet} (max ${MAX_FACET_ID})`
    );
  }
  return facet;
}

/**
 * Facet 63 is reported while the device is paused.
 */
export function isPauseFacet(facet: number): boolean {
  return facet === PAUSE_FACET_ID;
}

/**
 * Encode a calibration version as 4 bytes little-endian.
 *
 * @throws {InvalidArgumentError} If version is not an integer in 0..2^32-1
 */
export function encodeCalibrationVersion(version: number): Uint8Array {
  if (
    !Number.isInteger(version) ||
    version < 0 ||
    version > MAX_CALIBRATION_VERSION
  ) {
    throw new InvalidArgumentError(
      `Calibration version must be an unsigned 32-bit integer, got ${version}`
    );
  }

  const buffer = new ArrayBuffer(4);
  new DataView(buffer).setUint32(0, version, true);
  return new Uint8Array(buffer);
}
