/**
 * BLE protocol constants for TimeFlip devices.
 */

const GENERIC_UUID_TEMPLATE = '0000{id}-0000-1000-8000-00805f9b34fb';
const TIMEFLIP_UUID_TEMPLATE = 'f119{id}-71a4-11e6-bdf4-0800200c9a66';

function fillTemplate(template: string, shortId: number): string {
  return template.replace('{id}', shortId.toString(16).padStart(4, '0'));
}

/**
 * Expand a 16-bit id into the Bluetooth SIG base UUID.
 */
export function toGenericUuid(shortId: number): string {
  return fillTemplate(GENERIC_UUID_TEMPLATE, shortId);
}

/**
 * Expand a 16-bit id into the TimeFlip vendor UUID.
 */
export function toTimeFlipUuid(shortId: number): string {
  return fillTemplate(TIMEFLIP_UUID_TEMPLATE, shortId);
}

/**
 * GATT characteristics used by the client, keyed by logical name.
 */
export const Characteristic = {
  accelerometerData: toTimeFlipUuid(0x6f51),
  batteryLevel: toGenericUuid(0x2a19),
  calibrationVersion: toTimeFlipUuid(0x6f56),
  commandInput: toTimeFlipUuid(0x6f54),
  commandResult: toTimeFlipUuid(0x6f53),
  deviceName: toGenericUuid(0x2a00),
  facet: toTimeFlipUuid(0x6f52),
  firmwareRevision: toGenericUuid(0x2a26),
  passwordInput: toTimeFlipUuid(0x6f57),
} as const;

export type CharacteristicName = keyof typeof Characteristic;

/**
 * Opcodes written to the command input characteristic.
 */
export enum CommandCode {
  HISTORY = 0x01,
  HISTORY_DELETE = 0x02,
  CALIBRATION_RESET = 0x03,
  LOCK = 0x04,
  AUTO_PAUSE = 0x05,
  PAUSE = 0x06,
  STATUS = 0x10,
}

// Status byte echoed after the opcode on a command input read
export const COMMAND_ERROR = 0x01;
export const COMMAND_OK = 0x02;

// Boolean encoding used by command arguments and status output
export const STATUS_FLAG_TRUE = 0x01;
export const STATUS_FLAG_FALSE = 0x02;

export const COMMAND_RESULT_LENGTH = 21;
export const HISTORY_RECORD_SIZE = 3;
export const HISTORY_RECORDS_PER_PACKET = 7;

export const MAX_FACET_ID = 63;
export const PAUSE_FACET_ID = 63;

export const MAX_AUTO_PAUSE_MINUTES = 0xffff;
export const MAX_CALIBRATION_VERSION = 0xffffffff;

/**
 * Password restored every time the battery is removed and reinstalled.
 */
export const DEFAULT_PASSWORD = '000000';
