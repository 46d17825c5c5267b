/**
 * timeflip-ble - TypeScript client for TimeFlip BLE time trackers
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { TimeFlipDevice, type TimeFlipDeviceOptions } from './device';
export { withTimeFlip } from './scope';
export { FacetNotificationStream, type FacetHandler } from './facets';
export { SessionState, requireSession } from './session';
export type { Logger } from './logger';

// Protocol
export {
  Characteristic,
  CommandCode,
  DEFAULT_PASSWORD,
  PAUSE_FACET_ID,
  type CharacteristicName,
} from './protocol/constants';
export { isPauseFacet } from './protocol/responses';
export {
  decodeHistoryPackets,
  decodeHistoryRecord,
  encodeHistoryRecord,
  flattenHistory,
} from './protocol/history';

// Transports
export type { BleLink, CharacteristicUpdateHandler } from './transport/link';
export {
  WebBluetoothLink,
  type BluetoothDeviceLike,
  type GattCharacteristicLike,
  type GattServerLike,
  type GattServiceLike,
} from './transport/web-bluetooth';
export { MemoryBleLink, type LinkCall, type LinkOperation } from './transport/memory-link';

// Models and types
export * from './models';

// Exceptions
export * from './exceptions';
