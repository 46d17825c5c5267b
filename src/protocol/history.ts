/**
 * History stream decoding.
 *
 * The history command makes the device stream 21-byte packets on the command
 * result characteristic until an all-zero packet arrives. Each packet holds
 * seven 3-byte records:
 *
 *   byte 0   byte 1   byte 2
 *   dddddddd dddddddd ffffffdd
 *
 * where f is the facet id (top 6 bits of byte 2) and d the duration in
 * seconds, little-endian over the remaining 18 bits.
 *
 * There is no packet count header. Bytes 0-1 of every packet also carry the
 * running number of entries produced so far, and only the value in the last
 * non-sentinel packet is used to drop the trailing padding records. Those two
 * bytes overlap the first record of the packet, which is decoded anyway; the
 * trim removes whatever it does not cover.
 */

import { InvalidArgumentError, MalformedResultError } from '../exceptions';
import type { HistoryByFacet, HistoryEntry } from '../models/history';
import {
  COMMAND_RESULT_LENGTH,
  HISTORY_RECORD_SIZE,
  HISTORY_RECORDS_PER_PACKET,
  MAX_FACET_ID,
} from './constants';

export const MAX_HISTORY_DURATION = (1 << 18) - 1;

/**
 * An all-zero packet ends the history stream.
 */
export function isSentinelPacket(packet: Uint8Array): boolean {
  return packet.length === COMMAND_RESULT_LENGTH && packet.every((b) => b === 0);
}

/**
 * Decode one 3-byte record. The input is left untouched.
 */
export function decodeHistoryRecord(record: Uint8Array): HistoryEntry {
  if (record.length !== HISTORY_RECORD_SIZE) {
    throw new MalformedResultError('history');
  }

  return {
    facet: record[2] >> 2,
    durationSeconds: record[0] | (record[1] << 8) | ((record[2] & 0b11) << 16),
  };
}

/**
 * Encode one record with the layout {@link decodeHistoryRecord} reads.
 */
export function encodeHistoryRecord(entry: HistoryEntry): Uint8Array {
  const { facet, durationSeconds } = entry;
  if (!Number.isInteger(facet) || facet < 0 || facet > MAX_FACET_ID) {
    throw new InvalidArgumentError(`Facet must be in 0..${MAX_FACET_ID}, got ${facet}`);
  }
  if (
    !Number.isInteger(durationSeconds) ||
    durationSeconds < 0 ||
    durationSeconds > MAX_HISTORY_DURATION
  ) {
    throw new InvalidArgumentError(
      `Duration must be in 0..${MAX_HISTORY_DURATION}, got ${durationSeconds}`
    );
  }

  return Uint8Array.of(
    durationSeconds & 0xff,
    (durationSeconds >> 8) & 0xff,
    (facet << 2) | ((durationSeconds >> 16) & 0b11)
  );
}

/**
 * Read the running entry counter from the first two bytes of a packet.
 */
export function readEntryCounter(packet: Uint8Array): number {
  return packet[0] | (packet[1] << 8);
}

/**
 * Decode every record of a single packet, counter overlap included.
 */
export function decodeHistoryPacket(packet: Uint8Array): HistoryEntry[] {
  if (packet.length !== COMMAND_RESULT_LENGTH) {
    throw new MalformedResultError('history');
  }

  const entries: HistoryEntry[] = [];
  for (let i = 0; i < HISTORY_RECORDS_PER_PACKET; i++) {
    const offset = i * HISTORY_RECORD_SIZE;
    entries.push(
      decodeHistoryRecord(packet.subarray(offset, offset + HISTORY_RECORD_SIZE))
    );
  }
  return entries;
}

/**
 * Group entries by facet, keeping arrival order within each facet.
 */
export function groupHistoryByFacet(entries: HistoryEntry[]): HistoryByFacet {
  const result: HistoryByFacet = new Map();
  for (const { facet, durationSeconds } of entries) {
    const durations = result.get(facet);
    if (durations) {
      durations.push(durationSeconds);
    } else {
      result.set(facet, [durationSeconds]);
    }
  }
  return result;
}

/**
 * Decode a drained history stream.
 *
 * Decoding stops at the first sentinel packet. Packets after it are ignored.
 *
 * @param packets - Packets in the order they were read
 * @throws {MalformedResultError} If a packet before the sentinel is not 21 bytes
 */
export function decodeHistoryPackets(packets: Uint8Array[]): HistoryByFacet {
  const entries: HistoryEntry[] = [];
  let entryCount = 0;

  for (const packet of packets) {
    if (isSentinelPacket(packet)) {
      break;
    }
    entries.push(...decodeHistoryPacket(packet));
    entryCount = readEntryCounter(packet);
  }

  return groupHistoryByFacet(entries.slice(0, entryCount));
}

/**
 * Flatten grouped history back into a list, facet by facet.
 */
export function flattenHistory(history: HistoryByFacet): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (const [facet, durations] of history) {
    for (const durationSeconds of durations) {
      entries.push({ facet, durationSeconds });
    }
  }
  return entries;
}
