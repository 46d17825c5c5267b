/**
 * History structures decoded from the command result stream.
 */

/**
 * One recorded interval spent on a facet.
 */
export interface HistoryEntry {
  /**
   * Facet id (0-63)
   */
  facet: number;

  /**
   * Time spent on the facet, in seconds
   */
  durationSeconds: number;
}

/**
 * Durations grouped per facet, each list in arrival order.
 */
export type HistoryByFacet = Map<number, number[]>;
