/**
 * Device status returned by the status command.
 */
export interface StatusSnapshot {
  /**
   * Whether facet changes are ignored by the device
   */
  locked: boolean;

  /**
   * Whether time counting is paused
   */
  paused: boolean;

  /**
   * Idle minutes before the device pauses itself (0-65535)
   */
  autoPauseMinutes: number;
}
