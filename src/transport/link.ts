/**
 * Transport capability the protocol layer is written against.
 *
 * Characteristics are addressed by their full UUID (see `Characteristic` in
 * protocol/constants). Timeouts are the transport's concern: a link that gives
 * up should reject the pending call.
 */

/**
 * Receives pushed characteristic values. A returned promise is handed back to
 * the transport so its rejection surfaces where the transport dispatches.
 */
export type CharacteristicUpdateHandler = (
  data: Uint8Array
) => void | Promise<void>;

export interface BleLink {
  connect(): Promise<void>;

  disconnect(): Promise<void>;

  read(characteristic: string): Promise<Uint8Array>;

  /**
   * @param withResponse - Request a write acknowledgement from the peripheral
   */
  write(
    characteristic: string,
    data: Uint8Array,
    withResponse: boolean
  ): Promise<void>;

  subscribe(
    characteristic: string,
    onUpdate: CharacteristicUpdateHandler
  ): Promise<void>;

  unsubscribe(characteristic: string): Promise<void>;

  /**
   * Register a callback for connection loss that was not requested through
   * {@link BleLink.disconnect}, such as the peripheral going out of range.
   */
  onDisconnect?(handler: () => void): void;
}
