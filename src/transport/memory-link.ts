/**
 * In-process scripted BLE link.
 *
 * Stands in for a real peripheral in tests and demos: reads are served from
 * per-characteristic queues (then a fallback value), every call is recorded in
 * order, failures can be injected per operation, and notifications are pushed
 * with {@link MemoryBleLink.emit}.
 */

import { BLEConnectionError } from '../exceptions';
import type { BleLink, CharacteristicUpdateHandler } from './link';

export type LinkOperation =
  | 'connect'
  | 'disconnect'
  | 'read'
  | 'write'
  | 'subscribe'
  | 'unsubscribe';

export interface LinkCall {
  op: LinkOperation;
  characteristic?: string;
  data?: Uint8Array;
  withResponse?: boolean;
}

interface InjectedFailure {
  op: LinkOperation;
  characteristic?: string;
  error: Error;
}

export class MemoryBleLink implements BleLink {
  readonly calls: LinkCall[] = [];

  private connected = false;
  private readQueues = new Map<string, Uint8Array[]>();
  private values = new Map<string, Uint8Array>();
  private subscribers = new Map<string, CharacteristicUpdateHandler>();
  private failures: InjectedFailure[] = [];
  private disconnectHandler: (() => void) | null = null;

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Queue values returned by successive reads of a characteristic.
   */
  queueRead(characteristic: string, ...values: ArrayLike<number>[]): this {
    const queue = this.readQueues.get(characteristic) ?? [];
    queue.push(...values.map((value) => Uint8Array.from(value)));
    this.readQueues.set(characteristic, queue);
    return this;
  }

  /**
   * Value returned by reads once the queue for the characteristic is empty.
   */
  setValue(characteristic: string, value: ArrayLike<number>): this {
    this.values.set(characteristic, Uint8Array.from(value));
    return this;
  }

  /**
   * Make the next matching call reject with `error`.
   *
   * Without a characteristic the failure matches any characteristic.
   */
  failNext(op: LinkOperation, error: Error, characteristic?: string): this {
    this.failures.push({ op, characteristic, error });
    return this;
  }

  /**
   * Whether a notification handler is registered for the characteristic.
   */
  isSubscribed(characteristic: string): boolean {
    return this.subscribers.has(characteristic);
  }

  /**
   * Push a notification to the subscriber of a characteristic.
   *
   * @returns Whatever the subscriber returned, awaited
   * @throws {BLEConnectionError} If nothing is subscribed
   */
  async emit(characteristic: string, value: ArrayLike<number>): Promise<void> {
    const handler = this.subscribers.get(characteristic);
    if (!handler) {
      throw new BLEConnectionError(`No subscriber for ${characteristic}`);
    }
    await handler(Uint8Array.from(value));
  }

  /**
   * Simulate the peripheral dropping the connection.
   */
  dropConnection(): void {
    this.connected = false;
    this.subscribers.clear();
    this.disconnectHandler?.();
  }

  /**
   * Calls of a single operation, in order.
   */
  callsOf(op: LinkOperation): LinkCall[] {
    return this.calls.filter((call) => call.op === op);
  }

  async connect(): Promise<void> {
    this.record({ op: 'connect' });
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.record({ op: 'disconnect' });
    this.connected = false;
    this.subscribers.clear();
  }

  async read(characteristic: string): Promise<Uint8Array> {
    this.record({ op: 'read', characteristic });
    this.ensureConnected();

    const queued = this.readQueues.get(characteristic)?.shift();
    if (queued) {
      return queued;
    }

    const value = this.values.get(characteristic);
    if (!value) {
      throw new BLEConnectionError(`No value for characteristic ${characteristic}`);
    }
    return value.slice();
  }

  async write(
    characteristic: string,
    data: Uint8Array,
    withResponse: boolean
  ): Promise<void> {
    this.record({ op: 'write', characteristic, data: data.slice(), withResponse });
    this.ensureConnected();
  }

  async subscribe(
    characteristic: string,
    onUpdate: CharacteristicUpdateHandler
  ): Promise<void> {
    this.record({ op: 'subscribe', characteristic });
    this.ensureConnected();
    this.subscribers.set(characteristic, onUpdate);
  }

  async unsubscribe(characteristic: string): Promise<void> {
    this.record({ op: 'unsubscribe', characteristic });
    this.ensureConnected();
    this.subscribers.delete(characteristic);
  }

  onDisconnect(handler: () => void): void {
    this.disconnectHandler = handler;
  }

  private record(call: LinkCall): void {
    this.calls.push(call);

    const index = this.failures.findIndex(
      (failure) =>
        failure.op === call.op &&
        (failure.characteristic === undefined ||
          failure.characteristic === call.characteristic)
    );
    if (index !== -1) {
      const [failure] = this.failures.splice(index, 1);
      throw failure.error;
    }
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new BLEConnectionError('Not connected to device');
    }
  }
}
