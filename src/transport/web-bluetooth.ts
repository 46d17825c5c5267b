/**
 * Web Bluetooth implementation of {@link BleLink}.
 *
 * Wraps a `BluetoothDevice` obtained from `navigator.bluetooth.requestDevice()`
 * (or a Node implementation of the same API). The GATT object model is typed
 * structurally below so the library does not depend on DOM typings.
 */

import { BLEConnectionError } from '../exceptions';
import type { Logger } from '../logger';
import type { BleLink, CharacteristicUpdateHandler } from './link';

export interface WebBluetoothLinkOptions {
  /**
   * Log sink (default: console)
   */
  logger?: Logger;

  /**
   * Receives rejections of async notification handlers
   * (default: logged as a warning)
   */
  onHandlerError?: (error: unknown) => void;
}

export interface GattCharacteristicLike {
  readonly uuid: string;
  readonly value?: DataView | null;
  readValue(): Promise<DataView>;
  writeValueWithResponse(value: Uint8Array): Promise<void>;
  writeValueWithoutResponse(value: Uint8Array): Promise<void>;
  startNotifications(): Promise<unknown>;
  stopNotifications(): Promise<unknown>;
  addEventListener(type: 'characteristicvaluechanged', listener: () => void): void;
  removeEventListener(type: 'characteristicvaluechanged', listener: () => void): void;
}

export interface GattServiceLike {
  getCharacteristics(): Promise<GattCharacteristicLike[]>;
}

export interface GattServerLike {
  readonly connected: boolean;
  connect(): Promise<unknown>;
  disconnect(): void;
  getPrimaryServices(): Promise<GattServiceLike[]>;
}

export interface BluetoothDeviceLike {
  readonly name?: string;
  readonly gatt?: GattServerLike;
  addEventListener?(type: 'gattserverdisconnected', listener: () => void): void;
  removeEventListener?(type: 'gattserverdisconnected', listener: () => void): void;
}

interface ActiveSubscription {
  characteristic: GattCharacteristicLike;
  listener: () => void;
}

function toBytes(view: DataView): Uint8Array {
  return new Uint8Array(view.buffer.slice(view.byteOffset, view.byteOffset + view.byteLength));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * BLE link over the Web Bluetooth GATT API.
 *
 * Service UUIDs must have been granted when the device was requested
 * (`optionalServices`), otherwise their characteristics are not discovered.
 */
export class WebBluetoothLink implements BleLink {
  private characteristics = new Map<string, GattCharacteristicLike>();
  private subscriptions = new Map<string, ActiveSubscription>();
  private disconnectListener: (() => void) | null = null;
  private onConnectionLost: (() => void) | null = null;

  private readonly logger: Logger;
  private readonly onHandlerError: (error: unknown) => void;

  constructor(
    private device: BluetoothDeviceLike,
    options: WebBluetoothLinkOptions = {}
  ) {
    const logger = options.logger ?? console;
    this.logger = logger;
    this.onHandlerError =
      options.onHandlerError ??
      ((error) => logger.warn('Notification handler failed', error));
  }

  get isConnected(): boolean {
    return this.device.gatt?.connected ?? false;
  }

  /**
   * Connect to the GATT server and index every characteristic by UUID.
   *
   * @throws {BLEConnectionError} If the device has no GATT server or connect fails
   */
  async connect(): Promise<void> {
    const server = this.device.gatt;
    if (!server) {
      throw new BLEConnectionError('Device does not support GATT');
    }

    try {
      await server.connect();

      const services = await server.getPrimaryServices();
      for (const service of services) {
        for (const characteristic of await service.getCharacteristics()) {
          this.characteristics.set(characteristic.uuid.toLowerCase(), characteristic);
        }
      }

      this.disconnectListener = this.handleDisconnect.bind(this);
      this.device.addEventListener?.('gattserverdisconnected', this.disconnectListener);

      this.logger.log(
        `Connected to ${this.device.name || 'TimeFlip device'} ` +
          `(${this.characteristics.size} characteristics)`
      );
    } catch (error) {
      this.cleanup();
      throw new BLEConnectionError(`Failed to connect: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  async disconnect(): Promise<void> {
    this.removeDisconnectListener();
    try {
      for (const uuid of [...this.subscriptions.keys()]) {
        await this.unsubscribe(uuid);
      }
    } finally {
      if (this.device.gatt?.connected) {
        this.device.gatt.disconnect();
      }
      this.cleanup();
    }
  }

  async read(uuid: string): Promise<Uint8Array> {
    const characteristic = this.getCharacteristic(uuid);
    try {
      return toBytes(await characteristic.readValue());
    } catch (error) {
      throw new BLEConnectionError(`Failed to read ${uuid}: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  async write(uuid: string, data: Uint8Array, withResponse: boolean): Promise<void> {
    const characteristic = this.getCharacteristic(uuid);
    try {
      if (withResponse) {
        await characteristic.writeValueWithResponse(data);
      } else {
        await characteristic.writeValueWithoutResponse(data);
      }
    } catch (error) {
      throw new BLEConnectionError(`Failed to write ${uuid}: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Start notifications on a characteristic, replacing any earlier
   * subscription to it.
   *
   * Rejections from an async handler go to `onHandlerError`, since the event
   * dispatch cannot await them.
   */
  async subscribe(uuid: string, onUpdate: CharacteristicUpdateHandler): Promise<void> {
    const characteristic = this.getCharacteristic(uuid);
    await this.unsubscribe(uuid);

    const listener = (): void => {
      if (!characteristic.value) {
        return;
      }
      const result = onUpdate(toBytes(characteristic.value));
      if (result) {
        result.catch(this.onHandlerError);
      }
    };

    try {
      await characteristic.startNotifications();
    } catch (error) {
      throw new BLEConnectionError(`Failed to subscribe to ${uuid}: ${describe(error)}`, {
        cause: error,
      });
    }

    characteristic.addEventListener('characteristicvaluechanged', listener);
    this.subscriptions.set(characteristic.uuid.toLowerCase(), { characteristic, listener });
  }

  async unsubscribe(uuid: string): Promise<void> {
    const key = uuid.toLowerCase();
    const subscription = this.subscriptions.get(key);
    if (!subscription) {
      return;
    }

    subscription.characteristic.removeEventListener(
      'characteristicvaluechanged',
      subscription.listener
    );
    this.subscriptions.delete(key);

    try {
      await subscription.characteristic.stopNotifications();
    } catch (error) {
      throw new BLEConnectionError(
        `Failed to unsubscribe from ${uuid}: ${describe(error)}`,
        { cause: error }
      );
    }
  }

  onDisconnect(handler: () => void): void {
    this.onConnectionLost = handler;
  }

  private handleDisconnect(): void {
    this.logger.warn(`${this.device.name || 'TimeFlip device'} disconnected`);
    this.cleanup();
    this.onConnectionLost?.();
  }

  private removeDisconnectListener(): void {
    if (this.disconnectListener) {
      this.device.removeEventListener?.('gattserverdisconnected', this.disconnectListener);
      this.disconnectListener = null;
    }
  }

  private getCharacteristic(uuid: string): GattCharacteristicLike {
    if (!this.isConnected) {
      throw new BLEConnectionError('Not connected to device');
    }

    const characteristic = this.characteristics.get(uuid.toLowerCase());
    if (!characteristic) {
      throw new BLEConnectionError(`Characteristic ${uuid} not found on device`);
    }
    return characteristic;
  }

  private cleanup(): void {
    this.removeDisconnectListener();
    for (const { characteristic, listener } of this.subscriptions.values()) {
      characteristic.removeEventListener('characteristicvaluechanged', listener);
    }
    this.subscriptions.clear();
    this.characteristics.clear();
  }
}
