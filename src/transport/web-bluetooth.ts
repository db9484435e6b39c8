/**
 * Web Bluetooth implementation of {@link SK8Transport}.
 *
 * Works with `navigator.bluetooth` in a browser, or with any object that
 * implements the same `Bluetooth` interface under Node.js.
 */

import { TransportError } from '../exceptions';
import { SK8_SERVICE_UUID } from '../protocol/constants';
import {
  normalizeUuid,
  type CharacteristicHandle,
  type DeviceQuery,
  type DiscoveredDevice,
  type NotifyHandler,
  type SK8Transport,
  type TransportConnection,
} from './transport';

type GattEventListener = (event: Event) => void;

/**
 * The parts of `BluetoothRemoteGATTCharacteristic` the transport uses.
 */
export interface GattCharacteristicLike {
  readonly uuid: string;
  readonly value?: DataView;
  readValue(): Promise<DataView>;
  writeValueWithResponse(value: BufferSource): Promise<void>;
  startNotifications(): Promise<unknown>;
  stopNotifications(): Promise<unknown>;
  addEventListener(type: 'characteristicvaluechanged', listener: GattEventListener): void;
  removeEventListener(type: 'characteristicvaluechanged', listener: GattEventListener): void;
}

export interface GattServiceLike {
  getCharacteristic(uuid: string): Promise<GattCharacteristicLike>;
}

export interface GattServerLike {
  readonly connected: boolean;
  connect(): Promise<GattServerLike>;
  disconnect(): void;
  getPrimaryServices(): Promise<GattServiceLike[]>;
}

export interface BluetoothDeviceLike {
  readonly id: string;
  readonly name?: string;
  readonly gatt?: GattServerLike;
  addEventListener(type: 'gattserverdisconnected', listener: GattEventListener): void;
  removeEventListener(type: 'gattserverdisconnected', listener: GattEventListener): void;
}

/**
 * Subset of the Web Bluetooth `Bluetooth` interface. `navigator.bluetooth`
 * satisfies it, as does a Node.js binding exposing the same API.
 */
export interface BluetoothLike {
  requestDevice(options: RequestDeviceOptions): Promise<BluetoothDeviceLike>;
}

export interface WebBluetoothTransportOptions {
  /**
   * Web Bluetooth implementation. Defaults to `navigator.bluetooth`.
   */
  bluetooth?: BluetoothLike;

  /**
   * Services to request access to, in addition to the defaults.
   */
  optionalServices?: BluetoothServiceUUID[];
}

// Standard services holding the characteristics the driver reads
const DEFAULT_SERVICES: BluetoothServiceUUID[] = [
  SK8_SERVICE_UUID,
  'generic_access',
  'battery_service',
  'device_information',
];

type RequestOutcome =
  | { kind: 'device'; device: BluetoothDeviceLike }
  | { kind: 'error'; error: unknown }
  | { kind: 'timeout' };

interface Subscription {
  characteristic: GattCharacteristicLike;
  listener: GattEventListener;
}

/**
 * Live GATT link managed by {@link WebBluetoothTransport}.
 */
class WebBluetoothConnection implements TransportConnection {
  readonly characteristics = new Map<CharacteristicHandle, GattCharacteristicLike>();
  readonly subscriptions = new Map<CharacteristicHandle, Subscription>();
  private nextHandle = 1;
  private listeners: (() => void)[] = [];
  private readonly disconnectHandler = (): void => {
    console.log(`Device ${this.address} disconnected`);
    this.characteristics.clear();
    this.subscriptions.clear();
    for (const listener of this.listeners) {
      listener();
    }
  };

  constructor(
    readonly device: BluetoothDeviceLike,
    readonly server: GattServerLike
  ) {
    device.addEventListener('gattserverdisconnected', this.disconnectHandler);
  }

  get address(): string {
    return this.device.id;
  }

  get isConnected(): boolean {
    return this.server.connected;
  }

  onDisconnect(listener: () => void): void {
    this.listeners.push(listener);
  }

  register(characteristic: GattCharacteristicLike): CharacteristicHandle {
    const handle = this.nextHandle++;
    this.characteristics.set(handle, characteristic);
    return handle;
  }

  /**
   * Detach listeners so an intentional disconnect is not reported as link loss.
   */
  detach(): void {
    this.device.removeEventListener('gattserverdisconnected', this.disconnectHandler);
    this.listeners = [];
    this.characteristics.clear();
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && error.name === 'NotFoundError';
}

/**
 * BLE transport backed by the Web Bluetooth API.
 *
 * Web Bluetooth has no free-running scan; `scanForDevice` goes through
 * `requestDevice()`, which may show a device picker. Addresses are the
 * opaque `BluetoothDevice.id` values the implementation assigns.
 */
export class WebBluetoothTransport implements SK8Transport {
  private readonly bluetooth: BluetoothLike | undefined;
  private readonly optionalServices: BluetoothServiceUUID[];
  // Devices returned by requestDevice(), keyed by id, awaiting connect()
  private pending = new Map<string, BluetoothDeviceLike>();

  constructor(options: WebBluetoothTransportOptions = {}) {
    this.bluetooth =
      options.bluetooth ?? (typeof navigator !== 'undefined' ? navigator.bluetooth : undefined);
    this.optionalServices = [...DEFAULT_SERVICES, ...(options.optionalServices ?? [])];
  }

  async scanForDevice(query: DeviceQuery, timeoutMs: number): Promise<DiscoveredDevice | null> {
    const bluetooth = this.requireBluetooth();

    const options: RequestDeviceOptions =
      query.address === undefined && query.name !== undefined
        ? { filters: [{ name: query.name }], optionalServices: this.optionalServices }
        : { acceptAllDevices: true, optionalServices: this.optionalServices };

    let timer: ReturnType<typeof setTimeout> | undefined;
    const request = bluetooth.requestDevice(options).then(
      (device): RequestOutcome => ({ kind: 'device', device }),
      (error: unknown): RequestOutcome => ({ kind: 'error', error })
    );
    const timeout = new Promise<RequestOutcome>((resolve) => {
      timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
    });

    const outcome = await Promise.race([request, timeout]);
    clearTimeout(timer);

    switch (outcome.kind) {
      case 'timeout':
        console.warn(`No device selected within ${timeoutMs}ms`);
        return null;
      case 'error':
        if (isNotFound(outcome.error)) {
          return null;
        }
        throw new TransportError(`Device selection failed: ${describe(outcome.error)}`);
      case 'device': {
        const { device } = outcome;
        if (query.address !== undefined && device.id !== query.address) {
          console.warn(`Selected device ${device.id} does not match address ${query.address}`);
          return null;
        }
        this.pending.set(device.id, device);
        return { address: device.id, name: device.name };
      }
    }
  }

  async connect(device: DiscoveredDevice): Promise<TransportConnection> {
    const bluetoothDevice = this.pending.get(device.address);
    if (!bluetoothDevice) {
      throw new TransportError(`Unknown device ${device.address}; scan for it first`);
    }
    this.pending.delete(device.address);
    if (!bluetoothDevice.gatt) {
      throw new TransportError('Device does not support GATT');
    }

    try {
      const server = await bluetoothDevice.gatt.connect();
      console.log(`Connected to ${bluetoothDevice.name || bluetoothDevice.id}`);
      return new WebBluetoothConnection(bluetoothDevice, server);
    } catch (error) {
      throw new TransportError(`Failed to connect: ${describe(error)}`);
    }
  }

  async disconnect(connection: TransportConnection): Promise<void> {
    const link = this.own(connection);
    for (const { characteristic, listener } of link.subscriptions.values()) {
      characteristic.removeEventListener('characteristicvaluechanged', listener);
    }
    link.subscriptions.clear();
    link.detach();
    if (link.server.connected) {
      link.server.disconnect();
    }
  }

  async findCharacteristic(
    connection: TransportConnection,
    uuid: string
  ): Promise<CharacteristicHandle | null> {
    const link = this.own(connection);
    const target = normalizeUuid(uuid);

    for (const [handle, characteristic] of link.characteristics) {
      if (normalizeUuid(characteristic.uuid) === target) {
        return handle;
      }
    }

    const services = await link.server.getPrimaryServices();
    for (const service of services) {
      let characteristic: GattCharacteristicLike;
      try {
        characteristic = await service.getCharacteristic(target);
      } catch (error) {
        if (isNotFound(error)) {
          continue;
        }
        throw error;
      }
      return link.register(characteristic);
    }
    return null;
  }

  async readCharacteristic(
    connection: TransportConnection,
    handle: CharacteristicHandle
  ): Promise<Uint8Array> {
    const value = await this.characteristic(connection, handle).readValue();
    return copyView(value);
  }

  async writeCharacteristic(
    connection: TransportConnection,
    handle: CharacteristicHandle,
    data: Uint8Array
  ): Promise<void> {
    await this.characteristic(connection, handle).writeValueWithResponse(new Uint8Array(data));
  }

  async subscribe(
    connection: TransportConnection,
    handle: CharacteristicHandle,
    onNotify: NotifyHandler
  ): Promise<void> {
    const link = this.own(connection);
    const characteristic = this.characteristic(connection, handle);
    const listener = (): void => {
      if (characteristic.value) {
        onNotify(copyView(characteristic.value));
      }
    };

    characteristic.addEventListener('characteristicvaluechanged', listener);
    try {
      await characteristic.startNotifications();
    } catch (error) {
      characteristic.removeEventListener('characteristicvaluechanged', listener);
      throw error;
    }
    link.subscriptions.set(handle, { characteristic, listener });
  }

  async unsubscribe(connection: TransportConnection, handle: CharacteristicHandle): Promise<void> {
    const link = this.own(connection);
    const subscription = link.subscriptions.get(handle);
    if (!subscription) {
      return;
    }
    link.subscriptions.delete(handle);
    subscription.characteristic.removeEventListener(
      'characteristicvaluechanged',
      subscription.listener
    );
    await subscription.characteristic.stopNotifications();
  }

  private requireBluetooth(): BluetoothLike {
    if (!this.bluetooth) {
      throw new TransportError(
        'Web Bluetooth API not available. Pass a Bluetooth implementation ' +
          'or use Chrome, Edge, or Opera on desktop/Android.'
      );
    }
    return this.bluetooth;
  }

  private own(connection: TransportConnection): WebBluetoothConnection {
    if (!(connection instanceof WebBluetoothConnection)) {
      throw new TransportError('Connection was not opened by this transport');
    }
    return connection;
  }

  private characteristic(
    connection: TransportConnection,
    handle: CharacteristicHandle
  ): GattCharacteristicLike {
    const characteristic = this.own(connection).characteristics.get(handle);
    if (!characteristic) {
      throw new TransportError(`Unknown characteristic handle ${handle}`);
    }
    return characteristic;
  }
}

function copyView(view: DataView): Uint8Array {
  return new Uint8Array(view.buffer.slice(view.byteOffset, view.byteOffset + view.byteLength));
}
