/**
 * In-process SK8Transport for tests.
 */

import * as constants from '../protocol/constants';
import {
  normalizeUuid,
  type CharacteristicHandle,
  type DeviceQuery,
  type DiscoveredDevice,
  type NotifyHandler,
  type SK8Transport,
  type TransportConnection,
} from '../transport/transport';

export const ALL_CHARACTERISTICS: readonly string[] = [
  constants.UUID_DEVICE_NAME,
  constants.UUID_BATTERY_LEVEL,
  constants.UUID_FIRMWARE_REVISION,
  constants.UUID_IMU_DATA,
  constants.UUID_EXTANA_DATA,
  constants.UUID_IMU_SELECTION,
  constants.UUID_SENSOR_SELECTION,
  constants.UUID_EXTANA_LED,
  constants.UUID_POLLING_OVERRIDE,
  constants.UUID_HARDWARE_STATE,
  constants.UUID_EXTANA_IMU_STREAMING,
];

export class FakeConnection implements TransportConnection {
  isConnected = true;
  private listeners: (() => void)[] = [];

  constructor(readonly address: string) {}

  onDisconnect(listener: () => void): void {
    this.listeners.push(listener);
  }

  /**
   * Simulate the link dropping.
   */
  drop(): void {
    this.isConnected = false;
    for (const listener of this.listeners) {
      listener();
    }
  }
}

export class FakeTransport implements SK8Transport {
  device: DiscoveredDevice = { address: 'AA:BB:CC:DD:EE:FF', name: 'SK8-TEST' };
  connection: FakeConnection | null = null;
  /** Current characteristic values, keyed by normalized UUID */
  values = new Map<string, Uint8Array>();
  /** Ordered log of transport calls, e.g. "write:<uuid>" */
  events: string[] = [];
  findCalls: string[] = [];
  failWrites = false;
  failUnsubscribes = false;

  private readonly uuids: string[];
  private writes: { uuid: string; data: number[] }[] = [];
  private handlers = new Map<string, NotifyHandler>();

  constructor(characteristics: readonly string[] = ALL_CHARACTERISTICS) {
    this.uuids = characteristics.map(normalizeUuid);
  }

  async scanForDevice(query: DeviceQuery): Promise<DiscoveredDevice | null> {
    if (query.address !== undefined) {
      return query.address === this.device.address ? this.device : null;
    }
    return query.name === this.device.name ? this.device : null;
  }

  async connect(device: DiscoveredDevice): Promise<TransportConnection> {
    this.events.push('connect');
    this.connection = new FakeConnection(device.address);
    return this.connection;
  }

  async disconnect(connection: TransportConnection): Promise<void> {
    this.events.push('disconnect');
    if (connection instanceof FakeConnection) {
      connection.isConnected = false;
    }
    this.handlers.clear();
  }

  async findCharacteristic(
    _connection: TransportConnection,
    uuid: string
  ): Promise<CharacteristicHandle | null> {
    this.findCalls.push(uuid);
    const index = this.uuids.indexOf(normalizeUuid(uuid));
    return index === -1 ? null : index + 1;
  }

  async readCharacteristic(
    _connection: TransportConnection,
    handle: CharacteristicHandle
  ): Promise<Uint8Array> {
    const uuid = this.uuidFor(handle);
    this.events.push(`read:${uuid}`);
    return this.values.get(uuid) ?? new Uint8Array(0);
  }

  async writeCharacteristic(
    _connection: TransportConnection,
    handle: CharacteristicHandle,
    data: Uint8Array
  ): Promise<void> {
    if (this.failWrites) {
      throw new Error('GATT write failed');
    }
    const uuid = this.uuidFor(handle);
    this.events.push(`write:${uuid}`);
    this.writes.push({ uuid, data: Array.from(data) });
    this.values.set(uuid, data);
  }

  async subscribe(
    _connection: TransportConnection,
    handle: CharacteristicHandle,
    onNotify: NotifyHandler
  ): Promise<void> {
    const uuid = this.uuidFor(handle);
    this.events.push(`subscribe:${uuid}`);
    this.handlers.set(uuid, onNotify);
  }

  async unsubscribe(_connection: TransportConnection, handle: CharacteristicHandle): Promise<void> {
    if (this.failUnsubscribes) {
      throw new Error('GATT unsubscribe failed');
    }
    const uuid = this.uuidFor(handle);
    this.events.push(`unsubscribe:${uuid}`);
    this.handlers.delete(uuid);
  }

  setValue(uuid: string, data: number[] | Uint8Array): void {
    this.values.set(normalizeUuid(uuid), Uint8Array.from(data));
  }

  /**
   * Bytes written to a characteristic, one array per write.
   */
  writesTo(uuid: string): number[][] {
    const key = normalizeUuid(uuid);
    return this.writes.filter((w) => w.uuid === key).map((w) => w.data);
  }

  isSubscribed(uuid: string): boolean {
    return this.handlers.has(normalizeUuid(uuid));
  }

  /**
   * Deliver a notification as the BLE stack would.
   */
  notify(uuid: string, data: Uint8Array): void {
    this.handlers.get(normalizeUuid(uuid))?.(data);
  }

  private uuidFor(handle: CharacteristicHandle): string {
    const uuid = this.uuids[handle - 1];
    if (uuid === undefined) {
      throw new Error(`Unknown handle ${handle}`);
    }
    return uuid;
  }
}
