/**
 * Transport abstraction consumed by the SK8 driver.
 *
 * The driver never talks to a BLE stack directly; an implementation of
 * {@link SK8Transport} provides scanning, GATT access and notifications.
 * {@link WebBluetoothTransport} is the bundled implementation.
 */

/** Opaque, connection-scoped characteristic handle */
export type CharacteristicHandle = number;

export type NotifyHandler = (data: Uint8Array) => void;

/**
 * Device selection for a scan. If both are given, address wins.
 */
export interface DeviceQuery {
  name?: string;
  address?: string;
}

/**
 * Device found by a scan.
 */
export interface DiscoveredDevice {
  address: string;
  name?: string;
}

/**
 * One live link to a device.
 */
export interface TransportConnection {
  readonly address: string;
  readonly isConnected: boolean;

  /**
   * Register a listener for link loss not initiated by `disconnect()`.
   */
  onDisconnect(listener: () => void): void;
}

export interface SK8Transport {
  /**
   * Scan for a device.
   *
   * @returns The device, or null if nothing matched before the timeout
   */
  scanForDevice(query: DeviceQuery, timeoutMs: number): Promise<DiscoveredDevice | null>;

  connect(device: DiscoveredDevice): Promise<TransportConnection>;

  disconnect(connection: TransportConnection): Promise<void>;

  /**
   * Look up a characteristic by UUID.
   *
   * @returns Its handle, or null if the device does not expose it
   */
  findCharacteristic(
    connection: TransportConnection,
    uuid: string
  ): Promise<CharacteristicHandle | null>;

  readCharacteristic(
    connection: TransportConnection,
    handle: CharacteristicHandle
  ): Promise<Uint8Array>;

  writeCharacteristic(
    connection: TransportConnection,
    handle: CharacteristicHandle,
    data: Uint8Array
  ): Promise<void>;

  /**
   * Enable notifications. `onNotify` runs on the transport's delivery path.
   */
  subscribe(
    connection: TransportConnection,
    handle: CharacteristicHandle,
    onNotify: NotifyHandler
  ): Promise<void>;

  unsubscribe(connection: TransportConnection, handle: CharacteristicHandle): Promise<void>;
}

/**
 * Normalize a UUID to lower-case 128-bit form.
 *
 * 16- and 32-bit short forms are expanded onto the Bluetooth base UUID.
 */
export function normalizeUuid(uuid: string): string {
  const lower = uuid.toLowerCase().replace(/^0x/, '');
  if (/^[0-9a-f]{4}$/.test(lower)) {
    return `0000${lower}-0000-1000-8000-00805f9b34fb`;
  }
  if (/^[0-9a-f]{8}$/.test(lower)) {
    return `${lower}-0000-1000-8000-00805f9b34fb`;
  }
  return lower;
}
