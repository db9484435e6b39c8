import { beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import { TransportError } from '../exceptions';
import { UUID_BATTERY_LEVEL, UUID_IMU_DATA, UUID_IMU_SELECTION } from '../protocol/constants';
import type { CharacteristicHandle, TransportConnection } from './transport';
import {
  WebBluetoothTransport,
  type BluetoothDeviceLike,
  type GattCharacteristicLike,
  type GattServerLike,
  type GattServiceLike,
} from './web-bluetooth';

type Listener = (event: Event) => void;

function notFound(message: string): Error {
  const error = new Error(message);
  error.name = 'NotFoundError';
  return error;
}

function toBytes(value: BufferSource): number[] {
  return ArrayBuffer.isView(value)
    ? Array.from(new Uint8Array(value.buffer, value.byteOffset, value.byteLength))
    : Array.from(new Uint8Array(value));
}

class StubCharacteristic implements GattCharacteristicLike {
  value?: DataView;
  written: number[][] = [];
  notifying = false;
  private listeners = new Set<Listener>();

  constructor(
    readonly uuid: string,
    initial: number[] = []
  ) {
    this.value = new DataView(Uint8Array.from(initial).buffer);
  }

  async readValue(): Promise<DataView> {
    return this.value ?? new DataView(new ArrayBuffer(0));
  }

  async writeValueWithResponse(value: BufferSource): Promise<void> {
    this.written.push(toBytes(value));
  }

  async startNotifications(): Promise<this> {
    this.notifying = true;
    return this;
  }

  async stopNotifications(): Promise<this> {
    this.notifying = false;
    return this;
  }

  addEventListener(_type: 'characteristicvaluechanged', listener: Listener): void {
    this.listeners.add(listener);
  }

  removeEventListener(_type: 'characteristicvaluechanged', listener: Listener): void {
    this.listeners.delete(listener);
  }

  emit(bytes: number[]): void {
    this.value = new DataView(Uint8Array.from(bytes).buffer);
    for (const listener of this.listeners) {
      listener(new Event('characteristicvaluechanged'));
    }
  }
}

class StubServer implements GattServerLike {
  connected = false;

  constructor(private readonly characteristics: StubCharacteristic[]) {}

  async connect(): Promise<this> {
    this.connected = true;
    return this;
  }

  disconnect(): void {
    this.connected = false;
  }

  async getPrimaryServices(): Promise<GattServiceLike[]> {
    const empty: GattServiceLike = {
      getCharacteristic: async (uuid) => {
        throw notFound(`No ${uuid} in this service`);
      },
    };
    const sk8: GattServiceLike = {
      getCharacteristic: async (uuid) => {
        const found = this.characteristics.find((c) => c.uuid === uuid);
        if (!found) {
          throw notFound(`No ${uuid} in this service`);
        }
        return found;
      },
    };
    return [empty, sk8];
  }
}

class StubDevice implements BluetoothDeviceLike {
  readonly gatt: StubServer;
  private listeners = new Set<Listener>();

  constructor(
    readonly id: string,
    readonly name: string | undefined,
    characteristics: StubCharacteristic[]
  ) {
    this.gatt = new StubServer(characteristics);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  addEventListener(_type: 'gattserverdisconnected', listener: Listener): void {
    this.listeners.add(listener);
  }

  removeEventListener(_type: 'gattserverdisconnected', listener: Listener): void {
    this.listeners.delete(listener);
  }

  drop(): void {
    this.gatt.connected = false;
    for (const listener of [...this.listeners]) {
      listener(new Event('gattserverdisconnected'));
    }
  }
}

describe('WebBluetoothTransport', () => {
  let battery: StubCharacteristic;
  let imuData: StubCharacteristic;
  let imuSelection: StubCharacteristic;
  let device: StubDevice;
  let requestDevice: Mock<(options: RequestDeviceOptions) => Promise<BluetoothDeviceLike>>;
  let transport: WebBluetoothTransport;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    battery = new StubCharacteristic(UUID_BATTERY_LEVEL, [77]);
    imuData = new StubCharacteristic(UUID_IMU_DATA);
    imuSelection = new StubCharacteristic(UUID_IMU_SELECTION);
    device = new StubDevice('dev-1', 'SK8-TEST', [battery, imuData, imuSelection]);
    requestDevice = vi.fn(
      async (_options: RequestDeviceOptions): Promise<BluetoothDeviceLike> => device
    );
    transport = new WebBluetoothTransport({ bluetooth: { requestDevice } });
  });

  async function open(): Promise<TransportConnection> {
    const found = await transport.scanForDevice({ name: 'SK8-TEST' }, 1000);
    if (found === null) {
      throw new Error('device was not offered');
    }
    return transport.connect(found);
  }

  async function handleFor(link: TransportConnection, uuid: string): Promise<CharacteristicHandle> {
    const handle = await transport.findCharacteristic(link, uuid);
    if (handle === null) {
      throw new Error(`${uuid} not found`);
    }
    return handle;
  }

  describe('scanForDevice', () => {
    it('filters by name', async () => {
      const found = await transport.scanForDevice({ name: 'SK8-TEST' }, 1000);

      expect(found).toEqual({ address: 'dev-1', name: 'SK8-TEST' });
      expect(requestDevice).toHaveBeenCalledWith(
        expect.objectContaining({ filters: [{ name: 'SK8-TEST' }] })
      );
    });

    it('returns null when the picker is dismissed', async () => {
      requestDevice.mockRejectedValueOnce(notFound('User cancelled the requestDevice() chooser.'));

      expect(await transport.scanForDevice({ name: 'SK8-TEST' }, 1000)).toBeNull();
    });

    it('rejects a device with a different address', async () => {
      expect(await transport.scanForDevice({ address: 'dev-2' }, 1000)).toBeNull();
      expect(requestDevice).toHaveBeenCalledWith(
        expect.objectContaining({ acceptAllDevices: true })
      );
    });

    it('gives up after the timeout', async () => {
      requestDevice.mockReturnValueOnce(new Promise<BluetoothDeviceLike>(() => {}));

      expect(await transport.scanForDevice({ name: 'SK8-TEST' }, 5)).toBeNull();
    });

    it('wraps other request failures', async () => {
      requestDevice.mockRejectedValueOnce(new Error('adapter off'));

      await expect(transport.scanForDevice({ name: 'SK8-TEST' }, 1000)).rejects.toThrow(
        'Device selection failed: adapter off'
      );
    });

    it('fails without a Bluetooth implementation', async () => {
      const bare = new WebBluetoothTransport();
      await expect(bare.scanForDevice({ name: 'SK8-TEST' }, 10)).rejects.toBeInstanceOf(
        TransportError
      );
    });
  });

  describe('connect', () => {
    it('opens the GATT server', async () => {
      const link = await open();

      expect(link.address).toBe('dev-1');
      expect(link.isConnected).toBe(true);
    });

    it('forgets a scanned device once connected', async () => {
      const found = await transport.scanForDevice({ name: 'SK8-TEST' }, 1000);
      if (found === null) {
        throw new Error('device was not offered');
      }
      await transport.connect(found);

      await expect(transport.connect(found)).rejects.toThrow(
        'Unknown device dev-1; scan for it first'
      );
    });

    it('requires a scan first', async () => {
      await expect(transport.connect({ address: 'dev-9' })).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('characteristics', () => {
    it('finds characteristics across services', async () => {
      const link = await open();

      const handle = await handleFor(link, '2a19');
      expect(await transport.findCharacteristic(link, UUID_BATTERY_LEVEL)).toBe(handle);
      expect(await transport.findCharacteristic(link, '2a26')).toBeNull();
    });

    it('reads and writes values', async () => {
      const link = await open();

      const handle = await handleFor(link, UUID_BATTERY_LEVEL);
      const value = await transport.readCharacteristic(link, handle);
      expect(Array.from(value)).toEqual([77]);

      await transport.writeCharacteristic(
        link,
        await handleFor(link, UUID_IMU_SELECTION),
        Uint8Array.of(5)
      );
      expect(imuSelection.written).toEqual([[5]]);
    });

    it('delivers notifications until unsubscribed', async () => {
      const link = await open();
      const handle = await handleFor(link, UUID_IMU_DATA);
      const onNotify = vi.fn<(data: Uint8Array) => void>();

      await transport.subscribe(link, handle, onNotify);
      expect(imuData.notifying).toBe(true);
      imuData.emit([1, 2, 3]);

      await transport.unsubscribe(link, handle);
      expect(imuData.notifying).toBe(false);
      imuData.emit([4, 5, 6]);

      expect(onNotify).toHaveBeenCalledTimes(1);
      expect(Array.from(onNotify.mock.calls[0][0])).toEqual([1, 2, 3]);
    });
  });

  describe('disconnect', () => {
    it('reports link loss to listeners', async () => {
      const link = await open();
      const onLost = vi.fn();
      link.onDisconnect(onLost);

      device.drop();

      expect(onLost).toHaveBeenCalledTimes(1);
      expect(link.isConnected).toBe(false);
    });

    it('does not report an intentional disconnect as link loss', async () => {
      const link = await open();
      const onLost = vi.fn();
      link.onDisconnect(onLost);

      await transport.disconnect(link);

      expect(device.gatt.connected).toBe(false);
      expect(device.listenerCount).toBe(0);
      expect(onLost).not.toHaveBeenCalled();
    });
  });
});
