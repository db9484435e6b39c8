/**
 * Main SK8 device class.
 */

import { IniCalibrationSource } from './calibration/ini-source';
import {
  DecodeError,
  InvalidArgumentError,
  NotConnectedError,
  TransportError,
} from './exceptions';
import type { CalibrationSource, Vec3 } from './models/calibration';
import { ExtAnaData } from './models/extana';
import type { HardwareFlags } from './models/hardware';
import { IMUData } from './models/imu';
import { sameColor, type LedColor } from './models/led';
import { systemClock, type Clock } from './models/loss-tracker';
import type { StreamingMode } from './models/streaming';
import {
  buildDeviceName,
  buildLedCommand,
  buildPollingOverride,
} from './protocol/commands';
import {
  MAX_IMUS,
  SENSOR_ALL,
  UUID_BATTERY_LEVEL,
  UUID_DEVICE_NAME,
  UUID_EXTANA_LED,
  UUID_FIRMWARE_REVISION,
  UUID_HARDWARE_STATE,
  UUID_HARDWARE_STATE_LEGACY,
  UUID_POLLING_OVERRIDE,
} from './protocol/constants';
import {
  decodeExtAnaPacket,
  decodeImuPacket,
  type ExtAnaPacket,
  type ImuPacket,
} from './protocol/packets';
import {
  parseAsciiString,
  parseBatteryLevel,
  parseHardwareState,
  parseLedState,
  parsePollingOverride,
} from './protocol/responses';
import { StreamingController } from './streaming';
import { SK8Connection } from './transport/connection';
import type { DeviceQuery, SK8Transport, TransportConnection } from './transport/transport';

/**
 * Called for every IMU packet.
 *
 * Runs synchronously on the transport's notification path: a slow callback
 * delays delivery of every packet behind it.
 */
export type ImuCallback<T> = (
  acc: Vec3,
  gyro: Vec3,
  mag: Vec3,
  imuIndex: number,
  seq: number,
  timestamp: number,
  userData: T
) => void;

/**
 * Called for every ExtAna packet. Same timing contract as {@link ImuCallback}.
 *
 * @param temperature - Degrees C
 */
export type ExtAnaCallback<T> = (
  ch1: number,
  ch2: number,
  temperature: number,
  seq: number,
  timestamp: number,
  userData: T
) => void;

type ImuListener = (
  acc: Vec3,
  gyro: Vec3,
  mag: Vec3,
  imuIndex: number,
  seq: number,
  timestamp: number
) => void;
type ExtAnaListener = (
  ch1: number,
  ch2: number,
  temperature: number,
  seq: number,
  timestamp: number
) => void;

export interface SK8DeviceOptions {
  transport: SK8Transport;

  /**
   * Where to load calibration from. Defaults to `sk8calib.ini` in the
   * working directory.
   */
  calibrationSource?: CalibrationSource;

  /** Load calibration on connect (default true) */
  loadCalibration?: boolean;

  /** Time source in seconds, used for packet timestamps */
  clock?: Clock;
}

/**
 * SK8 wearable sensor device.
 *
 * Owns one connection at a time. Methods are not safe to call concurrently:
 * await each call before issuing the next.
 *
 * @example
 * ```typescript
 * const sk8 = new SK8Device({ transport: new WebBluetoothTransport() });
 * await sk8.connect({ name: 'SK8-A1B2' });
 *
 * sk8.setImuCallback((acc, gyro, mag, imu, seq) => {
 *   console.log(`[${imu}] #${seq} acc=${acc}`);
 * }, null);
 * await sk8.enableImuStreaming([0, 1], SensorFlag.ACC | SensorFlag.GYRO);
 *
 * // ...
 * await sk8.disableImuStreaming();
 * await sk8.disconnect();
 * ```
 */
export class SK8Device {
  static readonly DEFAULT_SCAN_TIMEOUT = 3000;

  private readonly transport: SK8Transport;
  private readonly calibrationSource: CalibrationSource;
  private readonly autoLoadCalibration: boolean;
  private readonly clock: Clock;

  private connection: SK8Connection | null = null;
  private readonly imus: IMUData[];
  private readonly extAna = new ExtAnaData();
  private readonly streaming: StreamingController;

  private imuListener: ImuListener | null = null;
  private extAnaListener: ExtAnaListener | null = null;

  private packets = 0;
  private _name: string | null = null;
  private _firmwareVersion: string | null = null;
  private _hardware: HardwareFlags | null = null;
  private _ledState: LedColor | null = null;

  constructor(options: SK8DeviceOptions) {
    this.transport = options.transport;
    this.calibrationSource = options.calibrationSource ?? new IniCalibrationSource();
    this.autoLoadCalibration = options.loadCalibration ?? true;
    this.clock = options.clock ?? systemClock;

    this.imus = Array.from({ length: MAX_IMUS }, (_, i) => new IMUData(i, this.clock));
    this.streaming = new StreamingController(this.imus, this.extAna, {
      imu: (data) => this.handleImuNotification(data),
      extAna: (data) => this.handleExtAnaNotification(data),
    });
  }

  /**
   * Check if currently connected to a device.
   */
  get isConnected(): boolean {
    return this.connection?.isConnected ?? false;
  }

  /**
   * Address of the connected device.
   */
  get address(): string | null {
    return this.connection?.address ?? null;
  }

  /**
   * Scan for and connect to an SK8.
   *
   * Any existing connection is closed first. Calibration is loaded after
   * connecting unless disabled in the constructor options; failing to load
   * it is logged but does not fail the connection.
   *
   * @throws {InvalidArgumentError} If neither name nor address is given
   * @throws {TransportError} If the device is not found or connection fails
   */
  async connect(
    query: DeviceQuery,
    timeoutMs: number = SK8Device.DEFAULT_SCAN_TIMEOUT
  ): Promise<void> {
    if (query.name === undefined && query.address === undefined) {
      throw new InvalidArgumentError('Must supply either a name or address to connect to');
    }

    if (this.connection) {
      await this.disconnect();
    }

    console.debug(
      query.address !== undefined
        ? `Searching for device address=${query.address}`
        : `Searching for device name=${query.name}`
    );
    const found = await this.transport.scanForDevice(query, timeoutMs);
    if (!found) {
      throw new TransportError(
        `Failed to find target device with name=${query.name}/address=${query.address}`
      );
    }

    let link: TransportConnection;
    try {
      link = await this.transport.connect(found);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(
        `Failed to connect: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const connection = new SK8Connection(this.transport, link);
    this.connection = connection;
    this._name = found.name ?? null;
    link.onDisconnect(() => this.handleLinkLost(connection));
    console.log(`Connected to ${found.name ?? found.address}`);

    if (this.autoLoadCalibration) {
      try {
        await this.loadCalibration();
      } catch (error) {
        console.warn(
          `Calibration not loaded: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
  }

  /**
   * Disconnect from the device.
   *
   * Notifications are stopped before sensor state is reset, so no callback
   * fires during teardown.
   *
   * @returns False if there was no connection
   */
  async disconnect(): Promise<boolean> {
    const connection = this.connection;
    if (!connection) {
      return false;
    }

    // Drops any notification still in flight
    this.connection = null;
    try {
      await connection.close();
    } finally {
      this.resetSession();
      console.log('Disconnected');
    }
    return true;
  }

  /**
   * True if both instances are connected to the same device.
   */
  isSameDevice(other: SK8Device): boolean {
    return this.isConnected && other.isConnected && this.address === other.address;
  }

  // --- Calibration ---------------------------------------------------------

  /**
   * Enable or disable calibrated output.
   *
   * @param imus - IMU indices to change; empty means all
   * @throws {InvalidArgumentError} If an index is out of range
   */
  setCalibration(enabled: boolean, imus: readonly number[] = []): void {
    const targets = imus.length === 0 ? this.imus.map((imu) => imu.index) : imus;
    for (const i of targets) {
      this.requireImuIndex(i);
    }
    for (const i of targets) {
      this.imus[i].setCalibration(enabled);
    }
  }

  /**
   * Calibration flag for each IMU.
   *
   * An enabled IMU without loaded coefficients still outputs raw data.
   */
  getCalibration(): boolean[] {
    return this.imus.map((imu) => imu.getCalibration());
  }

  /**
   * Load calibration coefficients for this device's IMUs.
   *
   * The device name selects the coefficient set. Coefficients loaded
   * earlier are replaced, including for IMUs the new set does not cover.
   *
   * @param source - Overrides the source given to the constructor
   * @returns True if any IMU received coefficients
   * @throws {NotConnectedError} If not connected
   */
  async loadCalibration(source: CalibrationSource = this.calibrationSource): Promise<boolean> {
    this.ensureConnected();

    const identity = await this.calibrationIdentity();
    console.debug(`Loading calibration for ${identity}`);

    const coefficients = await source.loadCoefficients(identity);
    let loaded = false;
    for (const imu of this.imus) {
      // IMUs without an entry in the new set fall back to raw output
      imu.clearCalibration();
      if (imu.loadCalibration(coefficients.get(imu.index) ?? null)) {
        console.log(`Loaded calibration for IMU ${imu.index}`);
        loaded = true;
      }
    }
    return loaded;
  }

  // --- Streaming -----------------------------------------------------------

  /**
   * Register the IMU packet callback; pass null to remove it.
   *
   * @param userData - Passed through as the callback's last argument
   */
  setImuCallback<T>(callback: ImuCallback<T> | null, userData: T): void {
    this.imuListener =
      callback === null
        ? null
        : (acc, gyro, mag, imuIndex, seq, timestamp) =>
            callback(acc, gyro, mag, imuIndex, seq, timestamp, userData);
  }

  /**
   * Register the ExtAna packet callback; pass null to remove it.
   */
  setExtAnaCallback<T>(callback: ExtAnaCallback<T> | null, userData: T): void {
    this.extAnaListener =
      callback === null
        ? null
        : (ch1, ch2, temperature, seq, timestamp) =>
            callback(ch1, ch2, temperature, seq, timestamp, userData);
  }

  /**
   * Configure and enable IMU streaming.
   *
   * Only one streaming mode can be active: disable ExtAna streaming first.
   *
   * @param imus - IMU indices 0-4 (0 is the SK8 itself)
   * @param sensors - Bitwise OR of SensorFlag values
   * @throws {NotConnectedError} If not connected
   * @throws {InvalidArgumentError} If arguments are invalid or ExtAna streaming is active
   * @throws {AttributeUnsupportedError} If the device lacks a required characteristic
   */
  async enableImuStreaming(imus: readonly number[], sensors: number = SENSOR_ALL): Promise<void> {
    await this.streaming.enableImuStreaming(this.ensureConnected(), imus, sensors);
  }

  /**
   * Disable IMU streaming and reset IMU state (calibration is kept).
   */
  async disableImuStreaming(): Promise<void> {
    await this.streaming.disableImuStreaming(this.ensureConnected());
  }

  /**
   * Configure and enable SK8-ExtAna streaming.
   *
   * Only one streaming mode can be active: disable IMU streaming first.
   *
   * @param includeImu - Also stream the SK8's internal IMU
   * @param sensors - Internal IMU sensors to enable when `includeImu` is set
   */
  async enableExtAnaStreaming(
    includeImu: boolean = false,
    sensors: number = SENSOR_ALL
  ): Promise<void> {
    await this.streaming.enableExtAnaStreaming(this.ensureConnected(), includeImu, sensors);
  }

  async disableExtAnaStreaming(): Promise<void> {
    await this.streaming.disableExtAnaStreaming(this.ensureConnected());
  }

  getStreamingMode(): StreamingMode {
    return this.streaming.mode;
  }

  /**
   * IMU indices most recently enabled; empty when not streaming.
   */
  getEnabledImus(): number[] {
    return this.streaming.enabledImus;
  }

  getEnabledSensors(): number {
    return this.streaming.enabledSensors;
  }

  /**
   * Number of data packets received since connecting or the last reset.
   */
  getReceivedPackets(): number {
    return this.packets;
  }

  resetReceivedPackets(): void {
    this.packets = 0;
  }

  /**
   * IMU state for one slot, or null for an invalid index.
   */
  getImu(index: number): IMUData | null {
    return this.imus[index] ?? null;
  }

  getExtAna(): ExtAnaData {
    return this.extAna;
  }

  // --- Device attributes ---------------------------------------------------

  /**
   * Read battery level as a percentage.
   */
  async getBatteryLevel(): Promise<number> {
    const data = await this.ensureConnected().read(UUID_BATTERY_LEVEL);
    return parseBatteryLevel(data);
  }

  /**
   * Get the BLE device name.
   *
   * @param cached - Return the cached name if known
   */
  async getDeviceName(cached: boolean = true): Promise<string> {
    const connection = this.ensureConnected();
    if (cached && this._name !== null) {
      return this._name;
    }

    this._name = parseAsciiString(await connection.read(UUID_DEVICE_NAME));
    return this._name;
  }

  /**
   * Set a new BLE device name (ASCII, max 20 characters).
   */
  async setDeviceName(name: string): Promise<void> {
    const connection = this.ensureConnected();
    await connection.write(UUID_DEVICE_NAME, buildDeviceName(name));
    this._name = name;
  }

  /**
   * Get the firmware revision string.
   */
  async getFirmwareVersion(cached: boolean = true): Promise<string> {
    const connection = this.ensureConnected();
    if (cached && this._firmwareVersion !== null) {
      return this._firmwareVersion;
    }

    this._firmwareVersion = parseAsciiString(await connection.read(UUID_FIRMWARE_REVISION));
    console.log(`Firmware version: ${this._firmwareVersion}`);
    return this._firmwareVersion;
  }

  /**
   * Current SK8-ExtAna LED colour.
   *
   * @param cached - Return the colour last set through this instance
   * @returns Null if cached and never set
   */
  async getExtAnaLed(cached: boolean = true): Promise<LedColor | null> {
    if (cached) {
      return this._ledState;
    }
    return parseLedState(await this.ensureConnected().read(UUID_EXTANA_LED));
  }

  /**
   * Set the SK8-ExtAna LED colour (channels 0-255).
   *
   * @param checkState - Skip the write if the cached colour already matches
   */
  async setExtAnaLed(r: number, g: number, b: number, checkState: boolean = true): Promise<void> {
    const connection = this.ensureConnected();
    const command = buildLedCommand(r, g, b);
    const color = { r: Math.trunc(r), g: Math.trunc(g), b: Math.trunc(b) };
    if (checkState && sameColor(this._ledState, color)) {
      return;
    }

    await connection.write(UUID_EXTANA_LED, command);
    this._ledState = color;
  }

  /**
   * Sensor polling override in milliseconds (0 = firmware default).
   */
  async getPollingOverride(): Promise<number> {
    return parsePollingOverride(await this.ensureConnected().read(UUID_POLLING_OVERRIDE));
  }

  /**
   * Override the firmware's sensor polling period.
   *
   * Takes effect immediately and applies to every sensor configuration
   * until cleared. Values below 20ms disable the override. The setting is
   * held in device RAM and lost on reboot.
   */
  async setPollingOverride(overrideMs: number): Promise<void> {
    const connection = this.ensureConnected();
    await connection.write(UUID_POLLING_OVERRIDE, buildPollingOverride(overrideMs));
  }

  /**
   * Whether an external IMU chain is attached.
   *
   * Do not call while streaming is active.
   *
   * @param cached - Use the last hardware state read, if any
   */
  async hasImus(cached: boolean = true): Promise<boolean> {
    return (await this.hardwareState(cached)).imus;
  }

  /**
   * Whether an SK8-ExtAna board is attached.
   *
   * Do not call while streaming is active.
   */
  async hasExtAna(cached: boolean = true): Promise<boolean> {
    return (await this.hardwareState(cached)).extAna;
  }

  // --- Notification dispatch -----------------------------------------------

  private handleImuNotification(data: Uint8Array): void {
    if (!this.connection) {
      return;
    }

    let packet: ImuPacket;
    try {
      packet = decodeImuPacket(data);
    } catch (error) {
      if (error instanceof DecodeError) {
        console.warn(`Skipping IMU packet: ${error.message}`);
        return;
      }
      throw error;
    }

    const timestamp = this.clock();
    const imu = this.imus[packet.imuIndex];
    imu.update(packet.acc, packet.gyro, packet.mag, packet.seq, timestamp);
    this.packets++;

    if (this.imuListener) {
      try {
        this.imuListener(imu.acc, imu.gyro, imu.mag, packet.imuIndex, packet.seq, timestamp);
      } catch (error) {
        console.error('IMU callback threw:', error);
      }
    }
  }

  private handleExtAnaNotification(data: Uint8Array): void {
    if (!this.connection) {
      return;
    }

    let packet: ExtAnaPacket;
    try {
      packet = decodeExtAnaPacket(data);
    } catch (error) {
      if (error instanceof DecodeError) {
        console.warn(`Skipping ExtAna packet: ${error.message}`);
        return;
      }
      throw error;
    }

    const timestamp = this.clock();
    this.extAna.update(packet.ch1, packet.ch2, packet.rawTemperature, packet.seq, timestamp);
    this.packets++;

    if (this.extAnaListener) {
      try {
        this.extAnaListener(
          packet.ch1,
          packet.ch2,
          this.extAna.temperature,
          packet.seq,
          timestamp
        );
      } catch (error) {
        console.error('ExtAna callback threw:', error);
      }
    }
  }

  // --- Internals -----------------------------------------------------------

  private async hardwareState(cached: boolean): Promise<HardwareFlags> {
    const connection = this.ensureConnected();
    if (cached && this._hardware !== null) {
      return this._hardware;
    }

    const data = await connection.read([UUID_HARDWARE_STATE, UUID_HARDWARE_STATE_LEGACY]);
    this._hardware = parseHardwareState(data);
    return this._hardware;
  }

  /**
   * Name used to select calibration data; falls back to the address.
   */
  private async calibrationIdentity(): Promise<string> {
    if (this._name !== null) {
      return this._name;
    }
    try {
      return await this.getDeviceName(false);
    } catch (error) {
      console.warn(
        `Could not read device name, using address: ` +
          `${error instanceof Error ? error.message : String(error)}`
      );
      return this.ensureConnected().address;
    }
  }

  /**
   * Link dropped without disconnect() being called.
   */
  private handleLinkLost(connection: SK8Connection): void {
    if (this.connection !== connection) {
      return;
    }
    this.connection = null;
    connection.characteristics.clear();
    this.resetSession();
    console.log('Connection lost');
  }

  private resetSession(): void {
    this.streaming.forceIdle();
    // Coefficients belong to the device that was connected
    for (const imu of this.imus) {
      imu.clearCalibration();
    }
    this.packets = 0;
    this._name = null;
    this._firmwareVersion = null;
    this._hardware = null;
    this._ledState = null;
  }

  private requireImuIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= MAX_IMUS) {
      throw new InvalidArgumentError(`Invalid IMU index ${index} (must be 0-${MAX_IMUS - 1})`);
    }
  }

  /**
   * Ensure device is connected.
   */
  private ensureConnected(): SK8Connection {
    if (!this.connection || !this.connection.isConnected) {
      throw new NotConnectedError();
    }
    return this.connection;
  }
}
