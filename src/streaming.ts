/**
 * Streaming mode control for SK8 devices.
 */

import { InvalidArgumentError } from './exceptions';
import type { ExtAnaData } from './models/extana';
import type { IMUData } from './models/imu';
import type { StreamingMode, StreamingState } from './models/streaming';
import {
  buildExtAnaImuFlag,
  buildImuSelection,
  buildSensorSelection,
} from './protocol/commands';
import {
  SENSOR_ALL,
  UUID_EXTANA_DATA,
  UUID_EXTANA_IMU_STREAMING,
  UUID_EXTANA_IMU_STREAMING_LEGACY,
  UUID_IMU_DATA,
  UUID_IMU_SELECTION,
  UUID_SENSOR_SELECTION,
} from './protocol/constants';
import type { SK8Connection } from './transport/connection';
import type { NotifyHandler } from './transport/transport';

/**
 * Decode routines bound to the data characteristics.
 */
export interface NotificationHandlers {
  imu: NotifyHandler;
  extAna: NotifyHandler;
}

const IDLE: StreamingMode = { kind: 'idle' };

/**
 * Enforces the single-active-streaming-mode rule and issues the register
 * writes and subscriptions for each mode.
 *
 * Not safe against overlapping calls: callers must await one enable/disable
 * before starting the next.
 */
export class StreamingController {
  private state: StreamingState = {
    mode: IDLE,
    enabledImus: [],
    enabledSensors: SENSOR_ALL,
  };

  constructor(
    private readonly imus: readonly IMUData[],
    private readonly extAna: ExtAnaData,
    private readonly handlers: NotificationHandlers
  ) {}

  get mode(): StreamingMode {
    return this.state.mode;
  }

  get enabledImus(): number[] {
    return [...this.state.enabledImus];
  }

  get enabledSensors(): number {
    return this.state.enabledSensors;
  }

  /**
   * Select IMUs and sensors, then subscribe to IMU packets.
   *
   * Calling again while IMU streaming is active reconfigures in place.
   *
   * @throws {InvalidArgumentError} If ExtAna streaming is active, an index is
   *   out of range or no sensors are selected
   */
  async enableImuStreaming(
    connection: SK8Connection,
    imus: readonly number[],
    sensors: number = SENSOR_ALL
  ): Promise<void> {
    if (this.state.mode.kind === 'extana') {
      throw new InvalidArgumentError(
        'ExtAna streaming is active; disable it before enabling IMU streaming'
      );
    }

    const enabled = [...new Set(imus)].sort((a, b) => a - b);
    await this.configureImus(connection, enabled, sensors);

    // IMUs dropped by an in-place reconfigure restart their sequence tracking
    for (const index of this.state.enabledImus) {
      if (!enabled.includes(index)) {
        this.imus[index].reset();
      }
    }

    this.state = { mode: { kind: 'imu' }, enabledImus: enabled, enabledSensors: sensors };
    console.log(`IMU streaming enabled for IMUs [${enabled.join(', ')}]`);
  }

  /**
   * Subscribe to ExtAna packets, optionally with internal IMU packets.
   *
   * @param includeImu - Also stream IMU #0 alongside ExtAna data
   * @param sensors - IMU #0 sensors to enable when `includeImu` is set
   * @throws {InvalidArgumentError} If IMU streaming is active
   */
  async enableExtAnaStreaming(
    connection: SK8Connection,
    includeImu: boolean = false,
    sensors: number = SENSOR_ALL
  ): Promise<void> {
    if (this.state.mode.kind === 'imu') {
      throw new InvalidArgumentError(
        'IMU streaming is active; disable it before enabling ExtAna streaming'
      );
    }

    if (includeImu) {
      await this.configureImus(connection, [0], sensors);
    } else if (connection.isSubscribed(UUID_IMU_DATA)) {
      // Reconfiguring from a mode that carried IMU #0
      await connection.unsubscribe(UUID_IMU_DATA);
      this.imus[0].reset();
    }

    await connection.write(
      [UUID_EXTANA_IMU_STREAMING, UUID_EXTANA_IMU_STREAMING_LEGACY],
      buildExtAnaImuFlag(includeImu)
    );
    await connection.subscribe(UUID_EXTANA_DATA, this.handlers.extAna);

    this.state = {
      mode: { kind: 'extana', includesImu: includeImu },
      enabledImus: includeImu ? [0] : [],
      enabledSensors: includeImu ? sensors : this.state.enabledSensors,
    };
    console.log(`ExtAna streaming enabled (includeImu=${includeImu})`);
  }

  /**
   * Stop IMU packets and reset all IMU state. Calibration settings survive.
   *
   * @throws {InvalidArgumentError} If ExtAna streaming is active
   */
  async disableImuStreaming(connection: SK8Connection): Promise<void> {
    if (this.state.mode.kind === 'extana') {
      throw new InvalidArgumentError(
        'ExtAna streaming is active; use disableExtAnaStreaming instead'
      );
    }

    await connection.unsubscribe(UUID_IMU_DATA);
    this.resetImus();
    this.state = { ...this.state, mode: IDLE, enabledImus: [] };
    console.log('IMU streaming disabled');
  }

  /**
   * Stop ExtAna packets (and IMU packets if they were included) and reset
   * the touched sensor state.
   *
   * @throws {InvalidArgumentError} If IMU streaming is active
   */
  async disableExtAnaStreaming(connection: SK8Connection): Promise<void> {
    if (this.state.mode.kind === 'imu') {
      throw new InvalidArgumentError(
        'IMU streaming is active; use disableImuStreaming instead'
      );
    }

    await connection.unsubscribe(UUID_EXTANA_DATA);
    await connection.unsubscribe(UUID_IMU_DATA);
    this.resetImus();
    this.extAna.reset();
    this.state = { ...this.state, mode: IDLE, enabledImus: [] };
    console.log('ExtAna streaming disabled');
  }

  /**
   * Drop to idle without touching the device, e.g. after the link is gone.
   */
  forceIdle(): void {
    this.resetImus();
    this.extAna.reset();
    this.state = { ...this.state, mode: IDLE, enabledImus: [] };
  }

  private async configureImus(
    connection: SK8Connection,
    imus: readonly number[],
    sensors: number
  ): Promise<void> {
    // Validate both registers before writing either
    const imuSelection = buildImuSelection(imus);
    const sensorSelection = buildSensorSelection(sensors);

    console.debug(
      `Setting IMU state = 0x${imuSelection[0].toString(16).padStart(2, '0')} ` +
        `on device ${connection.address}`
    );
    await connection.write(UUID_IMU_SELECTION, imuSelection);
    await connection.write(UUID_SENSOR_SELECTION, sensorSelection);
    await connection.subscribe(UUID_IMU_DATA, this.handlers.imu);
  }

  private resetImus(): void {
    for (const imu of this.imus) {
      imu.reset();
    }
  }
}
