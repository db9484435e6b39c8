/**
 * Register value builders for SK8 configuration characteristics.
 */

import { InvalidArgumentError } from '../exceptions';
import {
  LED_DEVICE_MAX,
  LED_MAX,
  LED_MIN,
  MAX_DEVICE_NAME_LENGTH,
  MAX_IMUS,
  MAX_POLLING_OVERRIDE_MS,
  MIN_POLLING_OVERRIDE_MS,
  SENSOR_ALL,
} from './constants';

/**
 * Build the IMU selection byte (bit i set enables IMU i).
 *
 * @throws {InvalidArgumentError} If an index is outside 0-4
 */
export function buildImuSelection(imus: readonly number[]): Uint8Array {
  let mask = 0;
  for (const imu of imus) {
    if (!Number.isInteger(imu) || imu < 0 || imu >= MAX_IMUS) {
      throw new InvalidArgumentError(
        `Invalid IMU index ${imu} (must be 0-${MAX_IMUS - 1})`
      );
    }
    mask |= 1 << imu;
  }
  return Uint8Array.of(mask);
}

/**
 * Build the sensor selection byte.
 *
 * @param sensors - Bitwise OR of SensorFlag values
 * @throws {InvalidArgumentError} If the mask is empty or has unknown bits
 */
export function buildSensorSelection(sensors: number): Uint8Array {
  if (!Number.isInteger(sensors) || sensors === 0) {
    throw new InvalidArgumentError('No sensors selected');
  }
  if ((sensors & ~SENSOR_ALL) !== 0) {
    throw new InvalidArgumentError(
      `Unknown sensor bits in mask 0x${sensors.toString(16).padStart(2, '0')}`
    );
  }
  return Uint8Array.of(sensors);
}

/**
 * Build the flag selecting whether IMU packets accompany ExtAna packets.
 */
export function buildExtAnaImuFlag(includeImu: boolean): Uint8Array {
  return Uint8Array.of(includeImu ? 1 : 0);
}

/**
 * Build the ExtAna LED value.
 *
 * Caller channels (0-255) are scaled to the device range (0-3000) and
 * packed as three little-endian uint16 values.
 *
 * @throws {InvalidArgumentError} If a channel is out of range
 */
export function buildLedCommand(r: number, g: number, b: number): Uint8Array {
  const channels = [r, g, b].map(Math.trunc);
  if (Math.min(...channels) < LED_MIN || Math.max(...channels) > LED_MAX) {
    throw new InvalidArgumentError(`RGB channel values must be ${LED_MIN}-${LED_MAX}`);
  }

  const buffer = new ArrayBuffer(6);
  const view = new DataView(buffer);
  channels.forEach((value, i) => {
    view.setUint16(i * 2, Math.trunc((value * LED_DEVICE_MAX) / LED_MAX), true);
  });
  return new Uint8Array(buffer);
}

/**
 * Encode a new device name.
 *
 * @throws {InvalidArgumentError} If empty, too long or not ASCII
 */
export function buildDeviceName(name: string): Uint8Array {
  if (name.length === 0) {
    throw new InvalidArgumentError('Device name cannot be empty');
  }
  if (name.length > MAX_DEVICE_NAME_LENGTH) {
    throw new InvalidArgumentError(
      `Device name exceeds maximum length (${name.length} > ${MAX_DEVICE_NAME_LENGTH})`
    );
  }
  // eslint-disable-next-line no-control-regex
  if (!/^[\x00-\x7f]*$/.test(name)) {
    throw new InvalidArgumentError('Device name must be ASCII');
  }
  return new TextEncoder().encode(name);
}

/**
 * Encode the polling override period.
 *
 * Values below 20ms are sent as 0, which disables the override.
 *
 * @throws {InvalidArgumentError} If the value does not fit in a byte
 */
export function buildPollingOverride(overrideMs: number): Uint8Array {
  if (!Number.isInteger(overrideMs) || overrideMs < 0 || overrideMs > MAX_POLLING_OVERRIDE_MS) {
    throw new InvalidArgumentError(
      `Polling override must be an integer 0-${MAX_POLLING_OVERRIDE_MS}ms`
    );
  }
  return Uint8Array.of(overrideMs < MIN_POLLING_OVERRIDE_MS ? 0 : overrideMs);
}
