/**
 * IMU calibration coefficients and the transform that applies them.
 */

/** Three-axis sample, ordered x, y, z. */
export type Vec3 = readonly [number, number, number];

/**
 * Scale + offset correction for one sub-sensor.
 */
export interface ScaleOffset {
  scale: Vec3;
  offset: Vec3;
}

/**
 * Calibration data for a single IMU.
 *
 * Each sub-sensor block is optional: a missing block means that sub-sensor
 * is not calibrated and its samples pass through unchanged.
 */
export interface CalibrationCoefficients {
  acc?: ScaleOffset;
  /** Gyroscope correction is offset-only */
  gyro?: { offset: Vec3 };
  mag?: ScaleOffset;
}

/**
 * Source of per-IMU coefficients for a device.
 *
 * Absent map entries mean the IMU has no calibration.
 */
export interface CalibrationSource {
  loadCoefficients(deviceIdentity: string): Promise<Map<number, CalibrationCoefficients>>;
}

export const UNIT_SCALE: Vec3 = [1, 1, 1];

/**
 * Apply `raw * scale - offset` per axis.
 *
 * @param skip - Return `raw` untouched
 */
export function applyCalibration(
  raw: Vec3,
  offsets: Vec3,
  scales: Vec3,
  skip: boolean = false
): Vec3 {
  if (skip) {
    return raw;
  }

  return [
    raw[0] * scales[0] - offsets[0],
    raw[1] * scales[1] - offsets[1],
    raw[2] * scales[2] - offsets[2],
  ];
}

/**
 * Round each axis to the device's integer sample domain.
 */
export function roundVec3(v: Vec3): Vec3 {
  return [Math.round(v[0]), Math.round(v[1]), Math.round(v[2])];
}

/**
 * Calibrate one IMU sample set.
 *
 * Accelerometer and magnetometer results are rounded; gyroscope stays
 * floating point. Sub-sensors without coefficients are returned raw.
 */
export function calibrateSample(
  coefficients: CalibrationCoefficients,
  acc: Vec3,
  gyro: Vec3,
  mag: Vec3
): { acc: Vec3; gyro: Vec3; mag: Vec3 } {
  const { acc: accCal, gyro: gyroCal, mag: magCal } = coefficients;

  return {
    acc: accCal ? roundVec3(applyCalibration(acc, accCal.offset, accCal.scale)) : acc,
    gyro: gyroCal ? applyCalibration(gyro, gyroCal.offset, UNIT_SCALE) : gyro,
    mag: magCal ? roundVec3(applyCalibration(mag, magCal.offset, magCal.scale)) : mag,
  };
}

/**
 * Check whether any sub-sensor block is present.
 */
export function hasCoefficients(coefficients: CalibrationCoefficients): boolean {
  return Boolean(coefficients.acc || coefficients.gyro || coefficients.mag);
}
