/**
 * Per-IMU sensor state.
 */

import {
  calibrateSample,
  hasCoefficients,
  type CalibrationCoefficients,
  type Vec3,
} from './calibration';
import { PacketLossTracker, systemClock, type Clock } from './loss-tracker';

const ZERO: Vec3 = [0, 0, 0];

/**
 * Latest data and loss statistics for one IMU slot.
 *
 * Index 0 is the SK8's built-in IMU, 1-4 are the chained external IMUs
 * starting from the one closest to the SK8.
 */
export class IMUData {
  acc: Vec3 = ZERO;
  gyro: Vec3 = ZERO;
  mag: Vec3 = ZERO;
  /** Arrival time of the latest packet (seconds), null before the first */
  timestamp: number | null = null;

  private calibrationEnabled = false;
  private coefficients: CalibrationCoefficients | null = null;
  private readonly tracker: PacketLossTracker;

  constructor(
    readonly index: number,
    clock: Clock = systemClock
  ) {
    this.tracker = new PacketLossTracker(clock);
  }

  /**
   * Sequence number of the latest packet, or null since the last reset.
   */
  get lastSeq(): number | null {
    return this.tracker.lastSeq;
  }

  /**
   * Loaded calibration coefficients, if any.
   */
  get calibration(): CalibrationCoefficients | null {
    return this.coefficients;
  }

  /**
   * Packets per second over the last 3 seconds, null while warming up.
   */
  getSampleRate(): number | null {
    return this.tracker.sampleRate();
  }

  /**
   * Packets lost over the last 3 seconds, null while warming up.
   */
  getPacketsLost(): number | null {
    return this.tracker.recentLoss();
  }

  getTotalPacketsLost(): number {
    return this.tracker.lifetimeLoss();
  }

  /**
   * Enable or disable calibrated output.
   *
   * Has no visible effect until coefficients are loaded.
   */
  setCalibration(enabled: boolean): void {
    this.calibrationEnabled = enabled;
  }

  getCalibration(): boolean {
    return this.calibrationEnabled;
  }

  /**
   * Install calibration coefficients and enable calibrated output.
   *
   * @returns False if nothing was loaded (null or empty coefficients)
   */
  loadCalibration(coefficients: CalibrationCoefficients | null): boolean {
    if (coefficients === null || !hasCoefficients(coefficients)) {
      return false;
    }
    this.coefficients = coefficients;
    this.calibrationEnabled = true;
    return true;
  }

  clearCalibration(): void {
    this.coefficients = null;
    this.calibrationEnabled = false;
  }

  /**
   * Apply a decoded packet.
   *
   * @returns Number of packets dropped before this one
   */
  update(acc: Vec3, gyro: Vec3, mag: Vec3, seq: number, timestamp: number): number {
    if (this.calibrationEnabled && this.coefficients) {
      const calibrated = calibrateSample(this.coefficients, acc, gyro, mag);
      this.acc = calibrated.acc;
      this.gyro = calibrated.gyro;
      this.mag = calibrated.mag;
    } else {
      this.acc = acc;
      this.gyro = gyro;
      this.mag = mag;
    }

    this.timestamp = timestamp;
    return this.tracker.track(seq, timestamp);
  }

  /**
   * Clear samples and loss statistics. Calibration settings are kept.
   */
  reset(): void {
    this.acc = ZERO;
    this.gyro = ZERO;
    this.mag = ZERO;
    this.timestamp = null;
    this.tracker.reset();
  }

  toString(): string {
    return (
      `[${this.index}] acc=${this.acc.join(',')}, mag=${this.mag.join(',')}, ` +
      `gyro=${this.gyro.join(',')}, seq=${this.lastSeq ?? '-'}`
    );
  }
}
