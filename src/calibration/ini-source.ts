/**
 * Calibration coefficients stored in an INI file.
 *
 * File layout (one section per calibrated IMU):
 *
 * ```ini
 * [SK8-A1B2_IMU0]
 * accx_scale = 1.002
 * accx_offset = 12.5
 * ...
 * gyrox_offset = -3.1
 * ...
 * magx_scale = 0.98
 * magx_offset = 140
 * ...
 * ```
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'ini';
import { MAX_IMUS } from '../protocol/constants';
import type {
  CalibrationCoefficients,
  CalibrationSource,
  ScaleOffset,
  Vec3,
} from '../models/calibration';

export const DEFAULT_CALIBRATION_FILE = 'sk8calib.ini';

const AXES = ['x', 'y', 'z'] as const;

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read `<sensor><axis>_<field>` for all three axes.
 *
 * @returns null if any axis is missing or not numeric
 */
function readAxes(section: Section, sensor: string, field: string): Vec3 | null {
  const values = AXES.map((axis) => {
    const raw = section[`${sensor}${axis}_${field}`];
    if (typeof raw === 'number') {
      return raw;
    }
    if (typeof raw === 'string' && raw.trim() !== '') {
      return Number(raw);
    }
    return NaN;
  });

  if (values.some((v) => !Number.isFinite(v))) {
    return null;
  }
  return [values[0], values[1], values[2]];
}

function readScaleOffset(section: Section, sensor: string, label: string): ScaleOffset | undefined {
  if (!(`${sensor}x_offset` in section)) {
    return undefined;
  }
  const scale = readAxes(section, sensor, 'scale');
  const offset = readAxes(section, sensor, 'offset');
  if (!scale || !offset) {
    console.warn(`Incomplete ${sensor} calibration in section ${label}, ignoring it`);
    return undefined;
  }
  return { scale, offset };
}

/**
 * Extract coefficients from one INI section.
 *
 * Sub-sensors with missing or non-numeric keys are left out.
 */
export function parseCalibrationSection(
  section: Section,
  label: string = 'calibration'
): CalibrationCoefficients {
  const coefficients: CalibrationCoefficients = {};

  const acc = readScaleOffset(section, 'acc', label);
  if (acc) {
    coefficients.acc = acc;
  }

  if ('gyrox_offset' in section) {
    const offset = readAxes(section, 'gyro', 'offset');
    if (offset) {
      coefficients.gyro = { offset };
    } else {
      console.warn(`Incomplete gyro calibration in section ${label}, ignoring it`);
    }
  }

  const mag = readScaleOffset(section, 'mag', label);
  if (mag) {
    coefficients.mag = mag;
  }

  return coefficients;
}

/**
 * Parse INI text into per-IMU coefficients for one device.
 *
 * @param deviceIdentity - Device name used as the section prefix
 */
export function parseCalibrationIni(
  text: string,
  deviceIdentity: string
): Map<number, CalibrationCoefficients> {
  const parsed: Record<string, unknown> = parse(text);
  const result = new Map<number, CalibrationCoefficients>();

  for (let i = 0; i < MAX_IMUS; i++) {
    const label = `${deviceIdentity}_IMU${i}`;
    const section = parsed[label];
    if (!isSection(section)) {
      continue;
    }
    console.debug(`Calibration data for ${label} was detected, extracting...`);
    result.set(i, parseCalibrationSection(section, label));
  }

  return result;
}

/**
 * {@link CalibrationSource} reading an INI file from disk.
 */
export class IniCalibrationSource implements CalibrationSource {
  readonly filePath: string;

  /**
   * @param filePath - Defaults to `sk8calib.ini` in the working directory
   */
  constructor(filePath?: string) {
    this.filePath = filePath ?? path.join(process.cwd(), DEFAULT_CALIBRATION_FILE);
  }

  async loadCoefficients(deviceIdentity: string): Promise<Map<number, CalibrationCoefficients>> {
    console.debug(`Attempting to load calibration from ${this.filePath}`);

    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        console.warn(`Calibration file ${this.filePath} not found`);
        return new Map();
      }
      throw error;
    }

    return parseCalibrationIni(text, deviceIdentity);
  }
}
