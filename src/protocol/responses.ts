/**
 * Parsers for values read from SK8 characteristics.
 */

import { DecodeError } from '../exceptions';
import type { HardwareFlags } from '../models/hardware';
import type { LedColor } from '../models/led';
import { HardwareFlag, LED_DEVICE_MAX, LED_MAX } from './constants';

function requireLength(data: Uint8Array, min: number, what: string): void {
  if (data.length < min) {
    throw new DecodeError(`${what} too short: ${data.length} bytes (need at least ${min})`);
  }
}

/**
 * Parse battery level characteristic (uint8 percentage).
 */
export function parseBatteryLevel(data: Uint8Array): number {
  requireLength(data, 1, 'Battery level');
  return data[0];
}

/**
 * Decode an ASCII string characteristic (device name, firmware revision).
 *
 * Trailing NUL padding is stripped.
 */
export function parseAsciiString(data: Uint8Array): string {
  const textDecoder = new TextDecoder('ascii');
  return textDecoder.decode(data).replace(/\0+$/, '');
}

/**
 * Parse ExtAna LED state.
 *
 * Format: [r:u16][g:u16][b:u16] little-endian, device range 0-3000,
 * returned scaled to 0-255.
 */
export function parseLedState(data: Uint8Array): LedColor {
  requireLength(data, 6, 'LED state');
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const [r, g, b] = [0, 2, 4].map((offset) =>
    Math.trunc((view.getUint16(offset, true) * LED_MAX) / LED_DEVICE_MAX)
  );
  return { r, g, b };
}

/**
 * Parse polling override register (uint8 milliseconds, 0 = disabled).
 */
export function parsePollingOverride(data: Uint8Array): number {
  requireLength(data, 1, 'Polling override');
  return data[0];
}

/**
 * Parse hardware state register.
 */
export function parseHardwareState(data: Uint8Array): HardwareFlags {
  requireLength(data, 1, 'Hardware state');
  const raw = data[0];
  return {
    raw,
    imus: (raw & HardwareFlag.IMUS) !== 0,
    extAna: (raw & HardwareFlag.EXTANA) !== 0,
  };
}
