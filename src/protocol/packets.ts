/**
 * Decoders for SK8 streaming notification packets.
 */

import { DecodeError } from '../exceptions';
import type { Vec3 } from '../models/calibration';
import { EXTANA_PACKET_SIZE, IMU_PACKET_SIZE, MAX_IMUS } from './constants';

/**
 * Decoded IMU packet.
 */
export interface ImuPacket {
  acc: Vec3;
  gyro: Vec3;
  mag: Vec3;
  /** Originating IMU (0-4) */
  imuIndex: number;
  /** Sequence number (0-255) */
  seq: number;
}

/**
 * Decoded ExtAna packet.
 */
export interface ExtAnaPacket {
  ch1: number;
  ch2: number;
  /** Raw temperature in units of 0.01 degrees C */
  rawTemperature: number;
  seq: number;
}

function readVec3(view: DataView, offset: number): Vec3 {
  return [
    view.getInt16(offset, true),
    view.getInt16(offset + 2, true),
    view.getInt16(offset + 4, true),
  ];
}

/**
 * Parse an IMU notification.
 *
 * Format (20 bytes, little-endian):
 *   [acc:3xi16][gyro:3xi16][mag:3xi16][imu:u8][seq:u8]
 *
 * @throws {DecodeError} If the length or IMU index is invalid
 */
export function decodeImuPacket(data: Uint8Array): ImuPacket {
  if (data.length !== IMU_PACKET_SIZE) {
    throw new DecodeError(
      `IMU packet has ${data.length} bytes (expected ${IMU_PACKET_SIZE})`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const imuIndex = view.getUint8(18);
  if (imuIndex >= MAX_IMUS) {
    throw new DecodeError(`IMU packet index out of range: ${imuIndex}`);
  }

  return {
    acc: readVec3(view, 0),
    gyro: readVec3(view, 6),
    mag: readVec3(view, 12),
    imuIndex,
    seq: view.getUint8(19),
  };
}

/**
 * Parse an ExtAna notification.
 *
 * Format (7 bytes, little-endian):
 *   [ch1:i16][ch2:i16][temp:i16][seq:u8]
 *
 * @throws {DecodeError} If the length is invalid
 */
export function decodeExtAnaPacket(data: Uint8Array): ExtAnaPacket {
  if (data.length !== EXTANA_PACKET_SIZE) {
    throw new DecodeError(
      `ExtAna packet has ${data.length} bytes (expected ${EXTANA_PACKET_SIZE})`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  return {
    ch1: view.getInt16(0, true),
    ch2: view.getInt16(2, true),
    rawTemperature: view.getInt16(4, true),
    seq: view.getUint8(6),
  };
}

/**
 * Encode an IMU packet. Used to build notifications for tests and simulators.
 */
export function encodeImuPacket(packet: ImuPacket): Uint8Array {
  const buffer = new ArrayBuffer(IMU_PACKET_SIZE);
  const view = new DataView(buffer);
  [...packet.acc, ...packet.gyro, ...packet.mag].forEach((value, i) => {
    view.setInt16(i * 2, value, true);
  });
  view.setUint8(18, packet.imuIndex);
  view.setUint8(19, packet.seq);
  return new Uint8Array(buffer);
}

/**
 * Encode an ExtAna packet.
 */
export function encodeExtAnaPacket(packet: ExtAnaPacket): Uint8Array {
  const buffer = new ArrayBuffer(EXTANA_PACKET_SIZE);
  const view = new DataView(buffer);
  view.setInt16(0, packet.ch1, true);
  view.setInt16(2, packet.ch2, true);
  view.setInt16(4, packet.rawTemperature, true);
  view.setUint8(6, packet.seq);
  return new Uint8Array(buffer);
}
