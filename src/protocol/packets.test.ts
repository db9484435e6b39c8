import { describe, it, expect } from 'vitest';
import { DecodeError } from '../exceptions';
import {
  decodeExtAnaPacket,
  decodeImuPacket,
  encodeExtAnaPacket,
  encodeImuPacket,
} from './packets';

const IMU_BYTES = [
  0x01, 0x00, 0xfe, 0xff, 0x2c, 0x01, // acc
  0x00, 0x00, 0x00, 0x00, 0xff, 0xff, // gyro
  0x00, 0x80, 0xff, 0x7f, 0x05, 0x00, // mag
  0x03, // imu index
  0xc8, // seq
];

describe('decodeImuPacket', () => {
  it('decodes little-endian signed axes, index and sequence', () => {
    const packet = decodeImuPacket(Uint8Array.from(IMU_BYTES));

    expect(packet.acc).toEqual([1, -2, 300]);
    expect(packet.gyro).toEqual([0, 0, -1]);
    expect(packet.mag).toEqual([-32768, 32767, 5]);
    expect(packet.imuIndex).toBe(3);
    expect(packet.seq).toBe(200);
  });

  it('decodes a view into a larger buffer', () => {
    const backing = Uint8Array.from([0xaa, 0xbb, 0xcc, ...IMU_BYTES, 0xdd]);
    const packet = decodeImuPacket(backing.subarray(3, 23));

    expect(packet.acc).toEqual([1, -2, 300]);
    expect(packet.seq).toBe(200);
  });

  it('rejects packets of the wrong length', () => {
    expect(() => decodeImuPacket(new Uint8Array(19))).toThrow(DecodeError);
    expect(() => decodeImuPacket(new Uint8Array(21))).toThrow(
      'IMU packet has 21 bytes (expected 20)'
    );
  });

  it('rejects an IMU index above 4', () => {
    const bytes = Uint8Array.from(IMU_BYTES);
    bytes[18] = 5;
    expect(() => decodeImuPacket(bytes)).toThrow('IMU packet index out of range: 5');
  });
});

describe('decodeExtAnaPacket', () => {
  it('decodes channels, raw temperature and sequence', () => {
    const packet = decodeExtAnaPacket(
      Uint8Array.from([0x64, 0x00, 0x9c, 0xff, 0x29, 0x09, 0x07])
    );

    expect(packet).toEqual({ ch1: 100, ch2: -100, rawTemperature: 2345, seq: 7 });
  });

  it('rejects packets of the wrong length', () => {
    expect(() => decodeExtAnaPacket(new Uint8Array(6))).toThrow(DecodeError);
  });
});

describe('encoders', () => {
  it('produces the bytes the decoder reads', () => {
    const imu = encodeImuPacket({
      acc: [1, -2, 300],
      gyro: [0, 0, -1],
      mag: [-32768, 32767, 5],
      imuIndex: 3,
      seq: 200,
    });
    expect(Array.from(imu)).toEqual(IMU_BYTES);

    const extAna = encodeExtAnaPacket({ ch1: 100, ch2: -100, rawTemperature: 2345, seq: 7 });
    expect(Array.from(extAna)).toEqual([0x64, 0x00, 0x9c, 0xff, 0x29, 0x09, 0x07]);
  });
});
