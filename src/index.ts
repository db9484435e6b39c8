/**
 * sk8-ble - TypeScript driver for SK8 wearable BLE sensors
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { SK8Device } from './device';
export type { ImuCallback, ExtAnaCallback, SK8DeviceOptions } from './device';
export { StreamingController } from './streaming';

// Models and types
export * from './models';

// Protocol constants and packet codecs
export {
  SensorFlag,
  SENSOR_ALL,
  MAX_IMUS,
  HardwareFlag,
  decodeImuPacket,
  decodeExtAnaPacket,
  encodeImuPacket,
  encodeExtAnaPacket,
} from './protocol';
export type { ImuPacket, ExtAnaPacket } from './protocol';

// Transport
export * from './transport/transport';
export { CharacteristicCache } from './transport/characteristic-cache';
export { SK8Connection } from './transport/connection';
export { WebBluetoothTransport } from './transport/web-bluetooth';
export type {
  BluetoothDeviceLike,
  BluetoothLike,
  GattCharacteristicLike,
  GattServerLike,
  GattServiceLike,
  WebBluetoothTransportOptions,
} from './transport/web-bluetooth';

// Calibration files
export {
  IniCalibrationSource,
  parseCalibrationIni,
  parseCalibrationSection,
  DEFAULT_CALIBRATION_FILE,
} from './calibration/ini-source';

// Exceptions
export * from './exceptions';
