/**
 * BLE protocol constants for SK8 devices.
 */

// Standard GATT characteristics
export const UUID_DEVICE_NAME = '00002a00-0000-1000-8000-00805f9b34fb';
export const UUID_BATTERY_LEVEL = '00002a19-0000-1000-8000-00805f9b34fb';
export const UUID_FIRMWARE_REVISION = '00002a26-0000-1000-8000-00805f9b34fb';

// SK8 vendor service and characteristics
export const SK8_SERVICE_UUID = 'fb005c80-02e7-f387-1cad-8acd2d8df0c8';
export const UUID_IMU_DATA = 'fb005c81-02e7-f387-1cad-8acd2d8df0c8';
export const UUID_EXTANA_DATA = 'fb005c82-02e7-f387-1cad-8acd2d8df0c8';
export const UUID_IMU_SELECTION = 'fb005c83-02e7-f387-1cad-8acd2d8df0c8';
export const UUID_SENSOR_SELECTION = 'fb005c84-02e7-f387-1cad-8acd2d8df0c8';
export const UUID_EXTANA_LED = 'fb005c85-02e7-f387-1cad-8acd2d8df0c8';
export const UUID_POLLING_OVERRIDE = 'fb005c86-02e7-f387-1cad-8acd2d8df0c8';
export const UUID_HARDWARE_STATE = 'fb005c87-02e7-f387-1cad-8acd2d8df0c8';
export const UUID_EXTANA_IMU_STREAMING = 'fb005c88-02e7-f387-1cad-8acd2d8df0c8';

// Older firmware exposes these two registers under different UUIDs
export const UUID_HARDWARE_STATE_LEGACY = 'fb005c91-02e7-f387-1cad-8acd2d8df0c8';
export const UUID_EXTANA_IMU_STREAMING_LEGACY = 'fb005c92-02e7-f387-1cad-8acd2d8df0c8';

/** IMU slots: 0 = built-in, 1-4 = chained external IMUs */
export const MAX_IMUS = 5;

/**
 * Sensor selection bits (sensor selection register).
 */
export enum SensorFlag {
  ACC = 0x01,
  GYRO = 0x02,
  MAG = 0x04,
}

export const SENSOR_ALL = SensorFlag.ACC | SensorFlag.GYRO | SensorFlag.MAG;

/**
 * Bits of the hardware state register.
 */
export enum HardwareFlag {
  IMUS = 0x01,
  EXTANA = 0x02,
}

// Packet sizes
export const IMU_PACKET_SIZE = 20; // 9 x int16 + index + seq
export const EXTANA_PACKET_SIZE = 7; // 3 x int16 + seq

export const SEQUENCE_MODULUS = 256;

// ExtAna LED: device range 0-3000, caller range 0-255
export const LED_MIN = 0;
export const LED_MAX = 255;
export const LED_DEVICE_MAX = 3000;

export const MAX_DEVICE_NAME_LENGTH = 20;

// Polling override values below this are treated as "disabled" by firmware
export const MIN_POLLING_OVERRIDE_MS = 20;
export const MAX_POLLING_OVERRIDE_MS = 255;
