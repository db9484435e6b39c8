/**
 * Streaming mode state.
 */

/**
 * Active streaming mode. The firmware supports one at a time.
 */
export type StreamingMode =
  | { kind: 'idle' }
  | { kind: 'imu' }
  | { kind: 'extana'; includesImu: boolean };

export interface StreamingState {
  mode: StreamingMode;
  /** IMU indices most recently enabled */
  enabledImus: number[];
  /** Bitmask of SensorFlag values */
  enabledSensors: number;
}
