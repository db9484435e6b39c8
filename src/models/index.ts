/**
 * Models layer exports for SK8 sensor state.
 */

export * from './calibration';
export * from './loss-tracker';
export * from './imu';
export * from './extana';
export * from './streaming';
export * from './hardware';
export * from './led';
