/**
 * Protocol layer exports for SK8 BLE communication.
 */

export * from './constants';
export * from './commands';
export * from './responses';
export * from './packets';
