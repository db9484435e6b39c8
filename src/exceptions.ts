/**
 * Exception classes for the SK8 driver.
 */

export class SK8Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SK8Error';
  }
}

/**
 * Operation requires an active connection.
 */
export class NotConnectedError extends SK8Error {
  constructor(message: string = 'Not connected to device') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

/**
 * Characteristic is not exposed by this device/firmware.
 */
export class AttributeUnsupportedError extends SK8Error {
  constructor(
    message: string,
    readonly uuid?: string
  ) {
    super(message);
    this.name = 'AttributeUnsupportedError';
  }
}

export class InvalidArgumentError extends SK8Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class TransportError extends SK8Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

export class DecodeError extends SK8Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}
