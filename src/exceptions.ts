/**
 * Exception classes for the TimeFlip client.
 */

export class TimeFlipError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TimeFlipError';
  }
}

/**
 * Transport-level failure while connecting or disconnecting.
 */
export class BLEConnectionError extends TimeFlipError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BLEConnectionError';
  }
}

export class NotConnectedError extends TimeFlipError {
  constructor() {
    super('Not connected to a TimeFlip device. Please connect first');
    this.name = 'NotConnectedError';
  }
}

/**
 * The connected peripheral failed the facet probe, so it is not a TimeFlip.
 */
export class NotTargetDeviceError extends TimeFlipError {
  constructor(options?: { cause?: unknown }) {
    super('Connected device is not a TimeFlip', options);
    this.name = 'NotTargetDeviceError';
  }
}

export class LoginRequiredError extends TimeFlipError {
  constructor() {
    super('This command requires a login to the TimeFlip device. Please login');
    this.name = 'LoginRequiredError';
  }
}

export class InvalidArgumentError extends TimeFlipError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class ProtocolError extends TimeFlipError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

/**
 * The device did not echo the opcode with an OK status.
 */
export class CommandExecutionError extends ProtocolError {
  constructor(
    readonly command: string,
    options?: { cause?: unknown }
  ) {
    super(`Unable to execute the command ${command}`, options);
    this.name = 'CommandExecutionError';
  }
}

/**
 * Command output was not exactly 21 bytes. Usually means the login heuristic
 * reported success but the session is not actually authenticated.
 */
export class MalformedResultError extends ProtocolError {
  constructor(readonly command: string) {
    super(
      `The result of the command ${command} is malformed, please check if you are logged in`
    );
    this.name = 'MalformedResultError';
  }
}

export class InvalidResponseError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidResponseError';
  }
}
