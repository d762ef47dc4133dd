/**
 * Global error types for the fan controller
 *
 * Device errors are always handled by the component that issued the request;
 * none of them is fatal. Only a configuration error stops the process, and
 * only before the control loop starts.
 */

/**
 * Base error for anything that went wrong talking to a device
 */
export class DeviceError extends Error {
  constructor(message: string, public readonly url: string) {
    super(message);
    this.name = 'DeviceError';
  }
}

/**
 * Connection refused, DNS failure, timeout: no HTTP response at all
 */
export class TransportError extends DeviceError {
  constructor(message: string, url: string, public readonly reason?: unknown) {
    super(message, url);
    this.name = 'TransportError';
  }
}

/**
 * Device answered a read request with a non-200 status
 */
export class HttpStatusError extends DeviceError {
  constructor(
    url: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super('HTTP ' + status + ' from ' + url, url);
    this.name = 'HttpStatusError';
  }
}

/**
 * Response body is not JSON or lacks the expected fields
 */
export class ParseError extends DeviceError {
  constructor(message: string, url: string, public readonly body: string) {
    super(message, url);
    this.name = 'ParseError';
  }
}

/**
 * Device rejected a state-changing command (non-200 response)
 */
export class CommandFailure extends DeviceError {
  constructor(
    url: string,
    public readonly command: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(command + ' rejected by ' + url + ' with HTTP ' + status, url);
    this.name = 'CommandFailure';
  }
}

/**
 * Error thrown at boot when the configuration does not validate
 */
export class ConfigValidationError extends Error {
  constructor(message: string, public readonly fields: string[]) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}
