// Licensed under the Hungry Ghost Hive License. See LICENSE.

/**
 * Base error class for all tracker errors
 */
export class TrackerError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'TRACKER_ERROR', options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    Object.setPrototypeOf(this, TrackerError.prototype);
  }
}

/**
 * Configuration-related errors (missing keys, invalid settings, missing credentials)
 */
export class ConfigurationError extends TrackerError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Caller misuse detected before any request is sent
 */
export class ValidationError extends TrackerError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Runtime operational errors (network failures, aborted requests, etc.)
 */
export class OperationalError extends TrackerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'OPERATIONAL_ERROR', options);
    Object.setPrototypeOf(this, OperationalError.prototype);
  }
}

/**
 * Timeout errors (requests that exceed the configured transport timeout)
 */
export class TimeoutError extends TrackerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'TIMEOUT_ERROR', options);
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Not found errors (resources not found)
 */
export class NotFoundError extends TrackerError {
  constructor(message: string) {
    super(message, 'NOT_FOUND_ERROR');
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Helper function to convert generic errors to tracker errors
 */
export function toTrackerError(
  error: unknown,
  fallbackType: new (message: string) => TrackerError = OperationalError
): TrackerError {
  if (error instanceof TrackerError) {
    return error;
  }
  if (error instanceof Error) {
    return new fallbackType(error.message);
  }
  return new fallbackType(String(error));
}
