/**
 * Global error types for the leak monitor
 * Custom errors for validation, initialization and hardware access
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a runtime settings patch is rejected
 */
export class SettingsValidationError extends ValidationError {
  readonly fields: readonly string[];

  constructor(message: string, fields: readonly string[]) {
    super(message);
    this.name = 'SettingsValidationError';
    this.fields = fields;
  }
}

/**
 * Converter or sensor setup failed; the monitor runs degraded
 */
export class InitializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InitializationError';
  }
}

/**
 * A single converter read failed
 */
export class AcquisitionError extends Error {
  readonly channel: number;

  constructor(channel: number, message: string) {
    super('Channel ' + channel + ': ' + message);
    this.name = 'AcquisitionError';
    this.channel = channel;
  }
}
