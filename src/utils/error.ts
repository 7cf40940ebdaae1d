// Error types and utility functions

/**
 * Ensure a value is an Error instance.
 * Converts non-Error values to Error with String representation.
 */
export function ensureError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Base class for errors raised by this library.
 */
export class TermscrollError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised synchronously by a configuration call that conflicts with the
 * current state, such as enabling a second follow policy. A programmer
 * error: never raised during render or input dispatch.
 */
export class ConfigurationError extends TermscrollError {
  readonly setting: string;

  constructor(setting: string, message: string) {
    super(message);
    this.setting = setting;
  }
}
