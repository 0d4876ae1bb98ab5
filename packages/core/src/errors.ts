/**
 * Error types for key range extraction and scanning.
 *
 * Every error carries a stable `code` for programmatic handling and accepts
 * a `cause` for wrapping underlying errors.
 */

export abstract class KeyRangeError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown when a required argument is missing or an option object is invalid.
 */
export class InvalidArgumentError extends KeyRangeError {
  readonly code = 'INVALID_ARGUMENT';

  constructor(
    public readonly argument: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid argument "${argument}": ${reason}`, options);
  }
}

/**
 * Thrown when a text-only operation is requested on a non-text key domain.
 */
export class UnsupportedDomainError extends KeyRangeError {
  readonly code = 'UNSUPPORTED_DOMAIN';

  constructor(
    public readonly domain: string,
    operation: string,
    options?: ErrorOptions
  ) {
    super(`Key domain "${domain}" does not support ${operation}`, options);
  }
}

/**
 * Thrown when a JSON-encoded expression fails schema validation.
 */
export class ExpressionParseError extends KeyRangeError {
  readonly code = 'INVALID_EXPRESSION';

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid expression:\n${issues.map((i) => `  - ${i}`).join('\n')}`, options);
  }
}
