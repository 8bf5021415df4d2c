/**
 * Error categorization system for aws-sweep
 *
 * Provides structured error types with consistent error codes and user-friendly
 * messages. Integrates with oclif's error handling while keeping a clear
 * separation between input problems and provider failures.
 *
 * @file
 * **Core Error Types:**
 * - BaseError: abstract base class for all CLI errors
 * - ValidationError: user input validation failures
 * - ConfigurationError: invalid or missing configuration
 *
 * Provider and sweep failures live in `sweep-errors.ts`.
 */

/**
 * Metadata keys never echoed back in verbose output
 *
 * @internal
 */
const REDACTED_METADATA_KEYS = new Set([
  "credentials",
  "secretAccessKey",
  "sessionToken",
  "accessKeyId",
  "password",
]);

/**
 * Base error class for all aws-sweep errors
 *
 * Extends the standard Error class with error codes and structured
 * metadata for consistent error handling across the application.
 *
 * @public
 */
export abstract class BaseError extends Error {
  /**
   * Unique error code for this error type
   */
  public readonly code: string;

  /**
   * Additional error metadata
   */
  public readonly metadata: Record<string, unknown>;

  /**
   * Create a new base error
   *
   * @param message - Human-readable error message
   * @param code - Unique error code
   * @param metadata - Additional error context
   * @param cause - Underlying error, if any
   */
  constructor(
    message: string,
    code: string,
    metadata: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation error for invalid user inputs or malformed data
 *
 * Used when flags, arguments or an identifier file fail validation.
 *
 * @public
 */
export class ValidationError extends BaseError {
  /**
   * Create a new validation error
   *
   * @param message - User-friendly validation error message
   * @param field - The field or input that failed validation
   * @param value - The invalid value that was provided
   * @param metadata - Additional validation context
   */
  constructor(
    message: string,
    field?: string,
    value?: unknown,
    metadata: Record<string, unknown> = {},
  ) {
    super(message, "VALIDATION_ERROR", {
      field,
      value,
      ...metadata,
    });
  }
}

/**
 * Configuration error for invalid or missing configuration
 *
 * @public
 */
export class ConfigurationError extends BaseError {
  /**
   * Create a new configuration error
   *
   * @param message - User-friendly configuration error message
   * @param configKey - The configuration key that is invalid or missing
   * @param expectedValue - The expected configuration value or format
   * @param actualValue - The actual configuration value found
   */
  constructor(message: string, configKey?: string, expectedValue?: unknown, actualValue?: unknown) {
    super(message, "CONFIGURATION_ERROR", {
      configKey,
      expectedValue,
      actualValue,
    });
  }
}

/**
 * Strip credential-like keys and non-primitive values from error metadata
 *
 * @param metadata - Metadata attached to a {@link BaseError}
 * @returns Copy that is safe to print in verbose output
 *
 * @public
 */
export function sanitizeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined) {
      continue;
    }
    if (REDACTED_METADATA_KEYS.has(key)) {
      sanitized[key] = "[redacted]";
      continue;
    }
    if (value instanceof Error) {
      sanitized[key] = { name: value.name, message: value.message };
      continue;
    }
    sanitized[key] =
      value === null || ["string", "number", "boolean"].includes(typeof value)
        ? value
        : "[object]";
  }

  return sanitized;
}
