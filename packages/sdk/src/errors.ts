/**
 * Error types for scanvault operations
 *
 * Invariants:
 * - Every error has stable `name` and `code` fields for programmatic handling
 * - Every error accepts a `cause` for wrapping underlying failures
 * - Malformed input fails immediately; nothing here is retried
 */

/**
 * Base class for all scanvault errors
 */
export abstract class ScanVaultError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a comparison operator is not one of <, <=, >, >=
 */
export class InvalidOperatorError extends ScanVaultError {
  readonly code = "E_OPERATOR";

  constructor(
    public readonly operator: string,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Unknown operator "${operator}" for field "${path}"`, options);
  }
}

/**
 * Thrown when a builder or DB method receives an argument it cannot use
 */
export class InvalidArgumentError extends ScanVaultError {
  readonly code = "E_ARGUMENT";
}

/**
 * Thrown when a top-values pseudo-field carries an unusable argument
 */
export class InvalidPseudoFieldError extends ScanVaultError {
  readonly code = "E_PSEUDO_FIELD";

  constructor(
    public readonly field: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid pseudo-field "${field}": ${reason}`, options);
  }
}

/**
 * Thrown when a search cannot be expressed against a record family
 * (e.g. a UDP port search on passive records)
 */
export class UnsupportedQueryError extends ScanVaultError {
  readonly code = "E_UNSUPPORTED";
}

/**
 * Thrown when an IP address cannot be decoded
 */
export class AddressDecodeError extends ScanVaultError {
  readonly code = "E_ADDRESS";

  constructor(input: unknown, options?: ErrorOptions) {
    super(`Cannot decode IP address: ${JSON.stringify(String(input))}`, options);
  }
}

/**
 * Thrown when a timestamp cannot be decoded
 */
export class TimestampDecodeError extends ScanVaultError {
  readonly code = "E_TIMESTAMP";

  constructor(input: unknown, options?: ErrorOptions) {
    super(`Cannot decode timestamp: ${JSON.stringify(String(input))}`, options);
  }
}

/**
 * Thrown when a base64 payload cannot be decoded
 */
export class BinaryDecodeError extends ScanVaultError {
  readonly code = "E_BINARY";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Cannot decode binary payload: ${reason}`, options);
  }
}

/**
 * Thrown when a scan document id is already present
 */
export class DuplicateScanError extends ScanVaultError {
  readonly code = "E_DUPLICATE";

  constructor(
    public readonly scanId: string,
    options?: ErrorOptions
  ) {
    super(`Duplicate entry for scan id "${scanId}"`, options);
  }
}

/**
 * One normalized schema validation issue
 */
export interface ValidationIssue {
  /** JSON Pointer to the failing value (e.g. "/ports/0/port") */
  pointer: string;
  /** Human-readable message */
  message: string;
}

/**
 * Thrown when a record fails its JSON Schema in strict mode
 */
export class RecordValidationError extends ScanVaultError {
  readonly code = "E_VALIDATION";

  constructor(
    public readonly kind: string,
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    const first = issues[0];
    const detail = first ? `${first.pointer || "/"} ${first.message}` : "invalid";
    super(`Invalid ${kind} record: ${detail}`, options);
  }
}

/**
 * Thrown when a collection file cannot be read or parsed
 */
export class CollectionReadError extends ScanVaultError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read collection: ${filePath}`, options);
  }
}

/**
 * Thrown when a collection file cannot be written
 */
export class CollectionWriteError extends ScanVaultError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write collection: ${filePath}`, options);
  }
}

/**
 * Thrown when database options are invalid
 */
export class ConfigError extends ScanVaultError {
  readonly code = "E_CONFIG";
}
