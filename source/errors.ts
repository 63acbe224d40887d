/**
 * Error classes raised by cellwidth. Width outcomes (including -1) are
 * returned as values; only contract violations and broken assets throw.
 */

/**
 * Base error class for cellwidth errors.
 * @extends Error
 */
export class CellwidthError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CellwidthError";
  }
}

/**
 * A version token with a component that is not a run of decimal digits.
 * @extends CellwidthError
 */
export class VersionFormatError extends CellwidthError {
  readonly token: string;

  constructor(token: string) {
    super(`Malformed Unicode version: "${token}"`);
    this.name = "VersionFormatError";
    this.token = token;
  }
}

/**
 * Table lookup for a version the store does not carry.
 * @extends CellwidthError
 */
export class UnknownVersionError extends CellwidthError {
  readonly version: string;

  constructor(version: string) {
    super(`No width tables for Unicode version ${version}`);
    this.name = "UnknownVersionError";
    this.version = version;
  }
}

export class TableDataError extends CellwidthError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TableDataError";
  }
}

export class ConfigError extends CellwidthError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

// Type guards for error handling
export function isCellwidthError(error: unknown): error is CellwidthError {
  return error instanceof CellwidthError;
}

export function isVersionFormatError(
  error: unknown,
): error is VersionFormatError {
  return error instanceof Error && error.name === "VersionFormatError";
}
