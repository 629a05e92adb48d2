/**
 * @module core/errors
 * Custom error types for Floe deployment runs.
 */

/**
 * Base error class for all Floe errors.
 * Every subclass carries a machine-readable code so callers can branch
 * without matching on message text.
 */
export class FloeError extends Error {
  /** Machine-readable error code for programmatic handling */
  readonly Code: string;

  constructor(code: string, message: string, cause?: Error) {
    super(message);
    this.name = 'FloeError';
    this.Code = code;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown for bad or missing configuration: no credentials, an invalid root
 * folder, a malformed change history table name. Always raised before
 * anything touches the target account.
 */
export class ConfigurationError extends FloeError {
  constructor(message: string, cause?: Error) {
    super('CONFIGURATION_INVALID', message, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when two change scripts in one root folder share a version.
 */
export class DuplicateVersionError extends FloeError {
  /** The version string found more than once */
  readonly Version: string;

  /** Path of the script that claimed the version first */
  readonly FirstPath: string;

  /** Path of the second script with the same version */
  readonly SecondPath: string;

  constructor(version: string, firstPath: string, secondPath: string) {
    super(
      'DUPLICATE_VERSION',
      `The script version ${version} exists more than once ` +
        `(first instance ${firstPath}, second instance ${secondPath})`
    );
    this.name = 'DuplicateVersionError';
    this.Version = version;
    this.FirstPath = firstPath;
    this.SecondPath = secondPath;
  }
}

/**
 * Thrown when a file name does not follow `V<version>__<description>.sql`.
 * The scanner treats this as "not a change script" and moves on.
 */
export class MigrationParseError extends FloeError {
  /** The filename that could not be parsed */
  readonly Filename: string;

  constructor(filename: string, message: string) {
    super('MIGRATION_PARSE_FAILED', message);
    this.name = 'MigrationParseError';
    this.Filename = filename;
  }
}

/**
 * Thrown when Snowflake rejects a change script.
 * Scripts applied before this one stay applied and recorded.
 */
export class MigrationExecutionError extends FloeError {
  /** The version of the failing script (e.g., "1.2.0") */
  readonly Version: string;

  /** The change script file name */
  readonly Script: string;

  /** The start of the SQL that failed */
  readonly FailedSQL?: string;

  constructor(
    version: string,
    script: string,
    message: string,
    failedSQL?: string,
    cause?: Error
  ) {
    super('MIGRATION_EXECUTION_FAILED', message, cause);
    this.name = 'MigrationExecutionError';
    this.Version = version;
    this.Script = script;
    this.FailedSQL = failedSQL;
  }
}

/**
 * Thrown when a connection to Snowflake cannot be established.
 * The driver's message is kept as-is; nothing is retried.
 */
export class ConnectionError extends FloeError {
  constructor(message: string, cause?: Error) {
    super('CONNECTION_FAILED', message, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * Normalizes an unknown thrown value into an `Error`.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
