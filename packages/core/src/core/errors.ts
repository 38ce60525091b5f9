/**
 * @module core/errors
 * Custom error types for Verfold resolution operations.
 */

/**
 * Base error class for all Verfold errors.
 * Provides a consistent error hierarchy with error codes for programmatic handling.
 */
export class VerfoldError extends Error {
  /** Machine-readable error code for programmatic handling */
  readonly Code: string;

  constructor(code: string, message: string, cause?: Error) {
    super(message);
    this.name = 'VerfoldError';
    this.Code = code;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when a target version, or a folder name that must encode a version,
 * does not start with a recognizable version prefix.
 */
export class MalformedVersionError extends VerfoldError {
  /** The text that could not be parsed */
  readonly Text: string;

  constructor(text: string) {
    super('MALFORMED_VERSION', `Error parsing version from string '${text}'.`);
    this.name = 'MalformedVersionError';
    this.Text = text;
  }
}

/**
 * Thrown when two version folders accepted in the same bounded resolution
 * parse to the same version (e.g. `1.0` and `01.0`).
 */
export class AmbiguousVersionError extends VerfoldError {
  /** The version both folders parse to, formatted as `major.minor.build.revision` */
  readonly Version: string;

  /** The folder that was rejected */
  readonly FolderName: string;

  /** The earlier folder that already claimed the version */
  readonly ConflictingFolderName: string;

  constructor(version: string, folderName: string, conflictingFolderName: string) {
    super(
      'AMBIGUOUS_VERSION',
      `Version '${version}' parsed for folder '${folderName}' is ambiguous ` +
        `(already claimed by folder '${conflictingFolderName}').`
    );
    this.name = 'AmbiguousVersionError';
    this.Version = version;
    this.FolderName = folderName;
    this.ConflictingFolderName = conflictingFolderName;
  }
}

/**
 * Thrown when a directory cannot be enumerated or a script file cannot be read.
 * The underlying filesystem error is preserved as `cause`.
 */
export class ScriptReadError extends VerfoldError {
  /** The directory or file path that failed */
  readonly Path: string;

  constructor(path: string, message: string, cause?: Error) {
    super('SCRIPT_READ_FAILED', message, cause);
    this.name = 'ScriptReadError';
    this.Path = path;
  }
}
