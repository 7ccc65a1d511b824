import { rootCauseMessage } from './unwrapErrorType.js';

/**
 * Base class for failures tied to a configuration file on disk.
 */
abstract class ConfigFileError extends Error {
  /** Internal path of the configuration file */
  #path: string;

  /** Creates a new instance bound to the configuration file at `path` */
  constructor(message: string, path: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#path = path;
  }

  /** Path of the configuration file */
  get path(): string {
    return this.#path;
  }
}

/**
 * Error raised when a referenced configuration file does not exist.
 */
export class NotFoundError extends ConfigFileError {
  /** NotFoundError error-name */
  name = 'NotFoundError';

  constructor(path: string, opts?: ErrorOptions) {
    super(`Configuration file not found: ${path}`, path, opts);
  }
}

/**
 * Error raised when a configuration file exists but cannot be parsed or fails field validation.
 */
export class InvalidFormatError extends ConfigFileError {
  /** InvalidFormatError error-name */
  name = 'InvalidFormatError';

  constructor(path: string, opts: ErrorOptions & { cause: unknown }) {
    super(`Invalid configuration file ${path}: ${rootCauseMessage(opts.cause)}`, path, opts);
  }
}

/**
 * Error raised when the configuration could not be written to disk.
 */
export class SaveError extends ConfigFileError {
  /** SaveError error-name */
  name = 'SaveError';

  constructor(path: string, opts: ErrorOptions & { cause: unknown }) {
    super(`Failed to save configuration to ${path}: ${rootCauseMessage(opts.cause)}`, path, opts);
  }
}

/**
 * Error raised by an explicit configuration check, e.g. a missing token.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  name = 'ConfigurationError';
}
