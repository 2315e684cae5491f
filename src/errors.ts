/**
 * Error types raised by the hosts file services.
 *
 * Only file-level failures are errors. Malformed lines and invalid entries are
 * skipped and never reach this module.
 */

export type HostsFileErrorCode =
  | 'HOSTS_FILE_NOT_FOUND'
  | 'HOSTS_FILE_IO'
  | 'HOSTS_FILE_ENCODING'
  | 'OPERATION_IN_PROGRESS'
  | 'UNSUPPORTED_PLATFORM';

export interface HostsFileErrorOptions {
  filePath?: string;
  cause?: unknown;
}

/**
 * Base class for every error thrown by this package
 */
export class HostsFileError extends Error {
  public readonly code: HostsFileErrorCode;
  public readonly filePath?: string;

  constructor(code: HostsFileErrorCode, message: string, options: HostsFileErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.filePath = options.filePath;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  static isHostsFileError(error: unknown): error is HostsFileError {
    return error instanceof HostsFileError;
  }
}

/**
 * The file to load does not exist
 */
export class HostsFileNotFoundError extends HostsFileError {
  constructor(filePath: string, cause?: unknown) {
    super('HOSTS_FILE_NOT_FOUND', `Hosts file not found: ${filePath}`, { filePath, cause });
  }
}

/**
 * Any other read or write failure. `systemCode` keeps the underlying errno
 * code (EACCES, EPERM, ...) when there was one.
 */
export class HostsFileIOError extends HostsFileError {
  public readonly systemCode?: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super('HOSTS_FILE_IO', message, { filePath, cause });
    this.systemCode = isErrnoException(cause) ? cause.code : undefined;
  }
}

/**
 * The file content is not valid in the configured encoding
 */
export class HostsFileEncodingError extends HostsFileError {
  public readonly encoding: string;

  constructor(filePath: string, encoding: string, cause?: unknown) {
    super('HOSTS_FILE_ENCODING', `Hosts file ${filePath} is not valid ${encoding}`, { filePath, cause });
    this.encoding = encoding;
  }
}

/**
 * Another load, save or restore is still running on the same manager
 */
export class OperationInProgressError extends HostsFileError {
  public readonly requested: string;
  public readonly running: string;

  constructor(requested: string, running: string) {
    super('OPERATION_IN_PROGRESS', `Cannot ${requested} while ${running} is in progress`);
    this.requested = requested;
    this.running = running;
  }
}

export class UnsupportedPlatformError extends HostsFileError {
  constructor(platform: string) {
    super('UNSUPPORTED_PLATFORM', `Unsupported platform: ${platform}`);
  }
}

/**
 * Errors from fs carry a string `code`. Checked structurally, since errors
 * raised by Node internals may come from another realm than `Error`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
