/**
 * Error types raised by the file helpers.
 * Errors from the filesystem itself (ENOENT, EACCES, EEXIST...) are never
 * wrapped and reach the caller as thrown by `fs`.
 */

/** A caller-supplied argument is malformed. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** A mode string is not one access token plus one data token. */
export class InvalidModeError extends InvalidArgumentError {
  readonly mode: string;

  constructor(mode: string, reason: string) {
    super(`Invalid mode '${mode}': ${reason}`);
    this.name = 'InvalidModeError';
    this.mode = mode;
  }
}

export class ClosedFileError extends Error {
  constructor(name: string) {
    super(`I/O operation on closed file: ${name}`);
    this.name = 'ClosedFileError';
  }
}

/** Reading a write-only file, or writing a read-only one. */
export class UnsupportedOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}
