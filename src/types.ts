/**
 * Shared structural types for file helpers
 */

/**
 * Anything `fs` can open: a plain path, a raw path buffer or a `file:` URL
 */
export type FilePath = string | Buffer | URL;

export interface Closable {
  close(): void;
}

/**
 * The capability set shared by every open file: an idempotent `close()`
 * and a `closed` flag. Collaborators may hand any object of this shape to
 * the helpers in place of a path.
 */
export interface FileLike extends Closable {
  readonly closed: boolean;
}

export function isFileLike(value: unknown): value is FileLike {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (value instanceof URL || Buffer.isBuffer(value)) {
    return false;
  }
  return (
    'close' in value &&
    typeof value.close === 'function' &&
    'closed' in value &&
    typeof value.closed === 'boolean'
  );
}
