/**
 * Compression module types and interfaces
 */

import {AccessMode} from '../io/mode';
import {FilePath} from '../types';

export enum CompressionMethod {
  NONE = 'none',
  GZIP = 'gzip',
  AUTO = 'auto',
}

/**
 * A method that names an actual transform, as opposed to `auto`
 */
export type ConcreteMethod = Exclude<CompressionMethod, CompressionMethod.AUTO>;

/**
 * What callers may pass as a method: the enum, its string value, or
 * null/undefined for no compression
 */
export type CompressionMethodLike =
  | CompressionMethod
  | `${CompressionMethod}`
  | null
  | undefined;

/**
 * Byte-level stream under an open file
 */
export interface RawIO {
  readonly readable: boolean;
  readonly writable: boolean;
  readonly closed: boolean;
  /**
   * Read up to `size` bytes; a negative size reads to end of stream.
   * Returns an empty buffer at end of stream.
   */
  read(size: number): Buffer;
  /**
   * Write all of `data`, returning the number of bytes accepted
   */
  write(data: Uint8Array): number;
  close(): void;
}

export interface CompressionHandler {
  readonly method: ConcreteMethod;
  /**
   * Leading bytes identifying this format in an existing file
   */
  readonly magic?: Uint8Array;
  /**
   * File extensions (lower case, with dot) implying this format
   */
  readonly extensions: readonly string[];
  /**
   * Open the byte stream for a path, handed to `fs` unchanged
   * @param compressionLevel - Only used by compressing writers
   */
  openRaw(
    filePath: FilePath,
    access: AccessMode,
    compressionLevel: number
  ): RawIO;
}
