/**
 * Open files under a transparent compression transform
 */

import * as core from '@actions/core';
import {
  CompressionMethod,
  CompressionMethodLike,
  ConcreteMethod,
} from '../compression/types';
import {
  getCompressionHandler,
  resolveCompressionMethod,
} from '../compression/factory';
import {resolveAutoCompression} from '../compression/detector';
import {IoConfig, getIoConfig} from '../config';
import {FilePath} from '../types';
import {pathStr} from '../utils';
import {BinaryFile, TextFile} from './file';
import {BinaryModeString, OpenMode, TextModeString, parseMode} from './mode';

/**
 * Per-call configuration overrides
 */
export type OpenOptions = Partial<IoConfig>;

/**
 * Open a parsed mode. Shared by `openCompressed` and `maybeOpen`, which
 * differ only in how strictly they parse the mode string.
 */
export function openWithMode(
  method: CompressionMethodLike,
  filePath: FilePath,
  openMode: OpenMode,
  options: OpenOptions = {}
): BinaryFile | TextFile {
  const requested = resolveCompressionMethod(method);
  const config = getIoConfig(options);
  const name = pathStr(filePath);

  const resolved: ConcreteMethod =
    requested === CompressionMethod.AUTO
      ? resolveAutoCompression(filePath, config)
      : requested;

  const raw = getCompressionHandler(resolved).openRaw(
    filePath,
    openMode.access,
    config.compressionLevel
  );
  core.debug(
    `Opened ${name} (mode ${openMode.mode}, compression ${resolved}${requested === CompressionMethod.AUTO ? ', detected' : ''})`
  );

  if (openMode.data === 'b') {
    return new BinaryFile(name, openMode.mode, raw);
  }
  return new TextFile(name, openMode.mode, raw, config.encoding);
}

/**
 * Open a file, compressing or decompressing transparently
 *
 * @param method - none (or null), gzip, or auto to detect from the file
 *   header, falling back to the new-file policy when the file is missing
 * @param mode - exactly one of r, w, a, x plus one of t, b, in either order
 * @throws InvalidModeError before touching the filesystem if the mode is
 *   malformed
 */
export function openCompressed(
  method: CompressionMethodLike,
  filePath: FilePath,
  mode: BinaryModeString,
  options?: OpenOptions
): BinaryFile;
export function openCompressed(
  method: CompressionMethodLike,
  filePath: FilePath,
  mode: TextModeString,
  options?: OpenOptions
): TextFile;
export function openCompressed(
  method: CompressionMethodLike,
  filePath: FilePath,
  mode: string,
  options?: OpenOptions
): BinaryFile | TextFile;
export function openCompressed(
  method: CompressionMethodLike,
  filePath: FilePath,
  mode: string,
  options: OpenOptions = {}
): BinaryFile | TextFile {
  return openWithMode(method, filePath, parseMode(mode), options);
}
