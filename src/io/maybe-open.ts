/**
 * Accept either a path or an already-open file
 */

import * as core from '@actions/core';
import {CompressionMethod, CompressionMethodLike} from '../compression/types';
import {FileLike, FilePath, isFileLike} from '../types';
import {BinaryFile, TextFile} from './file';
import {AccessMode, BinaryModeString, TextModeString, parseMode} from './mode';
import {OpenOptions, openWithMode} from './open';

/**
 * - owned: opened here, closed when the scope exits
 * - borrowed: supplied by the caller, who stays responsible for closing it
 */
export type Ownership = 'owned' | 'borrowed';

export class FileScope<F extends FileLike> {
  constructor(
    readonly file: F,
    readonly ownership: Ownership
  ) {}

  exit(): void {
    if (this.ownership === 'owned') {
      this.file.close();
    }
  }

  use<R>(fn: (file: F) => R): R {
    try {
      return fn(this.file);
    } finally {
      this.exit();
    }
  }

  async useAsync<R>(fn: (file: F) => Promise<R>): Promise<R> {
    try {
      return await fn(this.file);
    } finally {
      this.exit();
    }
  }
}

export interface MaybeOpenOptions extends OpenOptions {
  /**
   * Compression for path targets, none by default
   */
  compression?: CompressionMethodLike;
}

/** Text mode, with the data token optional */
export type TextOpenMode = TextModeString | AccessMode;

export function maybeOpen<F extends FileLike>(
  target: F,
  mode?: string,
  options?: MaybeOpenOptions
): FileScope<F>;
export function maybeOpen(
  target: FilePath,
  mode: BinaryModeString,
  options?: MaybeOpenOptions
): FileScope<BinaryFile>;
export function maybeOpen(
  target: FilePath,
  mode?: TextOpenMode,
  options?: MaybeOpenOptions
): FileScope<TextFile>;
export function maybeOpen(
  target: FilePath | FileLike,
  mode?: string,
  options?: MaybeOpenOptions
): FileScope<FileLike>;
export function maybeOpen(
  target: FilePath | FileLike,
  mode = 'r',
  options: MaybeOpenOptions = {}
): FileScope<FileLike> {
  if (isFileLike(target)) {
    core.debug('maybeOpen: borrowing an already-open file');
    return new FileScope(target, 'borrowed');
  }

  const {compression = CompressionMethod.NONE, ...openOptions} = options;
  const file = openWithMode(
    compression,
    target,
    parseMode(mode, {implicitText: true}),
    openOptions
  );
  return new FileScope(file, 'owned');
}
