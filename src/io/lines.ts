/**
 * Line-oriented helpers over possibly-compressed text files
 */

import {CompressionMethod, CompressionMethodLike} from '../compression/types';
import {FilePath} from '../types';
import {ClosingIterator} from './closing-iterator';
import {TextFile} from './file';
import {maybeOpen} from './maybe-open';
import {OpenOptions} from './open';

export interface ReadLinesOptions extends OpenOptions {
  /** Trim surrounding whitespace, including the newline (default true) */
  strip?: boolean;
  /** Drop lines that are empty after optional stripping (default false) */
  skipEmpty?: boolean;
  /** Defaults to auto for paths */
  compression?: CompressionMethodLike;
}

/**
 * Iterate over the lines of a file
 *
 * A path is opened here and closed once the lines run out (or the
 * iterator is closed). An open TextFile is read from its current position
 * and left open.
 */
export function readLines(
  file: FilePath | TextFile,
  options: ReadLinesOptions = {}
): ClosingIterator<string> {
  const {
    strip = true,
    skipEmpty = false,
    compression = CompressionMethod.AUTO,
    ...openOptions
  } = options;

  const scope =
    file instanceof TextFile
      ? maybeOpen(file)
      : maybeOpen(file, 'rt', {...openOptions, compression});

  function* lines(): Generator<string, void, undefined> {
    for (const raw of scope.file) {
      const line = strip ? raw.trim() : raw;
      if (skipEmpty && line.length === 0) continue;
      yield line;
    }
  }

  return new ClosingIterator(lines(), {close: () => scope.exit()});
}

export interface WriteLinesOptions extends OpenOptions {
  /** Defaults to none for paths */
  compression?: CompressionMethodLike;
}

/**
 * Write each line followed by a newline
 *
 * A path is opened with mode `wt` and closed afterwards; an open TextFile
 * is written to and left open.
 */
export function writeLines(
  lines: Iterable<string>,
  file: FilePath | TextFile,
  options: WriteLinesOptions = {}
): void {
  const {compression = CompressionMethod.NONE, ...openOptions} = options;

  const scope =
    file instanceof TextFile
      ? maybeOpen(file)
      : maybeOpen(file, 'wt', {...openOptions, compression});

  scope.use(f => {
    for (const line of lines) {
      f.write(line);
      f.write('\n');
    }
  });
}
