/**
 * Mode strings: one access token (r, w, a, x) and one data token (t, b)
 */

import {InvalidModeError} from '../errors';

export type AccessMode = 'r' | 'w' | 'a' | 'x';
export type DataMode = 't' | 'b';

export type BinaryModeString = `${AccessMode}b` | `b${AccessMode}`;
export type TextModeString = `${AccessMode}t` | `t${AccessMode}`;

export interface OpenMode {
  readonly access: AccessMode;
  readonly data: DataMode;
  /** The mode string exactly as the caller gave it */
  readonly mode: string;
}

/**
 * fs flags per access token
 * - w: truncate or create
 * - a: append or create
 * - x: create, fail with EEXIST if the file exists
 */
export const OPEN_FLAGS: Readonly<Record<AccessMode, string>> = {
  r: 'r',
  w: 'w',
  a: 'a',
  x: 'wx',
};

const ACCESS_TOKENS: readonly AccessMode[] = ['r', 'w', 'a', 'x'];
const DATA_TOKENS: readonly DataMode[] = ['t', 'b'];

export interface ParseModeOptions {
  /**
   * Accept a lone access token and treat it as text
   */
  implicitText?: boolean;
}

export function parseMode(
  mode: string,
  options: ParseModeOptions = {}
): OpenMode {
  if (options.implicitText && mode.length === 1) {
    const access = ACCESS_TOKENS.find(t => t === mode);
    if (!access) {
      throw new InvalidModeError(mode, `unknown access mode '${mode}'`);
    }
    return {access, data: 't', mode};
  }

  if (mode.length !== 2) {
    throw new InvalidModeError(
      mode,
      'expected one of r, w, a, x followed or preceded by one of t, b'
    );
  }

  let access: AccessMode | undefined;
  let data: DataMode | undefined;

  for (const char of mode) {
    const accessToken = ACCESS_TOKENS.find(t => t === char);
    const dataToken = DATA_TOKENS.find(t => t === char);

    if (accessToken) {
      if (access) {
        throw new InvalidModeError(mode, 'more than one access mode');
      }
      access = accessToken;
    } else if (dataToken) {
      if (data) {
        throw new InvalidModeError(mode, 'more than one data mode');
      }
      data = dataToken;
    } else {
      throw new InvalidModeError(mode, `unknown mode character '${char}'`);
    }
  }

  if (!access || !data) {
    throw new InvalidModeError(mode, 'missing access or data mode');
  }

  return {access, data, mode};
}
