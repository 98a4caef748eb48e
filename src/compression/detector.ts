/**
 * Compression detection from file headers and extensions
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import * as path from 'path';
import {CompressionMethod, ConcreteMethod} from './types';
import {getAllHandlers} from './factory';
import {IoConfig} from '../config';
import {FilePath} from '../types';
import {pathStr} from '../utils';

function startsWith(header: Uint8Array, magic: Uint8Array): boolean {
  if (header.length < magic.length) return false;
  return magic.every((byte, i) => header[i] === byte);
}

/**
 * Identify the compression method from the leading bytes of a file
 */
export function detectCompression(header: Uint8Array): ConcreteMethod {
  for (const handler of getAllHandlers()) {
    if (handler.magic && startsWith(header, handler.magic)) {
      return handler.method;
    }
  }
  return CompressionMethod.NONE;
}

/**
 * Read the header of an existing file and detect its compression
 */
export function guessCompression(filePath: FilePath): ConcreteMethod {
  const name = pathStr(filePath);
  const headerLength = Math.max(
    ...getAllHandlers().map(h => h.magic?.length ?? 0)
  );

  const fd = fs.openSync(filePath, 'r');
  try {
    const header = Buffer.alloc(headerLength);
    const bytesRead = fs.readSync(fd, header, 0, headerLength, 0);
    const method = detectCompression(header.subarray(0, bytesRead));
    core.debug(`[detect] ${name}: ${method} (from ${bytesRead} header bytes)`);
    return method;
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Infer compression from a path's extension alone
 */
export function compressionFromExtension(filePath: FilePath): ConcreteMethod {
  const extension = path.extname(pathStr(filePath)).toLowerCase();
  const handler = getAllHandlers().find(h => h.extensions.includes(extension));
  return handler ? handler.method : CompressionMethod.NONE;
}

/**
 * Decide what `auto` means for a path: header detection when the file
 * exists, otherwise the configured new-file policy
 */
export function resolveAutoCompression(
  filePath: FilePath,
  config: Pick<IoConfig, 'newFileCompression'>
): ConcreteMethod {
  const name = pathStr(filePath);

  if (fs.existsSync(filePath)) {
    return guessCompression(filePath);
  }

  const method =
    config.newFileCompression === 'extension'
      ? compressionFromExtension(filePath)
      : CompressionMethod.NONE;
  core.debug(
    `[detect] ${name} does not exist, using ${method} (policy: ${config.newFileCompression})`
  );
  return method;
}
