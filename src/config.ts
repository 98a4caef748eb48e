/**
 * Configuration for file helpers
 *
 * Values are resolved in order: explicit overrides, then action inputs
 * (`INPUT_*` environment variables read once through `core.getInput`),
 * then defaults.
 */

import * as core from '@actions/core';
import {InvalidArgumentError} from './errors';

/**
 * What `auto` compression assumes for a file that does not exist yet
 * - none: write uncompressed
 * - extension: gzip when the path ends in a known compressed extension
 */
export type NewFileCompression = 'none' | 'extension';

export interface IoConfig {
  /**
   * Gzip compression level (0-9, where 9 = best compression)
   */
  compressionLevel: number;
  /**
   * Encoding used by text-mode files
   */
  encoding: BufferEncoding;
  newFileCompression: NewFileCompression;
}

export const DEFAULT_IO_CONFIG: Readonly<IoConfig> = {
  compressionLevel: 6,
  encoding: 'utf8',
  newFileCompression: 'none',
};

const NEW_FILE_POLICIES: readonly NewFileCompression[] = ['none', 'extension'];

function parseCompressionLevel(value: number | string): number {
  const level = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(level) || level < 0 || level > 9) {
    throw new InvalidArgumentError(
      `Invalid compression level '${value}': expected an integer from 0 to 9`
    );
  }
  return level;
}

function parseEncoding(value: string): BufferEncoding {
  if (!Buffer.isEncoding(value)) {
    throw new InvalidArgumentError(`Unknown text encoding '${value}'`);
  }
  return value;
}

function parseNewFileCompression(value: string): NewFileCompression {
  const policy = NEW_FILE_POLICIES.find(p => p === value);
  if (!policy) {
    throw new InvalidArgumentError(
      `Invalid new-file compression policy '${value}': expected one of ${NEW_FILE_POLICIES.join(', ')}`
    );
  }
  return policy;
}

let inputConfig: Partial<IoConfig> | undefined;

/**
 * Read and validate the action inputs. Inputs are read on the first call
 * and kept for the life of the process; a host action that defines an
 * input with one of these names (compression-level, encoding,
 * new-file-compression) configures every open.
 */
function readInputConfig(): Partial<IoConfig> {
  if (inputConfig) return inputConfig;

  const levelInput = core.getInput('compression-level');
  const encodingInput = core.getInput('encoding');
  const policyInput = core.getInput('new-file-compression');

  const inputs: Partial<IoConfig> = {};
  if (levelInput) inputs.compressionLevel = parseCompressionLevel(levelInput);
  if (encodingInput) inputs.encoding = parseEncoding(encodingInput);
  if (policyInput) {
    inputs.newFileCompression = parseNewFileCompression(policyInput);
  }

  core.debug('I/O inputs:');
  core.debug(`  compression-level: ${levelInput || '(default)'}`);
  core.debug(`  encoding: ${encodingInput || '(default)'}`);
  core.debug(`  new-file-compression: ${policyInput || '(default)'}`);

  inputConfig = inputs;
  return inputs;
}

/**
 * Forget the inputs read so far; the next getIoConfig() reads them again
 */
export function resetIoConfig(): void {
  inputConfig = undefined;
}

/**
 * Resolve the effective configuration
 */
export function getIoConfig(overrides: Partial<IoConfig> = {}): IoConfig {
  const inputs = readInputConfig();

  return {
    compressionLevel: parseCompressionLevel(
      overrides.compressionLevel ??
        inputs.compressionLevel ??
        DEFAULT_IO_CONFIG.compressionLevel
    ),
    encoding: parseEncoding(
      overrides.encoding ?? inputs.encoding ?? DEFAULT_IO_CONFIG.encoding
    ),
    newFileCompression: parseNewFileCompression(
      overrides.newFileCompression ??
        inputs.newFileCompression ??
        DEFAULT_IO_CONFIG.newFileCompression
    ),
  };
}
