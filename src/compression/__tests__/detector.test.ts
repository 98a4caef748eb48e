/**
 * Tests for compression detection
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {gzipSync} from 'zlib';
import {
  compressionFromExtension,
  detectCompression,
  guessCompression,
  resolveAutoCompression,
} from '../detector';
import {CompressionMethod} from '../types';

describe('detectCompression()', () => {
  test('should recognize the gzip magic', () => {
    expect(detectCompression(Uint8Array.of(0x1f, 0x8b))).toBe(
      CompressionMethod.GZIP
    );
    expect(detectCompression(gzipSync('payload'))).toBe(CompressionMethod.GZIP);
  });

  test('should fall back to none', () => {
    expect(detectCompression(Buffer.from('plain text'))).toBe(
      CompressionMethod.NONE
    );
    expect(detectCompression(Uint8Array.of(0x8b, 0x1f))).toBe(
      CompressionMethod.NONE
    );
  });

  test('should not match a truncated magic', () => {
    expect(detectCompression(Uint8Array.of(0x1f))).toBe(CompressionMethod.NONE);
    expect(detectCompression(new Uint8Array(0))).toBe(CompressionMethod.NONE);
  });
});

describe('compressionFromExtension()', () => {
  test.each([
    ['reads.fastq.gz', CompressionMethod.GZIP],
    ['archive.GZ', CompressionMethod.GZIP],
    ['notes.gzip', CompressionMethod.GZIP],
    ['notes.txt', CompressionMethod.NONE],
    ['gz', CompressionMethod.NONE],
    ['no-extension', CompressionMethod.NONE],
  ])('%s -> %s', (name, expected) => {
    expect(compressionFromExtension(name)).toBe(expected);
  });
});

describe('file based detection', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'detector-test-'));
  });

  afterEach(() => {
    fs.rmSync(testDir, {recursive: true, force: true});
  });

  test('guessCompression() should read the file header', () => {
    const gz = path.join(testDir, 'misnamed.txt');
    const plain = path.join(testDir, 'misnamed.gz');
    fs.writeFileSync(gz, gzipSync('hidden'));
    fs.writeFileSync(plain, 'visible');

    expect(guessCompression(gz)).toBe(CompressionMethod.GZIP);
    expect(guessCompression(plain)).toBe(CompressionMethod.NONE);
  });

  test('guessCompression() should propagate missing file errors', () => {
    let caught: unknown;
    try {
      guessCompression(path.join(testDir, 'missing'));
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({code: 'ENOENT'});
  });

  test('resolveAutoCompression() should prefer the header of existing files', () => {
    const plain = path.join(testDir, 'exists.gz');
    fs.writeFileSync(plain, 'visible');

    expect(
      resolveAutoCompression(plain, {newFileCompression: 'extension'})
    ).toBe(CompressionMethod.NONE);
  });

  test('resolveAutoCompression() should apply the new-file policy', () => {
    const missing = path.join(testDir, 'new.gz');

    expect(resolveAutoCompression(missing, {newFileCompression: 'none'})).toBe(
      CompressionMethod.NONE
    );
    expect(
      resolveAutoCompression(missing, {newFileCompression: 'extension'})
    ).toBe(CompressionMethod.GZIP);
  });
});
