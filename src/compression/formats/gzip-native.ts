/**
 * Native Node.js gzip file handler
 * Uses zlib's synchronous API so files can be read and written without
 * callbacks. Readers inflate the whole file on open; writers buffer and
 * emit one gzip member on close.
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import {gunzipSync, gzipSync} from 'zlib';
import {CompressionHandler, CompressionMethod, RawIO} from '../types';
import {AccessMode, OPEN_FLAGS} from '../../io/mode';
import {ClosedFileError, UnsupportedOperationError} from '../../errors';
import {FilePath} from '../../types';
import {formatBytes, pathStr} from '../../utils';

export const GZIP_MAGIC = Uint8Array.of(0x1f, 0x8b);

export class GzipReaderRawIO implements RawIO {
  readonly readable = true;
  readonly writable = false;
  readonly name: string;
  private data: Buffer | null;
  private offset = 0;

  constructor(filePath: FilePath) {
    this.name = pathStr(filePath);
    const compressed = fs.readFileSync(filePath);
    // Concatenated members (from append mode) inflate as one stream
    this.data =
      compressed.length === 0 ? Buffer.alloc(0) : gunzipSync(compressed);
    core.debug(
      `[gzip] Inflated ${this.name}: ${formatBytes(compressed.length)} -> ${formatBytes(this.data.length)}`
    );
  }

  get closed(): boolean {
    return this.data === null;
  }

  read(size: number): Buffer {
    if (this.data === null) {
      throw new ClosedFileError(this.name);
    }
    const end =
      size < 0
        ? this.data.length
        : Math.min(this.offset + size, this.data.length);
    const chunk = this.data.subarray(this.offset, end);
    this.offset = end;
    return chunk;
  }

  write(): number {
    throw new UnsupportedOperationError(
      `[gzip] ${this.name} is open for reading`
    );
  }

  close(): void {
    this.data = null;
  }
}

export class GzipWriterRawIO implements RawIO {
  readonly readable = false;
  readonly writable = true;
  readonly name: string;
  private fd: number | null;
  private chunks: Buffer[] = [];
  private pendingBytes = 0;

  constructor(
    filePath: FilePath,
    access: Exclude<AccessMode, 'r'>,
    private readonly compressionLevel: number
  ) {
    this.name = pathStr(filePath);
    // Opening up front surfaces EEXIST/EACCES before any data is buffered
    this.fd = fs.openSync(filePath, OPEN_FLAGS[access]);
    core.debug(
      `[gzip] Opened ${this.name} for writing with flags '${OPEN_FLAGS[access]}' at level ${compressionLevel}`
    );
  }

  get closed(): boolean {
    return this.fd === null;
  }

  read(): Buffer {
    throw new UnsupportedOperationError(
      `[gzip] ${this.name} is open for writing`
    );
  }

  write(data: Uint8Array): number {
    if (this.fd === null) {
      throw new ClosedFileError(this.name);
    }
    this.chunks.push(Buffer.from(data));
    this.pendingBytes += data.length;
    return data.length;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;

    try {
      const payload = gzipSync(Buffer.concat(this.chunks, this.pendingBytes), {
        level: this.compressionLevel,
      });
      let offset = 0;
      while (offset < payload.length) {
        offset += fs.writeSync(fd, payload, offset, payload.length - offset);
      }
      core.debug(
        `[gzip] Wrote ${formatBytes(payload.length)} (${formatBytes(this.pendingBytes)} uncompressed) to ${this.name}`
      );
    } finally {
      this.chunks = [];
      this.pendingBytes = 0;
      fs.closeSync(fd);
    }
  }
}

export class GzipNativeHandler implements CompressionHandler {
  readonly method = CompressionMethod.GZIP;
  readonly magic = GZIP_MAGIC;
  readonly extensions: readonly string[] = ['.gz', '.gzip'];

  openRaw(
    filePath: FilePath,
    access: AccessMode,
    compressionLevel: number
  ): RawIO {
    if (access === 'r') {
      return new GzipReaderRawIO(filePath);
    }
    return new GzipWriterRawIO(filePath, access, compressionLevel);
  }
}
