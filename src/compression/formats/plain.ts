/**
 * Uncompressed file handler backed by a synchronous fs descriptor
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import {CompressionHandler, CompressionMethod, RawIO} from '../types';
import {AccessMode, OPEN_FLAGS} from '../../io/mode';
import {ClosedFileError} from '../../errors';
import {FilePath} from '../../types';
import {pathStr} from '../../utils';

const READ_ALL_CHUNK_SIZE = 64 * 1024;

export class PlainRawIO implements RawIO {
  readonly name: string;
  private fd: number | null;
  private position = 0;

  constructor(
    filePath: FilePath,
    readonly access: AccessMode
  ) {
    this.name = pathStr(filePath);
    this.fd = fs.openSync(filePath, OPEN_FLAGS[access]);
    core.debug(
      `[plain] Opened ${this.name} with flags '${OPEN_FLAGS[access]}'`
    );
  }

  get readable(): boolean {
    return this.access === 'r';
  }

  get writable(): boolean {
    return this.access !== 'r';
  }

  get closed(): boolean {
    return this.fd === null;
  }

  read(size: number): Buffer {
    const fd = this.descriptor();

    if (size >= 0) {
      return this.readChunk(fd, size);
    }

    const chunks: Buffer[] = [];
    for (;;) {
      const chunk = this.readChunk(fd, READ_ALL_CHUNK_SIZE);
      if (chunk.length === 0) break;
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }

  write(data: Uint8Array): number {
    const fd = this.descriptor();
    let offset = 0;
    while (offset < data.length) {
      offset += fs.writeSync(fd, data, offset, data.length - offset);
    }
    return data.length;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
    core.debug(`[plain] Closed ${this.name}`);
  }

  private readChunk(fd: number, size: number): Buffer {
    const buffer = Buffer.alloc(size);
    const bytesRead = fs.readSync(fd, buffer, 0, size, this.position);
    this.position += bytesRead;
    return buffer.subarray(0, bytesRead);
  }

  private descriptor(): number {
    if (this.fd === null) {
      throw new ClosedFileError(this.name);
    }
    return this.fd;
  }
}

export class PlainHandler implements CompressionHandler {
  readonly method = CompressionMethod.NONE;
  readonly extensions: readonly string[] = [];

  openRaw(filePath: FilePath, access: AccessMode): RawIO {
    return new PlainRawIO(filePath, access);
  }
}
