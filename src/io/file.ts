/**
 * File handles layered over a RawIO: bytes for binary mode, decoded
 * strings for text mode
 */

import * as core from '@actions/core';
import {StringDecoder} from 'string_decoder';
import {RawIO} from '../compression/types';
import {ClosedFileError, UnsupportedOperationError} from '../errors';
import {FileLike} from '../types';

const READ_CHUNK_SIZE = 8192;
const NEWLINE = 0x0a;
const EMPTY = Buffer.alloc(0);

/**
 * UTF-16 offset just past the first `count` code points of `text`, or -1
 * when it holds fewer
 */
function codePointOffset(text: string, count: number): number {
  let offset = 0;
  for (let i = 0; i < count; i++) {
    if (offset >= text.length) return -1;
    const codePoint = text.codePointAt(offset) ?? 0;
    offset += codePoint > 0xffff ? 2 : 1;
  }
  return offset;
}

export abstract class FileHandle<T extends string | Buffer>
  implements FileLike, Iterable<T>
{
  constructor(
    readonly name: string,
    readonly mode: string,
    protected readonly raw: RawIO
  ) {}

  get closed(): boolean {
    return this.raw.closed;
  }

  readable(): boolean {
    return this.raw.readable;
  }

  writable(): boolean {
    return this.raw.writable;
  }

  /**
   * Read up to `size` units (bytes for binary files, code points for text
   * files), or everything left when size is omitted or negative. Returns an
   * empty value at end of file.
   */
  abstract read(size?: number): T;

  /**
   * Read through the next newline (kept in the result). Empty at end of file.
   */
  abstract readline(): T;

  abstract write(data: T): number;

  close(): void {
    if (this.raw.closed) return;
    this.raw.close();
    core.debug(`Closed ${this.name} (mode ${this.mode})`);
  }

  *[Symbol.iterator](): Generator<T, void, undefined> {
    for (;;) {
      const line = this.readline();
      if (line.length === 0) return;
      yield line;
    }
  }

  /**
   * Run `fn` with this file and close it afterwards, whether `fn` returns
   * or throws
   */
  use<R>(fn: (file: this) => R): R {
    try {
      return fn(this);
    } finally {
      this.close();
    }
  }

  async useAsync<R>(fn: (file: this) => Promise<R>): Promise<R> {
    try {
      return await fn(this);
    } finally {
      this.close();
    }
  }

  protected readableRaw(): RawIO {
    if (this.raw.closed) {
      throw new ClosedFileError(this.name);
    }
    if (!this.raw.readable) {
      throw new UnsupportedOperationError(
        `File not open for reading: ${this.name} (mode ${this.mode})`
      );
    }
    return this.raw;
  }

  protected writableRaw(): RawIO {
    if (this.raw.closed) {
      throw new ClosedFileError(this.name);
    }
    if (!this.raw.writable) {
      throw new UnsupportedOperationError(
        `File not open for writing: ${this.name} (mode ${this.mode})`
      );
    }
    return this.raw;
  }
}

export class BinaryFile extends FileHandle<Buffer> {
  private pending: Buffer = EMPTY;

  read(size = -1): Buffer {
    const raw = this.readableRaw();

    if (size < 0) {
      const rest = raw.read(-1);
      const data =
        this.pending.length > 0 ? Buffer.concat([this.pending, rest]) : rest;
      this.pending = EMPTY;
      return data;
    }

    if (this.pending.length >= size) {
      const data = this.pending.subarray(0, size);
      this.pending = this.pending.subarray(size);
      return data;
    }

    const data = Buffer.concat([
      this.pending,
      raw.read(size - this.pending.length),
    ]);
    this.pending = EMPTY;
    return data;
  }

  readline(): Buffer {
    const raw = this.readableRaw();

    for (;;) {
      const newline = this.pending.indexOf(NEWLINE);
      if (newline >= 0) {
        const line = this.pending.subarray(0, newline + 1);
        this.pending = this.pending.subarray(newline + 1);
        return line;
      }

      const chunk = raw.read(READ_CHUNK_SIZE);
      if (chunk.length === 0) {
        const line = this.pending;
        this.pending = EMPTY;
        return line;
      }
      this.pending = Buffer.concat([this.pending, chunk]);
    }
  }

  write(data: Uint8Array): number {
    return this.writableRaw().write(data);
  }
}

export class TextFile extends FileHandle<string> {
  private readonly decoder: StringDecoder;
  private pending = '';

  constructor(
    name: string,
    mode: string,
    raw: RawIO,
    readonly encoding: BufferEncoding
  ) {
    super(name, mode, raw);
    this.decoder = new StringDecoder(encoding);
  }

  read(size = -1): string {
    const raw = this.readableRaw();

    if (size < 0) {
      const text =
        this.pending + this.decoder.write(raw.read(-1)) + this.decoder.end();
      this.pending = '';
      return text;
    }

    let end = codePointOffset(this.pending, size);
    while (end < 0) {
      if (!this.fill(raw)) {
        end = this.pending.length;
        break;
      }
      end = codePointOffset(this.pending, size);
    }
    const text = this.pending.slice(0, end);
    this.pending = this.pending.slice(end);
    return text;
  }

  readline(): string {
    const raw = this.readableRaw();

    for (;;) {
      const newline = this.pending.indexOf('\n');
      if (newline >= 0) {
        const line = this.pending.slice(0, newline + 1);
        this.pending = this.pending.slice(newline + 1);
        return line;
      }
      if (!this.fill(raw)) {
        const line = this.pending;
        this.pending = '';
        return line;
      }
    }
  }

  write(data: string): number {
    this.writableRaw().write(Buffer.from(data, this.encoding));
    return data.length;
  }

  /**
   * Decode the next chunk into the pending text; false at end of stream
   */
  private fill(raw: RawIO): boolean {
    const chunk = raw.read(READ_CHUNK_SIZE);
    if (chunk.length === 0) {
      this.pending += this.decoder.end();
      return false;
    }
    this.pending += this.decoder.write(chunk);
    return true;
  }
}
