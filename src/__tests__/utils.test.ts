import * as path from 'path';
import {pathToFileURL} from 'url';
import {formatBytes, pathStr} from '../utils';
import {isFileLike} from '../types';

describe('formatBytes()', () => {
  test.each([
    [0, '0 Bytes'],
    [512, '512 Bytes'],
    [1024, '1 KB'],
    [1536, '1.5 KB'],
    [5 * 1024 * 1024, '5 MB'],
  ])('%d -> %s', (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});

describe('pathStr()', () => {
  const absolute = path.resolve('/tmp/data/reads.txt');

  test('should return strings unchanged', () => {
    expect(pathStr('relative/file.txt')).toBe('relative/file.txt');
  });

  test('should decode path buffers', () => {
    expect(pathStr(Buffer.from(absolute))).toBe(absolute);
  });

  test('should convert file URLs', () => {
    expect(pathStr(pathToFileURL(absolute))).toBe(absolute);
  });
});

describe('isFileLike()', () => {
  test('should accept objects with close() and closed', () => {
    expect(isFileLike({closed: false, close: () => undefined})).toBe(true);
  });

  test.each([
    ['a string', 'file.txt'],
    ['a buffer', Buffer.from('file.txt')],
    ['a URL', new URL('file:///tmp/file.txt')],
    ['null', null],
    ['an object without closed', {close: (): undefined => undefined}],
    ['an object with a non-boolean closed', {closed: 'no', close: (): undefined => undefined}],
  ])('should reject %s', (_, value) => {
    expect(isFileLike(value)).toBe(false);
  });
});
