/**
 * Tests for the compression handler registry
 */

import {
  getAllHandlers,
  getCompressionHandler,
  resolveCompressionMethod,
} from '../factory';
import {CompressionMethod} from '../types';
import {GzipNativeHandler} from '../formats/gzip-native';
import {PlainHandler} from '../formats/plain';
import {InvalidArgumentError} from '../../errors';

describe('Compression Factory', () => {
  describe('resolveCompressionMethod()', () => {
    test('should treat null and undefined as no compression', () => {
      expect(resolveCompressionMethod(null)).toBe(CompressionMethod.NONE);
      expect(resolveCompressionMethod(undefined)).toBe(CompressionMethod.NONE);
    });

    test('should accept enum members and their string values', () => {
      expect(resolveCompressionMethod(CompressionMethod.GZIP)).toBe(
        CompressionMethod.GZIP
      );
      expect(resolveCompressionMethod('gzip')).toBe(CompressionMethod.GZIP);
      expect(resolveCompressionMethod('auto')).toBe(CompressionMethod.AUTO);
      expect(resolveCompressionMethod('none')).toBe(CompressionMethod.NONE);
    });

    test('should reject unknown methods from untyped callers', () => {
      // Values parsed from configuration are only checked at run time
      const fromConfig = JSON.parse('"bzip2"');

      expect(() => resolveCompressionMethod(fromConfig)).toThrow(
        InvalidArgumentError
      );
      expect(() => resolveCompressionMethod(fromConfig)).toThrow(
        'Unknown compression method: bzip2. Expected one of none, gzip, auto'
      );
    });
  });

  describe('getCompressionHandler()', () => {
    test('should return the plain handler for none', () => {
      const handler = getCompressionHandler(CompressionMethod.NONE);
      expect(handler).toBeInstanceOf(PlainHandler);
      expect(handler.magic).toBeUndefined();
    });

    test('should return the native gzip handler for gzip', () => {
      const handler = getCompressionHandler(CompressionMethod.GZIP);
      expect(handler).toBeInstanceOf(GzipNativeHandler);
      expect(handler.extensions).toEqual(['.gz', '.gzip']);
    });
  });

  describe('getAllHandlers()', () => {
    test('should list one handler per concrete method', () => {
      const methods = getAllHandlers().map(h => h.method);
      expect(methods).toEqual([CompressionMethod.NONE, CompressionMethod.GZIP]);
    });

    test('should return a copy of the registry', () => {
      const handlers = getAllHandlers();
      handlers.pop();
      expect(getAllHandlers()).toHaveLength(2);
    });
  });
});
