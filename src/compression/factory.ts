/**
 * Compression handler registry and method resolution
 */

import {
  CompressionHandler,
  CompressionMethod,
  CompressionMethodLike,
  ConcreteMethod,
} from './types';
import {GzipNativeHandler, PlainHandler} from './formats';
import {InvalidArgumentError} from '../errors';

// Registry of all available handlers, one per concrete method
const handlerRegistry: CompressionHandler[] = [
  new PlainHandler(),
  new GzipNativeHandler(),
];

/**
 * Normalize a caller-supplied method; null and undefined mean no compression
 */
export function resolveCompressionMethod(
  method: CompressionMethodLike
): CompressionMethod {
  if (method === null || method === undefined) {
    return CompressionMethod.NONE;
  }

  const match = Object.values(CompressionMethod).find(m => m === method);
  if (!match) {
    throw new InvalidArgumentError(
      `Unknown compression method: ${String(method)}. Expected one of ${Object.values(CompressionMethod).join(', ')}`
    );
  }
  return match;
}

/**
 * Get the handler for a concrete compression method
 */
export function getCompressionHandler(
  method: ConcreteMethod
): CompressionHandler {
  const handler = handlerRegistry.find(h => h.method === method);

  if (!handler) {
    throw new InvalidArgumentError(`Unknown compression method: ${method}`);
  }

  return handler;
}

/**
 * Get all registered compression handlers
 */
export function getAllHandlers(): CompressionHandler[] {
  return [...handlerRegistry];
}
