/**
 * Compression module - transparent compression under file streams
 *
 * This module provides:
 * - Handlers for uncompressed and gzip files
 * - Magic-byte and extension based detection
 * - Resolution of caller-supplied method names
 */

export * from './types';
export * from './detector';
export * from './factory';
export * from './formats';
