/**
 * I/O module - file handles, scoped opening and closing iterators
 */

export * from './mode';
export * from './file';
export * from './open';
export * from './closing-iterator';
export * from './maybe-open';
export * from './lines';
