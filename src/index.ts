export * from './types';
export * from './errors';
export * from './config';
export {formatBytes, pathStr} from './utils';
export * from './compression';
export * from './io';
