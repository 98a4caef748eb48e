import {fileURLToPath} from 'url';
import {FilePath} from './types';

/**
 * Get file size in human-readable format
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

/**
 * Render any accepted path value as a string for names and log messages.
 * Buffer paths that are not valid UTF-8 decode lossily, so the original
 * value, not this string, is what gets handed to `fs`.
 */
export function pathStr(filePath: FilePath): string {
  if (typeof filePath === 'string') {
    return filePath;
  }
  if (filePath instanceof URL) {
    return fileURLToPath(filePath);
  }
  return filePath.toString('utf8');
}
