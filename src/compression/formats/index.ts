/**
 * Export all compression format handlers
 */

export {PlainHandler, PlainRawIO} from './plain';
export {
  GzipNativeHandler,
  GzipReaderRawIO,
  GzipWriterRawIO,
  GZIP_MAGIC,
} from './gzip-native';
