export {
  resolveArchiveFormat,
  deriveImageFileName,
  createExtractionSource,
  extractImage,
  SUPPORTED_ARCHIVE_EXTENSIONS,
} from './dispatcher.js';
export type { ArchiveFormat, ExtractionSourceOptions, ExtractImageOptions } from './types.js';
