// Configuration
export {
  buildConfig,
  validateConfig,
  assertValidConfig,
  ensureCacheDirs,
  DEFAULT_CONFIG,
  DEFAULT_CACHE_DIR,
} from './config.js';
export type { ImgcastConfig, HashAlgorithm } from './config.js';

// Errors
export {
  ImgcastError,
  OpenError,
  ReadError,
  WriteError,
  NotFoundError,
  UnsupportedFormatError,
  ChecksumMismatchError,
  AbortedError,
  isAbortedError,
  describeError,
} from './errors.js';
export type { ImgcastErrorCode } from './errors.js';

// Stream endpoints
export {
  ChunkReader,
  LocalFileSource,
  LocalFileSink,
  isExistingFile,
  HttpSource,
  parseContentLength,
  ZipMemberSource,
  CompressedFileSource,
  createXzSource,
  createGzipSource,
  HashingSink,
} from './streams/index.js';
export type {
  EndpointKind,
  CompressionCodec,
  StreamEndpoint,
  SourceStream,
  SinkStream,
  LocalFileSinkOptions,
  FetchLike,
  HttpSourceOptions,
  HashingSinkOptions,
} from './streams/index.js';

// Hash cache
export {
  HashCache,
  hashFile,
  hashBuffer,
  sidecarPathFor,
  computeIntegrityTag,
  createHashRecord,
  verifyHashRecord,
  parseHashRecord,
  readHashRecord,
  writeHashRecord,
} from './hash/index.js';
export type {
  HashRecord,
  FileHashResult,
  SidecarReadResult,
  SidecarStatus,
  TrustedRecordResult,
} from './hash/index.js';

// Decompression dispatcher
export {
  resolveArchiveFormat,
  deriveImageFileName,
  createExtractionSource,
  extractImage,
  SUPPORTED_ARCHIVE_EXTENSIONS,
} from './extract/index.js';
export type { ArchiveFormat, ExtractionSourceOptions, ExtractImageOptions } from './extract/index.js';

// Transfer engine
export { TransferEngine, computeProgressSample, ProgressThrottle } from './transfer/index.js';
export type {
  ProgressSample,
  TransferOptions,
  TransferResult,
  TransferEngineOptions,
  TransferEngineEvents,
} from './transfer/index.js';

// Image installer
export { ImageInstaller, resolveCachePaths, archiveFileNameFromUrl } from './install/index.js';
export type {
  ImageDescriptor,
  CachePaths,
  InstallStage,
  StageEvent,
  InstallOutcome,
  InstallOptions,
  ImageInstallerDeps,
  ImageInstallerEvents,
} from './install/index.js';
