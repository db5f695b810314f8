export { ChunkReader, pullFromReadable, pullFromWebReader } from './chunk-reader.js';
export type { ChunkPuller, WebChunkReader } from './chunk-reader.js';
export { LocalFileSource, LocalFileSink, isExistingFile } from './local-file.js';
export { HttpSource, parseContentLength } from './http-source.js';
export { ZipMemberSource } from './zip-member-source.js';
export {
  CompressedFileSource,
  createDecoder,
  createXzSource,
  createGzipSource,
} from './compressed-source.js';
export { HashingSink } from './hashing-sink.js';
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
} from './types.js';
export { EMPTY_CHUNK } from './types.js';
