/**
 * Types for the stream endpoint abstraction.
 *
 * Every source and sink shares one lifecycle: open, move chunks, close.
 * Sizes are resolved during open(); `null` means the total length is not
 * knowable before the stream is consumed (distinct from a size of 0).
 */

/** Endpoint variants */
export type EndpointKind = 'file' | 'http' | 'zip' | 'xz' | 'gzip' | 'hashing';

/** Compression codecs handled by CompressedFileSource */
export type CompressionCodec = 'xz' | 'gzip';

export interface StreamEndpoint {
  /** Variant tag, used for logging and dispatch */
  readonly kind: EndpointKind;

  /** Path, URL or archive member this endpoint addresses */
  readonly location: string;

  /** Total size in bytes, or null when unknown */
  readonly size: number | null;

  /** Whether open() succeeded and close() has not run yet */
  readonly isOpen: boolean;

  open(): Promise<void>;

  /** Idempotent; releases every handle even after a failed open() */
  close(): Promise<void>;
}

export interface SourceStream extends StreamEndpoint {
  /** Up to maxBytes of data; an empty array signals end of stream */
  readChunk(maxBytes: number): Promise<Uint8Array>;
}

export interface SinkStream extends StreamEndpoint {
  /** Writes every byte of data or throws WriteError */
  writeChunk(data: Uint8Array): Promise<void>;
}

export interface LocalFileSinkOptions {
  /** fsync before closing (target devices) */
  sync?: boolean;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpSourceOptions {
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;

  /** Extra request headers */
  headers?: Record<string, string>;
}

export interface HashingSinkOptions {
  /** Digest algorithm (default: sha256) */
  algorithm?: string;

  /** Called once with the hex digest when the sink closes without a write error */
  onComplete?: (digest: string) => Promise<void>;
}

export const EMPTY_CHUNK: Uint8Array = new Uint8Array(0);
