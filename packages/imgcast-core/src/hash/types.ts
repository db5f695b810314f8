/**
 * Types for the hash cache.
 *
 * A data file may be paired with a hidden sidecar holding its digest,
 * the file's mtime at hashing time, and an integrity tag over both.
 */

/** Persisted sidecar content */
export interface HashRecord {
  /** Hex content digest of the data file */
  digest: string;

  /** Data file mtime (ms since epoch) when the digest was computed */
  modifiedTime: number;

  /** Hex SHA-256 over the canonical serialization of digest and modifiedTime */
  integrityTag: string;
}

/** Result of hashing a file's content */
export interface FileHashResult {
  /** Hex digest */
  hash: string;

  /** Algorithm used */
  algorithm: string;

  /** Bytes hashed */
  sizeBytes: number;
}

export interface HashFileOptions {
  /** Digest algorithm (default: sha256) */
  algorithm?: string;

  /** Read size in bytes */
  chunkSize?: number;
}

/** Why a sidecar was not trusted */
export type SidecarStatus = 'trusted' | 'missing' | 'invalid' | 'stale';
