/**
 * imgcast configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically; components receive the
 * resulting value explicitly instead of reading process-wide constants.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export type HashAlgorithm = 'sha256' | 'sha512';

export interface ImgcastConfig {
  /** Root of the local cache */
  cacheDir: string;

  /** Directory holding downloaded archives (default: {cacheDir}/download) */
  downloadDir: string;

  /** Directory holding extracted images (default: {cacheDir}/images) */
  imageDir: string;

  /** Bytes requested per readChunk call (default: 40960) */
  chunkSize: number;

  /** Minimum wall-clock gap between two progress samples (default: 1000) */
  progressIntervalMs: number;

  /** Digest algorithm for content hashes and sidecars */
  hashAlgorithm: HashAlgorithm;

  /** Suffix of the hidden sidecar file that stores a file's hash record */
  sidecarSuffix: string;
}

export const DEFAULT_CACHE_DIR = '/var/tmp/imgcast';

export const DEFAULT_CONFIG: Omit<ImgcastConfig, 'cacheDir' | 'downloadDir' | 'imageDir'> = {
  chunkSize: 40_960,
  progressIntervalMs: 1_000,
  hashAlgorithm: 'sha256',
  sidecarSuffix: '.sha256',
};

const MIN_CHUNK_SIZE = 1_024;
const MAX_CHUNK_SIZE = 16 * 1024 * 1024;
const VALID_HASH_ALGORITHMS: HashAlgorithm[] = ['sha256', 'sha512'];

function getEnv(key: string, fallback: string): string {
  const value = process.env[key];
  return value === undefined || value === '' ? fallback : value;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build config from environment variables and optional overrides.
 *
 * Environment variables:
 * - IMGCAST_CACHE_DIR: cache root (default: /var/tmp/imgcast)
 * - IMGCAST_DOWNLOAD_DIR: archive cache (default: {cacheDir}/download)
 * - IMGCAST_IMAGE_DIR: image cache (default: {cacheDir}/images)
 * - IMGCAST_CHUNK_SIZE: transfer chunk size in bytes (default: 40960)
 * - IMGCAST_PROGRESS_INTERVAL_MS: progress throttle (default: 1000)
 */
export function buildConfig(overrides?: Partial<ImgcastConfig>): ImgcastConfig {
  const cacheDir = overrides?.cacheDir ?? getEnv('IMGCAST_CACHE_DIR', DEFAULT_CACHE_DIR);

  return {
    cacheDir,
    downloadDir:
      overrides?.downloadDir ??
      getEnv('IMGCAST_DOWNLOAD_DIR', path.join(cacheDir, 'download')),
    imageDir:
      overrides?.imageDir ??
      getEnv('IMGCAST_IMAGE_DIR', path.join(cacheDir, 'images')),
    chunkSize:
      overrides?.chunkSize ??
      getEnvNumber('IMGCAST_CHUNK_SIZE', DEFAULT_CONFIG.chunkSize),
    progressIntervalMs:
      overrides?.progressIntervalMs ??
      getEnvNumber('IMGCAST_PROGRESS_INTERVAL_MS', DEFAULT_CONFIG.progressIntervalMs),
    hashAlgorithm: overrides?.hashAlgorithm ?? DEFAULT_CONFIG.hashAlgorithm,
    sidecarSuffix: overrides?.sidecarSuffix ?? DEFAULT_CONFIG.sidecarSuffix,
  };
}

/**
 * Validate a configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateConfig(config: ImgcastConfig): string[] {
  const errors: string[] = [];

  if (!config.cacheDir) {
    errors.push('cacheDir is required');
  }

  if (!config.downloadDir) {
    errors.push('downloadDir is required');
  }

  if (!config.imageDir) {
    errors.push('imageDir is required');
  }

  if (!Number.isInteger(config.chunkSize) || config.chunkSize < MIN_CHUNK_SIZE) {
    errors.push(`chunkSize must be an integer of at least ${MIN_CHUNK_SIZE}`);
  }

  if (config.chunkSize > MAX_CHUNK_SIZE) {
    errors.push(`chunkSize must not exceed ${MAX_CHUNK_SIZE}`);
  }

  if (config.progressIntervalMs < 0) {
    errors.push('progressIntervalMs must not be negative');
  }

  if (config.progressIntervalMs > 60_000) {
    errors.push('progressIntervalMs must not exceed 60000 (1 minute)');
  }

  if (!VALID_HASH_ALGORITHMS.includes(config.hashAlgorithm)) {
    errors.push(`hashAlgorithm must be one of: ${VALID_HASH_ALGORITHMS.join(', ')}`);
  }

  if (!config.sidecarSuffix || config.sidecarSuffix.includes('/')) {
    errors.push('sidecarSuffix must be a non-empty file name suffix');
  }

  return errors;
}

/** Throws when the config is invalid. */
export function assertValidConfig(config: ImgcastConfig): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid imgcast config: ${errors.join('; ')}`);
  }
}

/** Create the archive and image cache directories. */
export async function ensureCacheDirs(config: ImgcastConfig): Promise<void> {
  await fs.mkdir(config.downloadDir, { recursive: true });
  await fs.mkdir(config.imageDir, { recursive: true });
}
