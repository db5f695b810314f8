/**
 * Decompression dispatcher.
 *
 * Picks exactly one extraction strategy from the archive's extension and
 * hands the resulting source, with a hashed image sink, to the engine.
 */

import * as path from 'node:path';
import { UnsupportedFormatError } from '../errors.js';
import type { HashCache } from '../hash/hash-cache.js';
import { createGzipSource, createXzSource } from '../streams/compressed-source.js';
import type { SourceStream } from '../streams/types.js';
import { ZipMemberSource } from '../streams/zip-member-source.js';
import type { TransferEngine } from '../transfer/transfer-engine.js';
import type { TransferResult } from '../transfer/types.js';
import type { ArchiveFormat, ExtractImageOptions, ExtractionSourceOptions } from './types.js';

const FORMAT_BY_EXTENSION: Readonly<Record<string, ArchiveFormat>> = {
  '.zip': 'zip',
  '.xz': 'xz',
  '.gz': 'gzip',
};

export const SUPPORTED_ARCHIVE_EXTENSIONS: readonly string[] = Object.keys(FORMAT_BY_EXTENSION);

/**
 * @throws UnsupportedFormatError naming the extension when no strategy exists
 */
export function resolveArchiveFormat(archivePath: string): ArchiveFormat {
  const extension = path.extname(archivePath).toLowerCase();
  const format = FORMAT_BY_EXTENSION[extension];
  if (!format) {
    throw new UnsupportedFormatError(archivePath, extension);
  }
  return format;
}

/**
 * Image file name for a downloaded archive: drop the compression
 * extension and any `.img` before it, then append `.img`.
 *
 * `2024-11-19-lite.img.xz` -> `2024-11-19-lite.img`, `os.zip` -> `os.img`
 */
export function deriveImageFileName(archiveFileName: string): string {
  const base = path.basename(archiveFileName);
  let stem = base.slice(0, base.length - path.extname(base).length);
  if (path.extname(stem).toLowerCase() === '.img') {
    stem = stem.slice(0, stem.length - 4);
  }
  return `${stem}.img`;
}

export function createExtractionSource(
  archivePath: string,
  options: ExtractionSourceOptions
): SourceStream {
  const format = resolveArchiveFormat(archivePath);

  switch (format) {
    case 'zip':
      return new ZipMemberSource(archivePath, options.memberName);
    case 'xz':
      return createXzSource(archivePath, options.expectedSize);
    case 'gzip':
      return createGzipSource(archivePath, options.expectedSize);
  }
}

/**
 * Extract an image from a downloaded archive into the image cache,
 * recording its hash sidecar as it is written.
 */
export async function extractImage(
  engine: TransferEngine,
  cache: HashCache,
  options: ExtractImageOptions
): Promise<TransferResult> {
  const source = createExtractionSource(options.archivePath, {
    memberName: path.basename(options.imagePath),
    expectedSize: options.expectedSize,
  });
  const sink = cache.createHashedFileSink(options.imagePath);

  return engine.transfer(source, sink, {
    signal: options.signal,
    label: `extract ${path.basename(options.imagePath)}`,
  });
}
