import * as path from 'node:path';
import type { ImgcastConfig } from '../config.js';
import { OpenError } from '../errors.js';
import { deriveImageFileName, resolveArchiveFormat } from '../extract/dispatcher.js';
import type { CachePaths, ImageDescriptor } from './types.js';

/** File name component of a download URL */
export function archiveFileNameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch (err) {
    throw new OpenError(url, 'invalid URL', err);
  }

  const fileName = decodeURIComponent(path.posix.basename(pathname));
  if (!fileName) {
    throw new OpenError(url, 'URL does not name a file');
  }
  return fileName;
}

/**
 * Cache locations for a descriptor's archive and image. Fails early with
 * UnsupportedFormatError when the archive has no extraction strategy.
 */
export function resolveCachePaths(config: ImgcastConfig, descriptor: ImageDescriptor): CachePaths {
  const archiveFileName = archiveFileNameFromUrl(descriptor.url);
  const archivePath = path.join(config.downloadDir, archiveFileName);
  resolveArchiveFormat(archivePath);

  return {
    archivePath,
    imagePath: path.join(config.imageDir, deriveImageFileName(archiveFileName)),
  };
}
