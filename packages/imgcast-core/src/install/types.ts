/**
 * Types for the image installer.
 *
 * An image is resolved from the image cache, else extracted from a
 * cached or freshly downloaded archive, then written to a device.
 */

import type { SourceStream } from '../streams/types.js';
import type { ProgressSample } from '../transfer/types.js';

/** One installable image, as supplied by the catalog */
export interface ImageDescriptor {
  /** Display name */
  name: string;

  /** Archive download URL; its file name selects the extraction strategy */
  url: string;

  /** Expected digest of the extracted image */
  extractSha256?: string;

  /** Expected digest of the downloaded archive */
  imageDownloadSha256?: string;

  /** Expected size of the extracted image in bytes */
  extractSize?: number;
}

export interface CachePaths {
  archivePath: string;
  imagePath: string;
}

export type InstallStage =
  | 'check-image-cache'
  | 'check-archive-cache'
  | 'download'
  | 'extract'
  | 'write';

export interface StageEvent {
  stage: InstallStage;

  /** started/completed for transfers, hit/miss for cache checks */
  state: 'started' | 'completed' | 'hit' | 'miss';

  /** File, URL or device the stage works on */
  target: string;
}

export type InstallOutcome =
  | {
      status: 'installed';
      imageFrom: 'cache' | 'archive';
      archiveFrom: 'cache' | 'download' | null;
      imagePath: string;
      devicePath: string;
      bytesWritten: number;
    }
  | {
      status: 'aborted';
      stage: InstallStage;
    };

export interface InstallOptions {
  signal?: AbortSignal;
}

export interface ImageInstallerDeps {
  /** Source for archive downloads (default: HttpSource) */
  createHttpSource?: (url: string) => SourceStream;
}

/** Events emitted by the ImageInstaller */
export interface ImageInstallerEvents {
  stage: (event: StageEvent) => void;
  progress: (stage: InstallStage, sample: ProgressSample) => void;
}
