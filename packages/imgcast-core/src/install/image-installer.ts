/**
 * ImageInstaller - gets an image onto a device with as little work as
 * the cache allows.
 *
 * Integrates:
 * - HashCache: trusts cached images and archives only when their digests match
 * - HttpSource: downloads the archive when no valid copy is cached
 * - extractImage: decompresses the archive into the image cache
 * - TransferEngine: every copy, including the final write to the device
 */

import { EventEmitter } from 'node:events';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { ImgcastConfig } from '../config.js';
import { ensureCacheDirs } from '../config.js';
import { ChecksumMismatchError, isAbortedError } from '../errors.js';
import { extractImage } from '../extract/dispatcher.js';
import type { HashCache } from '../hash/hash-cache.js';
import { HttpSource } from '../streams/http-source.js';
import { LocalFileSink, LocalFileSource } from '../streams/local-file.js';
import type { SourceStream } from '../streams/types.js';
import type { TransferEngine } from '../transfer/transfer-engine.js';
import type { ProgressSample } from '../transfer/types.js';
import { resolveCachePaths } from './cache-paths.js';
import type {
  ImageDescriptor,
  ImageInstallerDeps,
  ImageInstallerEvents,
  InstallOptions,
  InstallOutcome,
  InstallStage,
  StageEvent,
} from './types.js';

/**
 * Typed event emitter interface for the image installer.
 */
export interface TypedImageInstallerEmitter {
  on<K extends keyof ImageInstallerEvents>(event: K, listener: ImageInstallerEvents[K]): this;
  off<K extends keyof ImageInstallerEvents>(event: K, listener: ImageInstallerEvents[K]): this;
  emit<K extends keyof ImageInstallerEvents>(
    event: K,
    ...args: Parameters<ImageInstallerEvents[K]>
  ): boolean;
}

function sameDigest(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export class ImageInstaller extends EventEmitter implements TypedImageInstallerEmitter {
  private readonly config: ImgcastConfig;
  private readonly logger: Logger;
  private readonly engine: TransferEngine;
  private readonly cache: HashCache;
  private readonly createHttpSource: (url: string) => SourceStream;
  private stage: InstallStage = 'check-image-cache';

  constructor(
    config: ImgcastConfig,
    logger: Logger,
    engine: TransferEngine,
    cache: HashCache,
    deps: ImageInstallerDeps = {}
  ) {
    super();
    this.config = config;
    this.logger = logger.child({ component: 'image-installer' });
    this.engine = engine;
    this.cache = cache;
    this.createHttpSource = deps.createHttpSource ?? ((url) => new HttpSource(url));
  }

  /**
   * Put the descriptor's image on devicePath.
   *
   * Cancellation resolves to an 'aborted' outcome; every other failure
   * propagates as a typed error.
   */
  async install(
    descriptor: ImageDescriptor,
    devicePath: string,
    options: InstallOptions = {}
  ): Promise<InstallOutcome> {
    const { signal } = options;
    const { archivePath, imagePath } = resolveCachePaths(this.config, descriptor);
    await ensureCacheDirs(this.config);

    this.logger.info({ image: descriptor.name, devicePath }, 'Installing image');

    // The engine may be shared; relay its samples only while installing
    const relayProgress = (sample: ProgressSample): void => {
      this.emit('progress', this.stage, sample);
    };
    this.engine.on('progress', relayProgress);

    try {
      let imageFrom: 'cache' | 'archive' = 'archive';
      let archiveFrom: 'cache' | 'download' | null = null;

      this.enterStage('check-image-cache');
      const imageCached =
        descriptor.extractSha256 !== undefined &&
        (await this.cache.isValid(imagePath, descriptor.extractSha256));
      this.emitStage(imageCached ? 'hit' : 'miss', imagePath);

      if (imageCached) {
        imageFrom = 'cache';
      } else {
        archiveFrom = await this.retrieveArchive(descriptor, archivePath, signal);
        await this.extract(descriptor, archivePath, imagePath, signal);
      }

      this.enterStage('write');
      this.emitStage('started', devicePath);
      const written = await this.engine.transfer(
        new LocalFileSource(imagePath),
        new LocalFileSink(devicePath, { sync: true }),
        { signal, label: `write ${descriptor.name}` }
      );
      this.emitStage('completed', devicePath);

      this.logger.info(
        { image: descriptor.name, devicePath, imageFrom, archiveFrom },
        'Image installed'
      );

      return {
        status: 'installed',
        imageFrom,
        archiveFrom,
        imagePath,
        devicePath,
        bytesWritten: written.bytesTransferred,
      };
    } catch (err) {
      if (isAbortedError(err)) {
        this.logger.info({ image: descriptor.name, stage: this.stage }, 'Install aborted');
        return { status: 'aborted', stage: this.stage };
      }
      throw err;
    } finally {
      this.engine.off('progress', relayProgress);
    }
  }

  /** Use a valid cached archive, or download a fresh one. */
  private async retrieveArchive(
    descriptor: ImageDescriptor,
    archivePath: string,
    signal: AbortSignal | undefined
  ): Promise<'cache' | 'download'> {
    const expected = descriptor.imageDownloadSha256;

    this.enterStage('check-archive-cache');
    const archiveCached =
      expected !== undefined && (await this.cache.isValid(archivePath, expected));
    this.emitStage(archiveCached ? 'hit' : 'miss', archivePath);
    if (archiveCached) {
      return 'cache';
    }

    this.enterStage('download');
    this.emitStage('started', descriptor.url);
    const sink = this.cache.createHashedFileSink(archivePath);
    await this.engine.transfer(this.createHttpSource(descriptor.url), sink, {
      signal,
      label: `download ${path.basename(archivePath)}`,
    });

    if (expected !== undefined && sink.digest !== null && !sameDigest(sink.digest, expected)) {
      throw new ChecksumMismatchError(archivePath, expected, sink.digest);
    }
    this.emitStage('completed', descriptor.url);
    return 'download';
  }

  private async extract(
    descriptor: ImageDescriptor,
    archivePath: string,
    imagePath: string,
    signal: AbortSignal | undefined
  ): Promise<void> {
    this.enterStage('extract');
    this.emitStage('started', imagePath);
    await extractImage(this.engine, this.cache, {
      archivePath,
      imagePath,
      expectedSize: descriptor.extractSize ?? null,
      signal,
    });

    if (descriptor.extractSha256 !== undefined) {
      const digest = await this.cache.getDigest(imagePath);
      if (!sameDigest(digest, descriptor.extractSha256)) {
        throw new ChecksumMismatchError(imagePath, descriptor.extractSha256, digest);
      }
    }
    this.emitStage('completed', imagePath);
  }

  private enterStage(stage: InstallStage): void {
    this.stage = stage;
    this.logger.debug({ stage }, 'Entering install stage');
  }

  private emitStage(state: StageEvent['state'], target: string): void {
    this.emit('stage', { stage: this.stage, state, target });
  }
}
