/**
 * HashCache - decides whether a cached data file can be trusted.
 *
 * A sidecar is trusted only while its integrity tag checks out and its
 * recorded mtime equals the data file's current mtime. Anything else is
 * not evidence that the file is bad, only that its digest has to be
 * recomputed from the content.
 */

import * as fs from 'node:fs/promises';
import type { Logger } from 'pino';
import type { ImgcastConfig } from '../config.js';
import { NotFoundError, errnoCode } from '../errors.js';
import { HashingSink } from '../streams/hashing-sink.js';
import { LocalFileSink } from '../streams/local-file.js';
import type { LocalFileSinkOptions } from '../streams/types.js';
import { hashFile } from './file-hasher.js';
import { createHashRecord, readHashRecord, sidecarPathFor, writeHashRecord } from './sidecar.js';
import type { HashRecord, SidecarStatus } from './types.js';

export interface TrustedRecordResult {
  status: SidecarStatus;
  record: HashRecord | null;
}

export class HashCache {
  private readonly config: ImgcastConfig;
  private readonly logger: Logger;

  constructor(config: ImgcastConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: 'hash-cache' });
  }

  /** Sidecar path for a data file */
  sidecarPath(filePath: string): string {
    return sidecarPathFor(filePath, this.config.sidecarSuffix);
  }

  /**
   * Hash the file's content and persist a fresh record.
   *
   * @throws NotFoundError if the file does not exist
   */
  async computeAndStore(filePath: string): Promise<HashRecord> {
    const result = await hashFile(filePath, {
      algorithm: this.config.hashAlgorithm,
      chunkSize: this.config.chunkSize,
    });

    this.logger.debug({ filePath, bytes: result.sizeBytes }, 'Computed file digest');
    return this.store(filePath, result.hash);
  }

  /**
   * Persist a record for a digest computed elsewhere (e.g. while writing),
   * stamped with the file's current mtime.
   */
  async store(filePath: string, digest: string): Promise<HashRecord> {
    const modifiedTime = await this.modifiedTime(filePath);
    const record = createHashRecord(digest, modifiedTime);
    await writeHashRecord(this.sidecarPath(filePath), record);

    this.logger.debug({ filePath, modifiedTime }, 'Stored hash sidecar');
    return record;
  }

  /**
   * Load the sidecar and report whether it can stand in for the content.
   */
  async getTrustedRecord(filePath: string): Promise<TrustedRecordResult> {
    const sidecar = await readHashRecord(this.sidecarPath(filePath));

    if (sidecar.status === 'missing') {
      return { status: 'missing', record: null };
    }

    if (sidecar.status === 'invalid') {
      this.logger.debug({ filePath, reason: sidecar.reason }, 'Ignoring invalid hash sidecar');
      return { status: 'invalid', record: null };
    }

    const currentTime = await this.modifiedTime(filePath);
    if (sidecar.record.modifiedTime !== currentTime) {
      this.logger.debug(
        { filePath, recorded: sidecar.record.modifiedTime, current: currentTime },
        'Hash sidecar is stale'
      );
      return { status: 'stale', record: null };
    }

    return { status: 'trusted', record: sidecar.record };
  }

  /**
   * Digest of the file, from a trusted sidecar when possible, otherwise
   * recomputed (and the sidecar refreshed).
   *
   * @throws NotFoundError if the file does not exist
   */
  async getDigest(filePath: string): Promise<string> {
    const trusted = await this.getTrustedRecord(filePath);
    if (trusted.record) {
      return trusted.record.digest;
    }

    const record = await this.computeAndStore(filePath);
    return record.digest;
  }

  /**
   * Whether the file exists and its content digest equals expectedDigest.
   * Never throws for missing or corrupt sidecars.
   */
  async isValid(filePath: string, expectedDigest: string): Promise<boolean> {
    let digest: string;
    try {
      digest = await this.getDigest(filePath);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return false;
      }
      throw err;
    }

    const valid = digest.toLowerCase() === expectedDigest.trim().toLowerCase();
    this.logger.debug({ filePath, valid }, 'Checked cached file');
    return valid;
  }

  /**
   * A local file sink that hashes while writing and persists the
   * sidecar once the file is closed.
   */
  createHashedFileSink(filePath: string, options: LocalFileSinkOptions = {}): HashingSink {
    return new HashingSink(new LocalFileSink(filePath, options), {
      algorithm: this.config.hashAlgorithm,
      onComplete: async (digest) => {
        await this.store(filePath, digest);
      },
    });
  }

  private async modifiedTime(filePath: string): Promise<number> {
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        throw new NotFoundError(filePath);
      }
      return stats.mtimeMs;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT' || errnoCode(err) === 'ENOTDIR') {
        throw new NotFoundError(filePath, err);
      }
      throw err;
    }
  }
}
