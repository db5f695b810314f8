/**
 * Source for a single member of a zip archive, read through yauzl.
 *
 * The member's size comes from the central directory. close() releases
 * the member stream and the archive itself.
 */

import * as path from 'node:path';
import type { Readable } from 'node:stream';
import yauzl from 'yauzl';
import type { Entry, ZipFile } from 'yauzl';
import { OpenError, ReadError, describeError } from '../errors.js';
import { ChunkReader, pullFromReadable } from './chunk-reader.js';
import type { SourceStream } from './types.js';

function openArchive(archivePath: string): Promise<ZipFile> {
  return new Promise<ZipFile>((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error('archive could not be opened'));
        return;
      }
      resolve(zipfile);
    });
  });
}

/**
 * Walk the central directory for memberName. An exact path match wins;
 * otherwise a single file entry with the same basename is accepted.
 */
function findMember(zipfile: ZipFile, memberName: string): Promise<Entry | null> {
  return new Promise<Entry | null>((resolve, reject) => {
    const byBasename: Entry[] = [];

    const cleanup = (): void => {
      zipfile.removeListener('entry', onEntry);
      zipfile.removeListener('end', onEnd);
      zipfile.removeListener('error', onError);
    };

    const onEntry = (entry: Entry): void => {
      const isDirectory = entry.fileName.endsWith('/');
      if (!isDirectory && entry.fileName === memberName) {
        cleanup();
        resolve(entry);
        return;
      }
      if (!isDirectory && path.posix.basename(entry.fileName) === memberName) {
        byBasename.push(entry);
      }
      zipfile.readEntry();
    };

    const onEnd = (): void => {
      cleanup();
      const [only] = byBasename;
      resolve(byBasename.length === 1 && only ? only : null);
    };

    const onError = (err: Error): void => {
      cleanup();
      reject(err);
    };

    zipfile.on('entry', onEntry);
    zipfile.on('end', onEnd);
    zipfile.on('error', onError);
    zipfile.readEntry();
  });
}

function openMemberStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise<Readable>((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(err ?? new Error(`could not read member ${entry.fileName}`));
        return;
      }
      resolve(stream);
    });
  });
}

export class ZipMemberSource implements SourceStream {
  readonly kind = 'zip' as const;
  readonly location: string;
  private zipfile: ZipFile | null = null;
  private stream: Readable | null = null;
  private reader: ChunkReader | null = null;
  private _size: number | null = null;

  constructor(
    readonly archivePath: string,
    readonly memberName: string
  ) {
    this.location = `${archivePath}:${memberName}`;
  }

  get size(): number | null {
    return this._size;
  }

  get isOpen(): boolean {
    return this.reader !== null;
  }

  async open(): Promise<void> {
    if (this.reader) return;

    let zipfile: ZipFile;
    try {
      zipfile = await openArchive(this.archivePath);
    } catch (err) {
      throw new OpenError(this.archivePath, describeError(err), err);
    }

    try {
      const entry = await findMember(zipfile, this.memberName);
      if (!entry) {
        throw new OpenError(this.location, `member "${this.memberName}" not found in archive`);
      }
      const stream = await openMemberStream(zipfile, entry);
      this._size = entry.uncompressedSize;
      this.zipfile = zipfile;
      this.stream = stream;
      this.reader = new ChunkReader(pullFromReadable(stream));
    } catch (err) {
      zipfile.close();
      if (err instanceof OpenError) throw err;
      throw new OpenError(this.location, describeError(err), err);
    }
  }

  async readChunk(maxBytes: number): Promise<Uint8Array> {
    if (!this.reader) {
      throw new ReadError(this.location, 'source is not open');
    }

    try {
      return await this.reader.read(maxBytes);
    } catch (err) {
      throw new ReadError(this.location, describeError(err), err);
    }
  }

  async close(): Promise<void> {
    const stream = this.stream;
    const zipfile = this.zipfile;
    this.stream = null;
    this.zipfile = null;
    this.reader = null;

    if (stream && !stream.destroyed) {
      stream.destroy();
    }
    if (zipfile?.isOpen) {
      zipfile.close();
    }
  }
}
