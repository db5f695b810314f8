/**
 * Local file endpoints.
 *
 * Backed by fs/promises file handles. Regular files report their size
 * from stat; pipes, character devices and block devices report null.
 */

import * as fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { OpenError, ReadError, WriteError, describeError, errnoCode } from '../errors.js';
import type { LocalFileSinkOptions, SinkStream, SourceStream } from './types.js';
import { EMPTY_CHUNK } from './types.js';

function sizeFromStats(stats: Stats): number | null {
  return stats.isFile() ? stats.size : null;
}

function openFailureReason(err: unknown): string {
  switch (errnoCode(err)) {
    case 'ENOENT':
      return 'no such file or directory';
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    case 'EISDIR':
      return 'is a directory';
    default:
      return describeError(err);
  }
}

/** True when path exists and is a regular file. */
export async function isExistingFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (err) {
    if (errnoCode(err) === 'ENOENT' || errnoCode(err) === 'ENOTDIR') return false;
    throw err;
  }
}

export class LocalFileSource implements SourceStream {
  readonly kind = 'file' as const;
  private handle: FileHandle | null = null;
  private _size: number | null = null;

  constructor(readonly location: string) {}

  get size(): number | null {
    return this._size;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  async open(): Promise<void> {
    if (this.handle) return;

    let handle: FileHandle;
    try {
      handle = await fs.open(this.location, 'r');
    } catch (err) {
      throw new OpenError(this.location, openFailureReason(err), err);
    }

    try {
      this._size = sizeFromStats(await handle.stat());
    } catch (err) {
      await handle.close();
      throw new OpenError(this.location, describeError(err), err);
    }
    this.handle = handle;
  }

  async readChunk(maxBytes: number): Promise<Uint8Array> {
    if (!this.handle) {
      throw new ReadError(this.location, 'source is not open');
    }

    const buffer = Buffer.allocUnsafe(maxBytes);
    try {
      const { bytesRead } = await this.handle.read(buffer, 0, maxBytes, null);
      return bytesRead === 0 ? EMPTY_CHUNK : buffer.subarray(0, bytesRead);
    } catch (err) {
      throw new ReadError(this.location, describeError(err), err);
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }
  }
}

/**
 * Writable local file or device. The file is created or truncated on open.
 */
export class LocalFileSink implements SinkStream {
  readonly kind = 'file' as const;
  private handle: FileHandle | null = null;
  private _size: number | null = null;
  private readonly sync: boolean;

  constructor(readonly location: string, options: LocalFileSinkOptions = {}) {
    this.sync = options.sync ?? false;
  }

  get size(): number | null {
    return this._size;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  async open(): Promise<void> {
    if (this.handle) return;

    let handle: FileHandle;
    try {
      handle = await fs.open(this.location, 'w');
    } catch (err) {
      throw new OpenError(this.location, openFailureReason(err), err);
    }

    try {
      this._size = sizeFromStats(await handle.stat());
    } catch (err) {
      await handle.close();
      throw new OpenError(this.location, describeError(err), err);
    }
    this.handle = handle;
  }

  async writeChunk(data: Uint8Array): Promise<void> {
    if (!this.handle) {
      throw new WriteError(this.location, 'sink is not open');
    }

    let offset = 0;
    try {
      while (offset < data.length) {
        const { bytesWritten } = await this.handle.write(data, offset, data.length - offset, null);
        if (bytesWritten === 0) {
          throw new Error('no progress writing chunk');
        }
        offset += bytesWritten;
      }
    } catch (err) {
      const reason = errnoCode(err) === 'ENOSPC' ? 'no space left on device' : describeError(err);
      throw new WriteError(this.location, reason, err);
    }

    if (this._size !== null) {
      this._size += data.length;
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (!handle) return;

    try {
      if (this.sync) {
        await handle.sync();
      }
    } catch (err) {
      await handle.close();
      throw new WriteError(this.location, `flush failed: ${describeError(err)}`, err);
    }
    await handle.close();
  }
}
