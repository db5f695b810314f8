/**
 * Sources that decompress a local xz or gzip file on the fly.
 *
 * Neither format records the decompressed length reliably in its
 * header, so the size is whatever the caller expects (usually the
 * catalog's extract size) or null.
 */

import * as fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Duplex, Readable } from 'node:stream';
import * as zlib from 'node:zlib';
import lzma from 'lzma-native';
import { OpenError, ReadError, describeError, errnoCode } from '../errors.js';
import { ChunkReader, pullFromReadable } from './chunk-reader.js';
import type { CompressionCodec, SourceStream } from './types.js';

/** Streaming decoder for a codec */
export function createDecoder(codec: CompressionCodec): Duplex {
  switch (codec) {
    case 'xz':
      return lzma.createDecompressor();
    case 'gzip':
      return zlib.createGunzip();
  }
}

export class CompressedFileSource implements SourceStream {
  readonly kind: CompressionCodec;
  private handle: FileHandle | null = null;
  private streams: Array<Readable | Duplex> = [];
  private reader: ChunkReader | null = null;
  private readonly expectedSize: number | null;

  constructor(
    readonly location: string,
    readonly codec: CompressionCodec,
    expectedSize?: number | null
  ) {
    this.kind = codec;
    this.expectedSize = expectedSize ?? null;
  }

  get size(): number | null {
    return this.expectedSize;
  }

  get isOpen(): boolean {
    return this.reader !== null;
  }

  async open(): Promise<void> {
    if (this.reader) return;

    let handle: FileHandle;
    try {
      handle = await fs.open(this.location, 'r');
    } catch (err) {
      const reason = errnoCode(err) === 'ENOENT' ? 'no such file or directory' : describeError(err);
      throw new OpenError(this.location, reason, err);
    }

    const compressed = handle.createReadStream({ autoClose: false });
    const decoder = createDecoder(this.codec);
    // Read failures on the compressed side surface through the decoder's iterator
    compressed.on('error', (err) => decoder.destroy(err));
    compressed.pipe(decoder);

    this.handle = handle;
    this.streams = [compressed, decoder];
    const reader = new ChunkReader(pullFromReadable(decoder));

    try {
      await reader.prime();
    } catch (err) {
      await this.release();
      throw new OpenError(this.location, `corrupt ${this.codec} data: ${describeError(err)}`, err);
    }
    this.reader = reader;
  }

  async readChunk(maxBytes: number): Promise<Uint8Array> {
    if (!this.reader) {
      throw new ReadError(this.location, 'source is not open');
    }

    try {
      return await this.reader.read(maxBytes);
    } catch (err) {
      throw new ReadError(this.location, `corrupt ${this.codec} data: ${describeError(err)}`, err);
    }
  }

  async close(): Promise<void> {
    this.reader = null;
    await this.release();
  }

  private async release(): Promise<void> {
    const streams = this.streams;
    const handle = this.handle;
    this.streams = [];
    this.handle = null;

    for (const stream of streams) {
      if (!stream.destroyed) stream.destroy();
    }
    if (handle) {
      await handle.close();
    }
  }
}

export function createXzSource(filePath: string, expectedSize?: number | null): CompressedFileSource {
  return new CompressedFileSource(filePath, 'xz', expectedSize);
}

export function createGzipSource(filePath: string, expectedSize?: number | null): CompressedFileSource {
  return new CompressedFileSource(filePath, 'gzip', expectedSize);
}
