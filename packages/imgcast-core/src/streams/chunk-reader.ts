/**
 * Pull adapter over push-style streams.
 *
 * Node readables and web stream readers hand out chunks of whatever size
 * the producer chose. ChunkReader re-slices them so callers get at most
 * `maxBytes` per call, holding no more than one upstream chunk.
 */

import type { Readable } from 'node:stream';
import { EMPTY_CHUNK } from './types.js';

/** Resolves the next upstream chunk, or null at end of stream */
export type ChunkPuller = () => Promise<Uint8Array | null>;

export class ChunkReader {
  private pending: Uint8Array = EMPTY_CHUNK;
  private ended = false;

  constructor(private readonly pull: ChunkPuller) {}

  /** Whether the upstream reported end of stream and nothing is buffered */
  get isDone(): boolean {
    return this.ended && this.pending.length === 0;
  }

  /**
   * Pull the first upstream chunk ahead of time, so failures in a
   * container header surface before any byte is handed out.
   */
  async prime(): Promise<void> {
    if (this.pending.length > 0 || this.ended) return;
    const next = await this.pull();
    if (next === null) {
      this.ended = true;
    } else {
      this.pending = next;
    }
  }

  async read(maxBytes: number): Promise<Uint8Array> {
    if (maxBytes <= 0) {
      throw new RangeError(`maxBytes must be positive, got ${maxBytes}`);
    }

    while (this.pending.length === 0) {
      if (this.ended) return EMPTY_CHUNK;
      const next = await this.pull();
      if (next === null) {
        this.ended = true;
        return EMPTY_CHUNK;
      }
      this.pending = next;
    }

    if (this.pending.length <= maxBytes) {
      const chunk = this.pending;
      this.pending = EMPTY_CHUNK;
      return chunk;
    }

    const chunk = this.pending.subarray(0, maxBytes);
    this.pending = this.pending.subarray(maxBytes);
    return chunk;
  }
}

/** Puller over a Node readable in paused mode, via its async iterator. */
export function pullFromReadable(readable: Readable): ChunkPuller {
  const iterator: AsyncIterator<unknown> = readable[Symbol.asyncIterator]();
  return async () => {
    const result = await iterator.next();
    if (result.done) return null;
    const { value } = result;
    if (value instanceof Uint8Array) return value;
    if (typeof value === 'string') return Buffer.from(value);
    throw new TypeError(`Unexpected chunk type from stream: ${typeof value}`);
  };
}

/** The part of a web stream reader (fetch response bodies) ChunkReader needs */
export interface WebChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
}

export function pullFromWebReader(reader: WebChunkReader): ChunkPuller {
  return async () => {
    const result = await reader.read();
    if (result.done || result.value === undefined) return null;
    return result.value;
  };
}
