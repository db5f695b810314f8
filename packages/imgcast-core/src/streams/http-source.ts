/**
 * HTTP(S) download source.
 *
 * Streams the response body through its reader; nothing beyond the
 * current upstream chunk is held in memory. Timeouts and redirects are
 * left to the fetch implementation.
 */

import { OpenError, ReadError, describeError } from '../errors.js';
import { ChunkReader, pullFromWebReader } from './chunk-reader.js';
import type { FetchLike, HttpSourceOptions, SourceStream } from './types.js';

/** Parse a Content-Length header; null when absent or malformed. */
export function parseContentLength(value: string | null): number | null {
  if (value === null || !/^\d+$/.test(value.trim())) return null;
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * fetch decodes compressed bodies, so Content-Length then counts encoded
 * bytes rather than the bytes readChunk hands out.
 */
export function isEncodedBody(contentEncoding: string | null): boolean {
  if (contentEncoding === null) return false;
  const encoding = contentEncoding.trim().toLowerCase();
  return encoding !== '' && encoding !== 'identity';
}

export class HttpSource implements SourceStream {
  readonly kind = 'http' as const;
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;
  private reader: ChunkReader | null = null;
  private cancelBody: (() => Promise<void>) | null = null;
  private _size: number | null = null;

  constructor(readonly location: string, options: HttpSourceOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = options.headers ?? {};
  }

  get size(): number | null {
    return this._size;
  }

  get isOpen(): boolean {
    return this.reader !== null;
  }

  async open(): Promise<void> {
    if (this.reader) return;

    let response: Response;
    try {
      response = await this.fetchImpl(this.location, { headers: this.headers });
    } catch (err) {
      throw new OpenError(this.location, describeError(err), err);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new OpenError(this.location, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    this._size = isEncodedBody(response.headers.get('content-encoding'))
      ? null
      : parseContentLength(response.headers.get('content-length'));

    if (!response.body) {
      // No body at all (e.g. 204): behaves as an empty stream
      this.reader = new ChunkReader(async () => null);
      return;
    }

    const webReader = response.body.getReader();
    this.cancelBody = async () => {
      await webReader.cancel();
    };
    this.reader = new ChunkReader(pullFromWebReader(webReader));
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
    const reader = this.reader;
    const cancelBody = this.cancelBody;
    this.reader = null;
    this.cancelBody = null;

    if (reader && cancelBody && !reader.isDone) {
      // Releases the connection when the body was not fully consumed
      await cancelBody();
    }
  }
}
