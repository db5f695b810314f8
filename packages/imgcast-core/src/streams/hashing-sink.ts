/**
 * Hash-while-writing decorator.
 *
 * Wraps any sink and feeds every chunk into an incremental digest before
 * handing it to the wrapped sink, so the digest describes exactly the
 * bytes written without a read-back pass.
 */

import * as crypto from 'node:crypto';
import type { HashingSinkOptions, SinkStream } from './types.js';

export class HashingSink implements SinkStream {
  readonly kind = 'hashing' as const;
  private hash: crypto.Hash | null = null;
  private failed = false;
  private _digest: string | null = null;
  private readonly algorithm: string;
  private readonly onComplete: ((digest: string) => Promise<void>) | undefined;

  constructor(
    readonly inner: SinkStream,
    options: HashingSinkOptions = {}
  ) {
    this.algorithm = options.algorithm ?? 'sha256';
    this.onComplete = options.onComplete;
  }

  get location(): string {
    return this.inner.location;
  }

  get size(): number | null {
    return this.inner.size;
  }

  get isOpen(): boolean {
    return this.inner.isOpen;
  }

  /** Hex digest of everything written; available after a clean close() */
  get digest(): string | null {
    return this._digest;
  }

  async open(): Promise<void> {
    if (this.inner.isOpen) return;
    await this.inner.open();
    this.hash = crypto.createHash(this.algorithm);
    this.failed = false;
    this._digest = null;
  }

  async writeChunk(data: Uint8Array): Promise<void> {
    this.hash?.update(data);
    try {
      await this.inner.writeChunk(data);
    } catch (err) {
      // The digest no longer matches what reached the sink
      this.failed = true;
      throw err;
    }
  }

  async close(): Promise<void> {
    const hash = this.hash;
    this.hash = null;

    await this.inner.close();

    if (!hash || this.failed) return;
    this._digest = hash.digest('hex');
    if (this.onComplete) {
      await this.onComplete(this._digest);
    }
  }
}
