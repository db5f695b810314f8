/**
 * Shared fakes for the core test suites.
 */

import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { SinkStream, SourceStream } from '../streams/types.js';

export function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

/** Deterministic, non-repeating-looking test bytes */
export function patternBytes(length: number, seed = 7): Buffer {
  const data = Buffer.alloc(length);
  let value = seed;
  for (let i = 0; i < length; i++) {
    value = (value * 31 + 11) % 251;
    data[i] = value;
  }
  return data;
}

export interface MemorySourceOptions {
  /** Report data.length as the size on open (default: true) */
  knownSize?: boolean;

  /** Error thrown by open() */
  failOpen?: Error;

  /** Error thrown by the n-th readChunk call */
  failOnRead?: { call: number; error: Error };

  /** Hook run at the start of every readChunk, with the 1-based call count */
  onRead?: (call: number) => void;
}

export class MemorySource implements SourceStream {
  readonly kind = 'file' as const;
  size: number | null = null;
  openCalls = 0;
  closeCalls = 0;
  readCalls = 0;
  private offset = 0;
  private opened = false;

  constructor(
    readonly location: string,
    private readonly data: Uint8Array,
    private readonly options: MemorySourceOptions = {}
  ) {}

  get isOpen(): boolean {
    return this.opened;
  }

  async open(): Promise<void> {
    this.openCalls++;
    if (this.options.failOpen) throw this.options.failOpen;
    this.opened = true;
    this.size = this.options.knownSize === false ? null : this.data.length;
  }

  async readChunk(maxBytes: number): Promise<Uint8Array> {
    this.readCalls++;
    this.options.onRead?.(this.readCalls);
    if (this.options.failOnRead?.call === this.readCalls) {
      throw this.options.failOnRead.error;
    }
    const end = Math.min(this.offset + maxBytes, this.data.length);
    const chunk = this.data.subarray(this.offset, end);
    this.offset = end;
    return chunk;
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.opened = false;
  }
}

export interface MemorySinkOptions {
  failOpen?: Error;
  failOnWrite?: { call: number; error: Error };
  failClose?: Error;
}

export class MemorySink implements SinkStream {
  readonly kind = 'file' as const;
  readonly size: number | null = null;
  readonly chunks: Buffer[] = [];
  openCalls = 0;
  closeCalls = 0;
  private writeCalls = 0;
  private opened = false;

  constructor(
    readonly location: string,
    private readonly options: MemorySinkOptions = {}
  ) {}

  get isOpen(): boolean {
    return this.opened;
  }

  get content(): Buffer {
    return Buffer.concat(this.chunks);
  }

  async open(): Promise<void> {
    this.openCalls++;
    if (this.options.failOpen) throw this.options.failOpen;
    this.opened = true;
  }

  async writeChunk(data: Uint8Array): Promise<void> {
    this.writeCalls++;
    if (this.options.failOnWrite?.call === this.writeCalls) {
      throw this.options.failOnWrite.error;
    }
    this.chunks.push(Buffer.from(data));
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.opened = false;
    if (this.options.failClose) throw this.options.failClose;
  }
}

/** Read a source to its end and return everything it produced */
export async function readAll(source: SourceStream, chunkSize = 1024): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for (;;) {
    const chunk = await source.readChunk(chunkSize);
    if (chunk.length === 0) break;
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}
