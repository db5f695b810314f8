/**
 * TransferEngine - copies a source endpoint into a sink endpoint chunk by
 * chunk, reporting throttled progress.
 *
 * Owns the endpoints' lifecycle for the duration of a transfer: opens
 * source then sink, and closes sink then source whatever happens.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import type { ImgcastConfig } from '../config.js';
import { assertValidConfig } from '../config.js';
import { AbortedError, describeError } from '../errors.js';
import type { SinkStream, SourceStream, StreamEndpoint } from '../streams/types.js';
import { ProgressThrottle, computeProgressSample } from './progress.js';
import type {
  TransferEngineEvents,
  TransferEngineOptions,
  TransferOptions,
  TransferResult,
} from './types.js';

/**
 * Typed event emitter interface for the transfer engine.
 */
export interface TypedTransferEngineEmitter {
  on<K extends keyof TransferEngineEvents>(event: K, listener: TransferEngineEvents[K]): this;
  off<K extends keyof TransferEngineEvents>(event: K, listener: TransferEngineEvents[K]): this;
  emit<K extends keyof TransferEngineEvents>(
    event: K,
    ...args: Parameters<TransferEngineEvents[K]>
  ): boolean;
}

export class TransferEngine extends EventEmitter implements TypedTransferEngineEmitter {
  private readonly config: ImgcastConfig;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: ImgcastConfig, logger: Logger, options: TransferEngineOptions = {}) {
    super();
    assertValidConfig(config);

    this.config = config;
    this.logger = logger.child({ component: 'transfer-engine' });
    this.now = options.now ?? Date.now;
  }

  /**
   * Copy every byte of source into sink.
   *
   * @throws AbortedError when options.signal fires; both endpoints are closed
   * @throws OpenError, ReadError or WriteError from the endpoints
   */
  async transfer(
    source: SourceStream,
    sink: SinkStream,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    const { signal } = options;
    const label = options.label ?? `${source.location} -> ${sink.location}`;

    if (signal?.aborted) {
      throw new AbortedError(label, signal.reason);
    }

    const startedAt = this.now();
    this.logger.debug({ label, source: source.kind, sink: sink.kind }, 'Starting transfer');

    await this.openOrRelease(source, []);
    await this.openOrRelease(sink, [source]);

    let bytesTransferred: number;
    try {
      bytesTransferred = await this.copy(source, sink, label, startedAt, signal);
    } catch (err) {
      await this.closeInOrder([sink, source], true);
      if (err instanceof AbortedError) {
        this.logger.info({ label }, 'Transfer aborted');
      }
      throw err;
    }

    const totalBytes = source.size;
    this.emit(
      'progress',
      computeProgressSample(
        bytesTransferred,
        totalBytes === null ? null : bytesTransferred,
        this.now() - startedAt,
        true
      ),
      label
    );

    await this.closeInOrder([sink, source], false);

    const result: TransferResult = {
      label,
      bytesTransferred,
      totalBytes,
      durationMs: this.now() - startedAt,
    };

    this.logger.debug(
      { label, bytes: bytesTransferred, durationMs: result.durationMs },
      'Transfer complete'
    );
    this.emit('complete', result);
    return result;
  }

  private async copy(
    source: SourceStream,
    sink: SinkStream,
    label: string,
    startedAt: number,
    signal: AbortSignal | undefined
  ): Promise<number> {
    const throttle = new ProgressThrottle(this.config.progressIntervalMs);
    let bytesTransferred = 0;

    for (;;) {
      // Cancellation only takes effect between chunks
      if (signal?.aborted) {
        throw new AbortedError(label, signal.reason);
      }

      const chunk = await source.readChunk(this.config.chunkSize);
      if (chunk.length === 0) {
        return bytesTransferred;
      }

      await sink.writeChunk(chunk);
      bytesTransferred += chunk.length;

      const now = this.now();
      if (throttle.shouldEmit(now)) {
        this.emit(
          'progress',
          computeProgressSample(bytesTransferred, source.size, now - startedAt),
          label
        );
      }
    }
  }

  /** Open an endpoint; on failure release it and everything opened before it. */
  private async openOrRelease(endpoint: StreamEndpoint, opened: StreamEndpoint[]): Promise<void> {
    try {
      await endpoint.open();
    } catch (err) {
      await this.closeInOrder([endpoint, ...opened], true);
      throw err;
    }
  }

  /**
   * Close each endpoint in turn. When a primary error is already
   * propagating, close failures are logged and left behind it; otherwise
   * the first one is thrown after every endpoint has been closed.
   */
  private async closeInOrder(endpoints: StreamEndpoint[], failing: boolean): Promise<void> {
    const closeErrors: unknown[] = [];

    for (const endpoint of endpoints) {
      try {
        await endpoint.close();
      } catch (err) {
        this.logger.warn(
          { location: endpoint.location, error: describeError(err) },
          'Failed to close endpoint'
        );
        closeErrors.push(err);
      }
    }

    if (!failing && closeErrors.length > 0) {
      throw closeErrors[0];
    }
  }
}
