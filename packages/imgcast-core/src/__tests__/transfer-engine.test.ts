import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { TransferEngine } from '../transfer/transfer-engine.js';
import type { ProgressSample, TransferResult } from '../transfer/types.js';
import { buildConfig } from '../config.js';
import type { ImgcastConfig } from '../config.js';
import { AbortedError, OpenError, ReadError, WriteError } from '../errors.js';
import { LocalFileSink } from '../streams/local-file.js';
import { MemorySink, MemorySource, createMockLogger, patternBytes } from './helpers.js';

function makeConfig(cacheDir: string, overrides?: Partial<ImgcastConfig>): ImgcastConfig {
  return buildConfig({
    cacheDir,
    chunkSize: 1024,
    progressIntervalMs: 1000,
    ...overrides,
  });
}

/** Clock that advances by stepMs on every reading */
function steppingClock(stepMs: number): () => number {
  let t = 0;
  return () => (t += stepMs);
}

function collectProgress(engine: TransferEngine): ProgressSample[] {
  const samples: ProgressSample[] = [];
  engine.on('progress', (sample) => {
    samples.push(sample);
  });
  return samples;
}

describe('TransferEngine', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'imgcast-engine-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('constructor', () => {
    it('should reject an invalid config', () => {
      expect(
        () => new TransferEngine(makeConfig(tmpDir, { chunkSize: 10 }), createMockLogger())
      ).toThrow('Invalid imgcast config');
    });
  });

  describe('byte fidelity', () => {
    it('should copy every byte in order into a local file', async () => {
      const data = patternBytes(10_000);
      const target = path.join(tmpDir, 'out.img');
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());

      const result = await engine.transfer(
        new MemorySource('memory', data),
        new LocalFileSink(target)
      );

      expect(fs.readFileSync(target).equals(data)).toBe(true);
      expect(result.bytesTransferred).toBe(10_000);
      expect(result.totalBytes).toBe(10_000);
    });

    it('should produce identical sinks when repeated against fresh sinks', async () => {
      const data = patternBytes(4_500, 3);
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());
      const first = new MemorySink('first');
      const second = new MemorySink('second');

      await engine.transfer(new MemorySource('a', data), first);
      await engine.transfer(new MemorySource('b', data), second);

      expect(first.content.equals(data)).toBe(true);
      expect(second.content.equals(first.content)).toBe(true);
    });

    it('should request chunks of the configured size', async () => {
      const source = new MemorySource('memory', patternBytes(2_500));
      const sink = new MemorySink('sink');
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());

      await engine.transfer(source, sink);

      expect(sink.chunks.map((c) => c.length)).toEqual([1024, 1024, 452]);
      // Three data chunks plus the empty end-of-stream read
      expect(source.readCalls).toBe(4);
    });

    it('should handle an empty source', async () => {
      const sink = new MemorySink('sink');
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());
      const samples = collectProgress(engine);

      const result = await engine.transfer(new MemorySource('empty', new Uint8Array(0)), sink);

      expect(result.bytesTransferred).toBe(0);
      expect(sink.content.length).toBe(0);
      expect(samples).toHaveLength(1);
      expect(samples[0]?.final).toBe(true);
      expect(samples[0]?.percent).toBe(100);
    });
  });

  describe('progress', () => {
    it('should throttle samples and always emit the final one', async () => {
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger(), {
        now: steppingClock(250),
      });
      const samples = collectProgress(engine);

      const result = await engine.transfer(
        new MemorySource('memory', patternBytes(5 * 1024)),
        new MemorySink('sink')
      );

      // start=250; chunks at 500 (emit), 750, 1000, 1250, 1500 (emit); final at 1750
      expect(samples.map((s) => s.bytesTransferred)).toEqual([1024, 5120, 5120]);
      expect(samples.map((s) => s.final)).toEqual([false, false, true]);
      expect(samples[0]).toEqual({
        bytesTransferred: 1024,
        totalBytes: 5120,
        elapsedSeconds: 0.25,
        throughput: 4096,
        percent: 20,
        etaSeconds: 1,
        final: false,
      });
      expect(samples[2]?.percent).toBe(100);
      expect(samples[2]?.totalBytes).toBe(5120);
      expect(result.durationMs).toBe(1750);
    });

    it('should report non-decreasing percentages ending at exactly 100', async () => {
      const engine = new TransferEngine(
        makeConfig(tmpDir, { progressIntervalMs: 0 }),
        createMockLogger(),
        { now: steppingClock(100) }
      );
      const samples = collectProgress(engine);

      await engine.transfer(new MemorySource('memory', patternBytes(7_000)), new MemorySink('sink'));

      const percents = samples.map((s) => s.percent ?? -1);
      for (let i = 1; i < percents.length; i++) {
        expect(percents[i]).toBeGreaterThanOrEqual(percents[i - 1] ?? 0);
      }
      expect(percents.every((p) => p >= 0 && p <= 100)).toBe(true);
      expect(percents[percents.length - 1]).toBe(100);
    });

    it('should omit percent and ETA when the source size is unknown', async () => {
      const engine = new TransferEngine(
        makeConfig(tmpDir, { progressIntervalMs: 0 }),
        createMockLogger(),
        { now: steppingClock(100) }
      );
      const samples = collectProgress(engine);

      await engine.transfer(
        new MemorySource('stream', patternBytes(3_000), { knownSize: false }),
        new MemorySink('sink')
      );

      expect(samples.length).toBeGreaterThan(1);
      for (const sample of samples) {
        expect(sample.totalBytes).toBeNull();
        expect('percent' in sample).toBe(false);
        expect('etaSeconds' in sample).toBe(false);
        expect(sample.throughput).toBeGreaterThan(0);
      }
      expect(samples[samples.length - 1]?.bytesTransferred).toBe(3_000);
    });

    it('should emit complete after the final sample', async () => {
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());
      const order: string[] = [];
      let completed: TransferResult | null = null;

      engine.on('progress', (sample) => {
        order.push(sample.final ? 'final' : 'progress');
      });
      engine.on('complete', (result) => {
        order.push('complete');
        completed = result;
      });

      await engine.transfer(
        new MemorySource('memory', patternBytes(100)),
        new MemorySink('sink'),
        { label: 'copy test' }
      );

      expect(order).toEqual(['progress', 'final', 'complete']);
      expect(completed).toMatchObject({ label: 'copy test', bytesTransferred: 100 });
    });
  });

  describe('resource lifecycle', () => {
    it('should open source before sink and close sink before source', async () => {
      const calls: string[] = [];
      const source = new MemorySource('src', patternBytes(10));
      const sink = new MemorySink('dst');
      const track = <T extends { open(): Promise<void>; close(): Promise<void> }>(
        endpoint: T,
        name: string
      ): void => {
        const open = endpoint.open.bind(endpoint);
        const close = endpoint.close.bind(endpoint);
        endpoint.open = async () => {
          calls.push(`open ${name}`);
          await open();
        };
        endpoint.close = async () => {
          calls.push(`close ${name}`);
          await close();
        };
      };
      track(source, 'source');
      track(sink, 'sink');

      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());
      await engine.transfer(source, sink);

      expect(calls).toEqual(['open source', 'open sink', 'close sink', 'close source']);
    });

    it('should close the source exactly once when the sink fails to open', async () => {
      const source = new MemorySource('src', patternBytes(10));
      const sink = new MemorySink('dst', { failOpen: new OpenError('dst', 'permission denied') });
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());

      await expect(engine.transfer(source, sink)).rejects.toBeInstanceOf(OpenError);

      expect(source.openCalls).toBe(1);
      expect(source.closeCalls).toBe(1);
      expect(source.readCalls).toBe(0);
    });

    it('should not open the sink when the source fails to open', async () => {
      const source = new MemorySource('src', patternBytes(10), {
        failOpen: new OpenError('src', 'no such file or directory'),
      });
      const sink = new MemorySink('dst');
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());

      await expect(engine.transfer(source, sink)).rejects.toThrow('Failed to open src');

      expect(sink.openCalls).toBe(0);
      expect(sink.closeCalls).toBe(0);
    });

    it('should close both endpoints and propagate a read failure', async () => {
      const source = new MemorySource('src', patternBytes(5_000), {
        failOnRead: { call: 2, error: new ReadError('src', 'connection reset') },
      });
      const sink = new MemorySink('dst');
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());

      await expect(engine.transfer(source, sink)).rejects.toThrow('Failed to read src: connection reset');

      expect(sink.closeCalls).toBe(1);
      expect(source.closeCalls).toBe(1);
      expect(sink.content.length).toBe(1024);
    });

    it('should close both endpoints and propagate a write failure', async () => {
      const source = new MemorySource('src', patternBytes(5_000));
      const sink = new MemorySink('dst', {
        failOnWrite: { call: 3, error: new WriteError('dst', 'no space left on device') },
      });
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());

      await expect(engine.transfer(source, sink)).rejects.toBeInstanceOf(WriteError);

      expect(sink.closeCalls).toBe(1);
      expect(source.closeCalls).toBe(1);
    });

    it('should keep the primary error when closing also fails', async () => {
      const logger = createMockLogger();
      const source = new MemorySource('src', patternBytes(5_000), {
        failOnRead: { call: 1, error: new ReadError('src', 'truncated') },
      });
      const sink = new MemorySink('dst', { failClose: new WriteError('dst', 'flush failed') });
      const engine = new TransferEngine(makeConfig(tmpDir), logger);

      await expect(engine.transfer(source, sink)).rejects.toThrow('Failed to read src: truncated');

      expect(source.closeCalls).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { location: 'dst', error: 'Failed to write dst: flush failed' },
        'Failed to close endpoint'
      );
    });

    it('should surface a close failure after a clean copy, still closing the source', async () => {
      const source = new MemorySource('src', patternBytes(100));
      const sink = new MemorySink('dst', { failClose: new WriteError('dst', 'flush failed') });
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());
      let completed = false;
      engine.on('complete', () => {
        completed = true;
      });

      await expect(engine.transfer(source, sink)).rejects.toThrow('Failed to write dst: flush failed');

      expect(source.closeCalls).toBe(1);
      expect(completed).toBe(false);
    });
  });

  describe('cancellation', () => {
    it('should stop between chunks, close both endpoints and leave a partial sink', async () => {
      const controller = new AbortController();
      const data = patternBytes(5 * 1024);
      const target = path.join(tmpDir, 'partial.img');
      const source = new MemorySource('src', data, {
        onRead: (call) => {
          if (call === 2) controller.abort();
        },
      });
      const sink = new LocalFileSink(target);
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());

      await expect(
        engine.transfer(source, sink, { signal: controller.signal, label: 'write test' })
      ).rejects.toBeInstanceOf(AbortedError);

      // The chunk read when the abort arrived is still written whole
      const written = fs.readFileSync(target);
      expect(written.length).toBe(2048);
      expect(written.equals(data.subarray(0, 2048))).toBe(true);
      expect(source.closeCalls).toBe(1);
      expect(sink.isOpen).toBe(false);
    });

    it('should not open anything when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const source = new MemorySource('src', patternBytes(10));
      const sink = new MemorySink('dst');
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());

      await expect(
        engine.transfer(source, sink, { signal: controller.signal })
      ).rejects.toThrow('Transfer aborted: src -> dst');

      expect(source.openCalls).toBe(0);
      expect(sink.openCalls).toBe(0);
    });

    it('should not emit a final sample for an aborted transfer', async () => {
      const controller = new AbortController();
      const source = new MemorySource('src', patternBytes(4096), {
        onRead: (call) => {
          if (call === 1) controller.abort();
        },
      });
      const engine = new TransferEngine(makeConfig(tmpDir), createMockLogger());
      const samples = collectProgress(engine);

      await expect(
        engine.transfer(source, new MemorySink('dst'), { signal: controller.signal })
      ).rejects.toBeInstanceOf(AbortedError);

      expect(samples.some((s) => s.final)).toBe(false);
    });
  });
});
