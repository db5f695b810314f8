import type { ProgressSample } from './types.js';

/**
 * Derive a progress sample from cumulative totals.
 *
 * Throughput is the average since the start, not the rate since the
 * previous sample.
 */
export function computeProgressSample(
  bytesTransferred: number,
  totalBytes: number | null,
  elapsedMs: number,
  final = false
): ProgressSample {
  const elapsedSeconds = Math.max(0, elapsedMs) / 1000;
  const sample: ProgressSample = {
    bytesTransferred,
    totalBytes,
    elapsedSeconds,
    final,
  };

  if (elapsedSeconds > 0) {
    sample.throughput = bytesTransferred / elapsedSeconds;
  }

  if (totalBytes !== null) {
    sample.percent =
      totalBytes === 0 ? 100 : Math.min(100, (bytesTransferred / totalBytes) * 100);

    if (sample.throughput !== undefined && sample.throughput > 0) {
      sample.etaSeconds = Math.max(0, totalBytes - bytesTransferred) / sample.throughput;
    }
  }

  return sample;
}

/** Lets the first sample through, then at most one per interval. */
export class ProgressThrottle {
  private lastEmitAt: number | null = null;

  constructor(private readonly intervalMs: number) {}

  shouldEmit(now: number): boolean {
    if (this.lastEmitAt !== null && now - this.lastEmitAt < this.intervalMs) {
      return false;
    }
    this.lastEmitAt = now;
    return true;
  }
}
