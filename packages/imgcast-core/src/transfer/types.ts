/**
 * Types for the transfer engine.
 */

/**
 * Snapshot of a running transfer. Fields that cannot be derived are
 * absent: no percent or ETA for an unknown total, no throughput or ETA
 * before any time has elapsed.
 */
export interface ProgressSample {
  /** Bytes written to the sink so far */
  bytesTransferred: number;

  /** Expected total in bytes, or null when unknown */
  totalBytes: number | null;

  /** Seconds since the transfer started */
  elapsedSeconds: number;

  /** Average bytes per second since the start */
  throughput?: number;

  /** Completion in [0, 100] */
  percent?: number;

  /** Remaining bytes divided by the average throughput */
  etaSeconds?: number;

  /** Whether this is the closing sample with exact totals */
  final: boolean;
}

export interface TransferOptions {
  /** Cancellation, checked between chunks */
  signal?: AbortSignal;

  /** Name used in events, logs and errors (default: "<source> -> <sink>") */
  label?: string;
}

export interface TransferResult {
  label: string;

  /** Bytes copied from source to sink */
  bytesTransferred: number;

  /** Size the source reported on open, or null */
  totalBytes: number | null;

  /** Wall time from start to both endpoints closed */
  durationMs: number;
}

export interface TransferEngineOptions {
  /** Clock in ms (default: Date.now) */
  now?: () => number;
}

/** Events emitted by the TransferEngine */
export interface TransferEngineEvents {
  /** Throttled progress; the final sample is always emitted */
  progress: (sample: ProgressSample, label: string) => void;

  /** Transfer finished and both endpoints are closed */
  complete: (result: TransferResult) => void;
}
