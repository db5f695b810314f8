/**
 * Error taxonomy for imgcast.
 *
 * Every failure carries the path or URL it concerns (`target`) and the
 * underlying transport/filesystem error (`cause`) so callers can render
 * an actionable message. The core never prints.
 */

export type ImgcastErrorCode =
  | 'OPEN_FAILED'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'NOT_FOUND'
  | 'UNSUPPORTED_FORMAT'
  | 'CHECKSUM_MISMATCH'
  | 'ABORTED';

export class ImgcastError extends Error {
  public readonly code: ImgcastErrorCode;
  public readonly target: string;

  constructor(code: ImgcastErrorCode, target: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ImgcastError';
    this.code = code;
    this.target = target;
  }
}

/** Source or sink could not be opened (missing, unreachable, corrupt container) */
export class OpenError extends ImgcastError {
  constructor(target: string, reason: string, cause?: unknown) {
    super('OPEN_FAILED', target, `Failed to open ${target}: ${reason}`, cause);
    this.name = 'OpenError';
  }
}

/** Source failed after it was opened */
export class ReadError extends ImgcastError {
  constructor(target: string, reason: string, cause?: unknown) {
    super('READ_FAILED', target, `Failed to read ${target}: ${reason}`, cause);
    this.name = 'ReadError';
  }
}

/** Destination fault (device full, permission denied, flush failure) */
export class WriteError extends ImgcastError {
  constructor(target: string, reason: string, cause?: unknown) {
    super('WRITE_FAILED', target, `Failed to write ${target}: ${reason}`, cause);
    this.name = 'WriteError';
  }
}

export class NotFoundError extends ImgcastError {
  constructor(target: string, cause?: unknown) {
    super('NOT_FOUND', target, `File not found: ${target}`, cause);
    this.name = 'NotFoundError';
  }
}

export class UnsupportedFormatError extends ImgcastError {
  public readonly extension: string;

  constructor(target: string, extension: string) {
    super(
      'UNSUPPORTED_FORMAT',
      target,
      `Unsupported archive format "${extension || '(none)'}" for ${target}`
    );
    this.name = 'UnsupportedFormatError';
    this.extension = extension;
  }
}

export class ChecksumMismatchError extends ImgcastError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(target: string, expected: string, actual: string) {
    super(
      'CHECKSUM_MISMATCH',
      target,
      `Checksum mismatch for ${target}: expected ${expected}, got ${actual}`
    );
    this.name = 'ChecksumMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** Cooperative cancellation. An outcome, not a crash. */
export class AbortedError extends ImgcastError {
  constructor(target: string, cause?: unknown) {
    super('ABORTED', target, `Transfer aborted: ${target}`, cause);
    this.name = 'AbortedError';
  }
}

export function isAbortedError(err: unknown): err is AbortedError {
  return err instanceof AbortedError;
}

/** Node system errors expose a string `code` (ENOENT, ENOSPC, ...) */
export function errnoCode(err: unknown): string | undefined {
  if (err !== null && typeof err === 'object' && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
