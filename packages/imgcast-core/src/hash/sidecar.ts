/**
 * Hash sidecar files.
 *
 * Each data file may have a hidden sidecar next to it (`.<name><suffix>`)
 * holding a HashRecord. The integrity tag ties the digest to the mtime,
 * so a sidecar whose fields were edited, or copied over from another
 * version of the file, never validates.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describeError, errnoCode } from '../errors.js';
import type { HashRecord } from './types.js';

export type SidecarReadResult =
  | { status: 'ok'; record: HashRecord }
  | { status: 'missing' }
  | { status: 'invalid'; reason: string };

/** Sidecar location for a data file: same directory, dot-prefixed name plus suffix */
export function sidecarPathFor(filePath: string, suffix: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}${suffix}`);
}

/** JSON with keys in sorted order */
function canonicalJson(value: Record<string, string | number>): string {
  return JSON.stringify(value, Object.keys(value).sort());
}

export function computeIntegrityTag(digest: string, modifiedTime: number): string {
  return crypto
    .createHash('sha256')
    .update(canonicalJson({ digest, modifiedTime }), 'utf-8')
    .digest('hex');
}

export function createHashRecord(digest: string, modifiedTime: number): HashRecord {
  return {
    digest,
    modifiedTime,
    integrityTag: computeIntegrityTag(digest, modifiedTime),
  };
}

/** True when the record's tag matches its own digest and mtime */
export function verifyHashRecord(record: HashRecord): boolean {
  return computeIntegrityTag(record.digest, record.modifiedTime) === record.integrityTag;
}

function isHashRecord(value: unknown): value is HashRecord {
  if (value === null || typeof value !== 'object') return false;
  if (!('digest' in value) || !('modifiedTime' in value) || !('integrityTag' in value)) {
    return false;
  }
  const { digest, modifiedTime, integrityTag } = value;
  return (
    typeof digest === 'string' &&
    typeof modifiedTime === 'number' &&
    Number.isFinite(modifiedTime) &&
    typeof integrityTag === 'string'
  );
}

/** Parse sidecar text; structural and integrity failures are reported, not thrown. */
export function parseHashRecord(raw: string): SidecarReadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { status: 'invalid', reason: `unparseable: ${describeError(err)}` };
  }

  if (!isHashRecord(parsed)) {
    return { status: 'invalid', reason: 'missing or mistyped fields' };
  }

  const record: HashRecord = {
    digest: parsed.digest,
    modifiedTime: parsed.modifiedTime,
    integrityTag: parsed.integrityTag,
  };

  if (!verifyHashRecord(record)) {
    return { status: 'invalid', reason: 'integrity tag mismatch' };
  }

  return { status: 'ok', record };
}

export async function readHashRecord(sidecarPath: string): Promise<SidecarReadResult> {
  let raw: string;
  try {
    raw = await fs.readFile(sidecarPath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      return { status: 'missing' };
    }
    return { status: 'invalid', reason: `unreadable: ${describeError(err)}` };
  }
  return parseHashRecord(raw);
}

/**
 * Persist a record atomically: write a temp file in the same directory,
 * then rename it over the sidecar.
 */
export async function writeHashRecord(sidecarPath: string, record: HashRecord): Promise<void> {
  const tmpPath = `${sidecarPath}.${process.pid}.${crypto.randomBytes(6).toString('hex')}.tmp`;

  try {
    await fs.writeFile(tmpPath, JSON.stringify(record, null, 2) + '\n', 'utf-8');
    await fs.rename(tmpPath, sidecarPath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}
