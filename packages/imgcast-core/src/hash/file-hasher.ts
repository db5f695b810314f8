/**
 * Streaming file hasher.
 *
 * Reads the file in fixed-size chunks so memory use stays constant for
 * multi-gigabyte images.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import { NotFoundError, ReadError, describeError, errnoCode } from '../errors.js';
import type { FileHashResult, HashFileOptions } from './types.js';

const DEFAULT_READ_SIZE = 40_960;

/**
 * Compute the digest of a file.
 *
 * @throws NotFoundError if the file does not exist
 */
export async function hashFile(
  filePath: string,
  options: HashFileOptions = {}
): Promise<FileHashResult> {
  const algorithm = options.algorithm ?? 'sha256';

  return new Promise<FileHashResult>((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    let sizeBytes = 0;

    const stream = fs.createReadStream(filePath, {
      highWaterMark: options.chunkSize ?? DEFAULT_READ_SIZE,
    });

    stream.on('data', (chunk: string | Buffer) => {
      sizeBytes += chunk.length;
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve({
        hash: hash.digest('hex'),
        algorithm,
        sizeBytes,
      });
    });

    stream.on('error', (err: Error) => {
      if (errnoCode(err) === 'ENOENT') {
        reject(new NotFoundError(filePath, err));
        return;
      }
      reject(new ReadError(filePath, `hashing failed: ${describeError(err)}`, err));
    });
  });
}

/** Digest of an in-memory buffer. */
export function hashBuffer(content: Uint8Array, algorithm = 'sha256'): FileHashResult {
  const hash = crypto.createHash(algorithm);
  hash.update(content);

  return {
    hash: hash.digest('hex'),
    algorithm,
    sizeBytes: content.length,
  };
}
