/**
 * imgcast hash <file> and imgcast verify <file> <digest>
 */

import { Command } from 'commander';
import { createRuntime } from '../runtime.js';
import type { CommonOptions, Runtime } from '../runtime.js';
import { failure } from '../ui.js';

/** Recompute the digest, refresh the sidecar and print `<digest>  <file>`. */
export async function runHash(
  filePath: string,
  options: CommonOptions,
  runtime?: Runtime
): Promise<number> {
  try {
    const { cache } = runtime ?? createRuntime(options);
    const record = await cache.computeAndStore(filePath);
    console.log(`${record.digest}  ${filePath}`);
    return 0;
  } catch (error) {
    failure(error);
    return 1;
  }
}

/** Print `valid` or `invalid`; invalid exits 1. */
export async function runVerify(
  filePath: string,
  digest: string,
  options: CommonOptions,
  runtime?: Runtime
): Promise<number> {
  try {
    const { cache } = runtime ?? createRuntime(options);
    const valid = await cache.isValid(filePath, digest);
    console.log(valid ? 'valid' : 'invalid');
    return valid ? 0 : 1;
  } catch (error) {
    failure(error);
    return 1;
  }
}

export function registerHashCommands(program: Command): void {
  program
    .command('hash')
    .description('Compute a file digest and store it in its sidecar')
    .argument('<file>', 'file to hash')
    .option('--cache-dir <dir>', 'cache root')
    .option('-v, --verbose', 'debug logging on stderr')
    .action(async (file: string, options: CommonOptions) => {
      const code = await runHash(file, options);
      if (code !== 0) {
        process.exit(code);
      }
    });

  program
    .command('verify')
    .description('Check a file against an expected digest, trusting a valid sidecar')
    .argument('<file>', 'file to check')
    .argument('<digest>', 'expected hex digest')
    .option('--cache-dir <dir>', 'cache root')
    .option('-v, --verbose', 'debug logging on stderr')
    .action(async (file: string, digest: string, options: CommonOptions) => {
      const code = await runVerify(file, digest, options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
