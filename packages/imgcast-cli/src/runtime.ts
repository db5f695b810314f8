/**
 * Per-invocation wiring: logger, config and the core services built on them.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { HashCache, TransferEngine, assertValidConfig, buildConfig } from '@imgcast/core';
import type { ImgcastConfig } from '@imgcast/core';

export interface CommonOptions {
  cacheDir?: string;
  verbose?: boolean;
}

export interface Runtime {
  config: ImgcastConfig;
  logger: Logger;
  engine: TransferEngine;
  cache: HashCache;
}

/** Log level: --verbose wins, then IMGCAST_LOG_LEVEL, then warn */
export function resolveLogLevel(verbose: boolean | undefined): string {
  if (verbose) return 'debug';
  const fromEnv = process.env['IMGCAST_LOG_LEVEL'];
  return fromEnv === undefined || fromEnv === '' ? 'warn' : fromEnv;
}

/** Structured logs go to stderr so stdout stays for results. */
export function createLogger(verbose?: boolean): Logger {
  return pino({ name: 'imgcast', level: resolveLogLevel(verbose) }, pino.destination(2));
}

export function createRuntime(options: CommonOptions, logger?: Logger): Runtime {
  const config = buildConfig(options.cacheDir ? { cacheDir: options.cacheDir } : {});
  assertValidConfig(config);

  const log = logger ?? createLogger(options.verbose);
  return {
    config,
    logger: log,
    engine: new TransferEngine(config, log),
    cache: new HashCache(config, log),
  };
}

/**
 * AbortController tied to SIGINT for the duration of a command. The
 * returned dispose removes the handler again.
 */
export function abortOnInterrupt(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', onInterrupt);
    },
  };
}
