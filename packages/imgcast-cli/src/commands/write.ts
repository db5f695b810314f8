/**
 * imgcast write <url> <device>
 *
 * Downloads (or reuses from cache) an image archive, extracts it and
 * writes the image to a device or file.
 */

import { Command, InvalidArgumentError } from 'commander';
import { ImageInstaller, archiveFileNameFromUrl } from '@imgcast/core';
import type {
  ImageDescriptor,
  ImageInstallerDeps,
  InstallStage,
  ProgressSample,
  StageEvent,
} from '@imgcast/core';
import { formatSize } from '../render/format.js';
import { ProgressRenderer } from '../render/progress-renderer.js';
import type { RenderTarget } from '../render/progress-renderer.js';
import { abortOnInterrupt, createRuntime } from '../runtime.js';
import type { CommonOptions, Runtime } from '../runtime.js';
import { failure, info, step, success, warn } from '../ui.js';

export const EXIT_ABORTED = 130;

export interface WriteOptions extends CommonOptions {
  sha256?: string;
  archiveSha256?: string;
  size?: number;
  quiet?: boolean;
}

export interface WriteDeps {
  runtime?: Runtime;
  signal?: AbortSignal;
  progressTarget?: RenderTarget;
  createHttpSource?: ImageInstallerDeps['createHttpSource'];
}

const STAGE_LABELS: Record<InstallStage, string> = {
  'check-image-cache': 'Checking image cache',
  'check-archive-cache': 'Checking archive cache',
  download: 'Downloading',
  extract: 'Extracting',
  write: 'Writing',
};

export function parseByteCount(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a whole number of bytes.');
  }
  return parsed;
}

/** Announce stage starts and cache hits; misses and completions stay silent. */
function announceStage(event: StageEvent): void {
  if (event.state === 'started') {
    step(`${STAGE_LABELS[event.stage]} ${event.target}`);
  } else if (event.state === 'hit') {
    info(`${STAGE_LABELS[event.stage]}: using ${event.target}`);
  }
}

/** Resolves to the process exit code */
export async function runWrite(
  url: string,
  devicePath: string,
  options: WriteOptions,
  deps: WriteDeps = {}
): Promise<number> {
  try {
    const runtime = deps.runtime ?? createRuntime(options);
    const installer = new ImageInstaller(
      runtime.config,
      runtime.logger,
      runtime.engine,
      runtime.cache,
      { createHttpSource: deps.createHttpSource }
    );

    const descriptor: ImageDescriptor = {
      name: archiveFileNameFromUrl(url),
      url,
      extractSha256: options.sha256,
      imageDownloadSha256: options.archiveSha256,
      extractSize: options.size,
    };

    if (!options.quiet) {
      const renderer = new ProgressRenderer(deps.progressTarget ?? process.stderr);
      installer.on('stage', (event: StageEvent) => {
        if (event.state === 'started' || event.state === 'hit') {
          renderer.clear();
        }
        announceStage(event);
      });
      installer.on('progress', (stage: InstallStage, sample: ProgressSample) => {
        renderer.update(STAGE_LABELS[stage], sample);
      });
    }

    const interrupt = deps.signal ? null : abortOnInterrupt();
    const outcome = await installer
      .install(descriptor, devicePath, { signal: deps.signal ?? interrupt?.signal })
      .finally(() => interrupt?.dispose());

    if (outcome.status === 'aborted') {
      warn(`Aborted during ${outcome.stage}`);
      return EXIT_ABORTED;
    }

    const origin = outcome.imageFrom === 'cache' ? 'cached image' : `archive (${outcome.archiveFrom})`;
    success(`Wrote ${formatSize(outcome.bytesWritten)} to ${outcome.devicePath} from ${origin}`);
    return 0;
  } catch (error) {
    failure(error);
    return 1;
  }
}

export function registerWriteCommand(program: Command): void {
  program
    .command('write')
    .description('Download, extract and write an OS image to a device')
    .argument('<url>', 'URL of the image archive (.zip, .xz or .gz)')
    .argument('<device>', 'target device or file')
    .option('--sha256 <digest>', 'expected SHA-256 of the extracted image')
    .option('--archive-sha256 <digest>', 'expected SHA-256 of the downloaded archive')
    .option('--size <bytes>', 'expected size of the extracted image', parseByteCount)
    .option('--cache-dir <dir>', 'cache root (default: $IMGCAST_CACHE_DIR or /var/tmp/imgcast)')
    .option('-q, --quiet', 'no progress output')
    .option('-v, --verbose', 'debug logging on stderr')
    .action(async (url: string, device: string, options: WriteOptions) => {
      const code = await runWrite(url, device, options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
