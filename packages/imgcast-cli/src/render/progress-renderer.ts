/**
 * Single-line progress display, redrawn in place with carriage returns.
 */

import chalk from 'chalk';
import type { ProgressSample } from '@imgcast/core';
import { formatDuration, formatSize } from './format.js';

/** Where the renderer draws; process.stderr in the CLI */
export interface RenderTarget {
  write(text: string): boolean;
}

export interface ProgressRendererOptions {
  /** Width of the bar in cells (default: 30) */
  barWidth?: number;
}

const BAR_FILL = '█';
const BAR_EMPTY = '░';

export function renderBar(percent: number, width: number): string {
  const filled = Math.round((Math.min(100, Math.max(0, percent)) / 100) * width);
  return BAR_FILL.repeat(filled) + BAR_EMPTY.repeat(width - filled);
}

/** Plain-text progress line (no colour, no control characters) */
export function describeProgress(label: string, sample: ProgressSample, barWidth = 30): string {
  const parts = [label];

  if (sample.percent !== undefined) {
    parts.push(renderBar(sample.percent, barWidth), `${sample.percent.toFixed(1)}%`);
  }

  const total = sample.totalBytes === null ? '' : ` / ${formatSize(sample.totalBytes)}`;
  parts.push(`${formatSize(sample.bytesTransferred)}${total}`);

  if (sample.throughput !== undefined) {
    parts.push(`${formatSize(sample.throughput)}/s`);
  }

  if (sample.etaSeconds !== undefined && !sample.final) {
    parts.push(`ETA ${formatDuration(sample.etaSeconds)}`);
  } else {
    parts.push(formatDuration(sample.elapsedSeconds));
  }

  return parts.join('  ');
}

export class ProgressRenderer {
  private lastWidth = 0;
  private readonly barWidth: number;

  constructor(
    private readonly target: RenderTarget,
    options: ProgressRendererOptions = {}
  ) {
    this.barWidth = options.barWidth ?? 30;
  }

  /** Redraw the current line; the final sample clears it. */
  update(label: string, sample: ProgressSample): void {
    if (sample.final) {
      this.clear();
      return;
    }

    const line = describeProgress(label, sample, this.barWidth);
    const padding = ' '.repeat(Math.max(0, this.lastWidth - line.length));
    this.lastWidth = line.length;
    this.target.write(`\r${chalk.cyan(line)}${padding}`);
  }

  clear(): void {
    if (this.lastWidth === 0) return;
    this.target.write(`\r${' '.repeat(this.lastWidth)}\r`);
    this.lastWidth = 0;
  }
}
