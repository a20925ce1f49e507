/**
 * Build Summary Formatters
 *
 * CLI output formatters for pipeline results:
 * - Build summary and one-line status
 * - Dry-run plan table
 * - Error summary
 * - Per-stage timing breakdown
 * - Byte sizes
 *
 * @module cli/formatters/build-summary
 */

import chalk from 'chalk';
import type { PipelineResult, StageReport } from '../../pipeline/executor.js';
import type { BuildError } from '../../schemas/build.js';
import { imageSize } from '../../image/snapshot.js';
import { formatDuration } from './progress.js';

/** Cache keys are shown by their first hex digits */
export const SHORT_KEY_LENGTH = 12;

export function shortKey(key: string): string {
  return key.replace(/^sha256:/, '').slice(0, SHORT_KEY_LENGTH);
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Format a byte count for layer, image and export listings.
 *
 * @example
 * formatFileSize(1536); // '1.50 KB'
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  const exponent = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), SIZE_UNITS.length - 1);
  const size = bytes / 1024 ** exponent;
  const digits = size >= 100 ? 0 : size >= 10 ? 1 : 2;
  return `${size.toFixed(digits)} ${SIZE_UNITS[exponent]}`;
}

// ============================================================================
// Build Summary
// ============================================================================

/**
 * Format a complete build summary.
 *
 * @example
 * ```
 * === Build Complete ===
 * Build:    20200715-101500-core
 *
 * Pipeline: SUCCESS
 * Duration: 1.2s
 * Stages:   2 executed, 3 cached
 * Image:    sha256:3f1c… (new)
 * Size:     148 MB
 * ```
 */
export function formatBuildSummary(result: PipelineResult): string {
  const lines: string[] = [];

  if (result.dryRun) {
    lines.push(chalk.bold('=== Dry Run ==='));
  } else {
    lines.push(chalk.bold(result.success ? '=== Build Complete ===' : '=== Build Failed ==='));
  }
  lines.push(`Build:    ${chalk.cyan(result.buildId)}`);
  lines.push('');

  const status = result.success ? chalk.green('SUCCESS') : chalk.red('FAILED');
  lines.push(`Pipeline: ${status}`);
  lines.push(`Duration: ${formatDuration(result.timing.durationMs)}`);

  const parts = [
    `${result.stagesExecuted.length} ${result.dryRun ? 'to execute' : 'executed'}`,
    `${result.stagesCached.length} cached`,
  ];
  if (result.stagesNotRun.length > 0) {
    parts.push(`${result.stagesNotRun.length} not run`);
  }
  lines.push(`Stages:   ${parts.join(', ')}`);

  if (result.image) {
    lines.push(`Image:    ${chalk.cyan(result.image.imageId)} (${result.imageCreated ? 'new' : 'existing'})`);
    lines.push(`Size:     ${formatFileSize(result.image.sizeBytes)}`);
  } else if (result.snapshot && result.success) {
    lines.push(`Stopped:  after ${result.finalStage}, no image written`);
    lines.push(`Size:     ${formatFileSize(imageSize(result.snapshot))}`);
  }

  if (result.error) {
    lines.push('');
    lines.push(formatErrorSummary(result.error));
  }

  return lines.join('\n');
}

/**
 * Format the error that stopped a build.
 *
 * @example
 * ```
 * ✘ 02_dependencies [manifest]
 *   No such file or directory: /src/app/requirements.txt
 * ```
 */
export function formatErrorSummary(error: BuildError): string {
  return [
    `${chalk.red('✘')} ${error.stageId || '(before stages)'} ${chalk.dim(`[${error.kind}]`)}`,
    `  ${error.message}`,
  ].join('\n');
}

/**
 * Format a compact one-line build status.
 */
export function formatQuickSummary(result: PipelineResult): string {
  const parts: string[] = [];

  if (result.success) {
    parts.push(chalk.green(result.dryRun ? '✔ Plan ready' : '✔ Build complete'));
  } else {
    parts.push(chalk.red(`✘ Build failed at ${result.error?.stageId ?? result.finalStage}`));
  }

  parts.push(chalk.dim(`(${formatDuration(result.timing.durationMs)})`));
  parts.push(
    chalk.dim(`[${result.stagesExecuted.length} executed, ${result.stagesCached.length} cached]`)
  );

  return parts.join(' ');
}

// ============================================================================
// Plan
// ============================================================================

function describeInputs(report: StageReport): string {
  return Object.entries(report.inputs)
    .map(([key, value]) => {
      if (Array.isArray(value)) return `${key}: ${value.length}`;
      if (value !== null && typeof value === 'object') return `${key}: ${Object.keys(value).length}`;
      if (typeof value === 'string' && /^[0-9a-f]{64}$/.test(value)) return `${key}: ${shortKey(value)}`;
      return `${key}: ${String(value)}`;
    })
    .join(', ');
}

/**
 * Format the stages of a (dry-run) result as a table: cache status, key and
 * a digest of the declared inputs.
 *
 * @example
 * ```
 * STAGE               STATUS   KEY           INPUTS
 * 00_base             cached   5d41402abc4b  identifier: python:3.8.3-slim-buster
 * 01_system_packages  execute  7d793037a076  packages: 6, frontend: noninteractive, ...
 * ```
 */
export function formatPlan(result: PipelineResult): string {
  const lines = [chalk.bold(`${'STAGE'.padEnd(20)}${'STATUS'.padEnd(9)}${'KEY'.padEnd(14)}INPUTS`)];

  for (const report of result.stages) {
    const status = report.cached ? 'cached' : 'execute';
    lines.push(
      `${report.stageId.padEnd(20)}${status.padEnd(9)}${shortKey(report.cacheKey).padEnd(14)}${describeInputs(report)}`
    );
  }
  for (const stageId of result.stagesNotRun) {
    lines.push(chalk.dim(`${stageId.padEnd(20)}${'skip'.padEnd(9)}`).trimEnd());
  }

  return lines.join('\n');
}

// ============================================================================
// Timing
// ============================================================================

/**
 * Format per-stage timing breakdown.
 */
export function formatTimingBreakdown(timing: { perStage: Record<string, number>; durationMs: number }): string {
  const lines: string[] = [chalk.bold('=== Timing Breakdown ==='), ''];

  const stages = Object.entries(timing.perStage).sort(([a], [b]) => a.localeCompare(b));
  const maxDuration = Math.max(...Object.values(timing.perStage), 1);
  const barWidth = 30;

  for (const [stageId, durationMs] of stages) {
    const percentage = timing.durationMs > 0 ? Math.round((durationMs / timing.durationMs) * 100) : 0;
    const bar = chalk.green('█'.repeat(Math.round((durationMs / maxDuration) * barWidth)));
    lines.push(`${stageId.padEnd(22)} ${bar} ${formatDuration(durationMs).padStart(8)} (${percentage}%)`);
  }

  lines.push('');
  lines.push(`${'Total'.padEnd(22)} ${' '.repeat(barWidth)} ${formatDuration(timing.durationMs)}`);

  return lines.join('\n');
}
