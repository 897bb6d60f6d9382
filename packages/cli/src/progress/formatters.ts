/**
 * Output formatting utilities
 */

import chalk from 'chalk';

import type { TacticForgeConfig } from '../config/schema.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: TacticForgeConfig): string {
  const { engine, analysis, thresholds, filters, solution, output } = config;
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(chalk.dim('Engine:'));
  lines.push(`  Path: ${engine.path}`);
  lines.push(`  Threads: ${engine.threads}`);
  lines.push(`  Hash: ${engine.hashMb} MB`);
  lines.push(`  Timeout: ${formatDuration(engine.timeoutMs)}`);
  lines.push('');

  lines.push(chalk.dim('Analysis:'));
  lines.push(`  Profile: ${analysis.profile}`);
  lines.push(`  Depth: ${analysis.depth}`);
  lines.push(`  Max variants: ${analysis.maxVariants}`);
  lines.push(`  Workers: ${analysis.workers}`);
  lines.push('');

  lines.push(chalk.dim('Thresholds (cp):'));
  lines.push(`  Blunder: ${thresholds.blunder}`);
  lines.push(`  Alternative: ${thresholds.alternative}`);
  lines.push(`  Unicity: ${thresholds.unicity}`);
  lines.push(`  Winning advantage: ${thresholds.winningAdvantage}`);
  lines.push(`  Drawing range: ±${thresholds.drawingRange}`);
  lines.push(`  Hanging gap: ${thresholds.hangingGap}`);
  lines.push('');

  lines.push(chalk.dim('Filters:'));
  lines.push(`  Max forced plies: ${filters.maxForcedPlies}`);
  lines.push(`  Max capture plies: ${filters.maxCapturePlies}`);
  if (filters.rejectNonInstructiveGain) {
    lines.push(`  Non-instructive gain: ${chalk.yellow(`from ${filters.nonInstructiveThreshold}`)}`);
  }
  lines.push('');

  lines.push(chalk.dim('Solution:'));
  lines.push(`  Min solver moves: ${solution.minSolverMoves}`);
  lines.push(`  Max plies: ${solution.maxPlies}`);
  lines.push('');

  lines.push(chalk.dim('Output:'));
  lines.push(`  Path: ${output.path}`);
  lines.push(`  Resume: ${output.resume ? 'yes' : chalk.yellow('no')}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  if (ms < 3600000) {
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.round((ms % 60000) / 1000);
    return `${minutes}m ${seconds}s`;
  }
  const hours = Math.floor(ms / 3600000);
  const minutes = Math.round((ms % 3600000) / 60000);
  return `${hours}h ${minutes}m`;
}

/**
 * Format a file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format estimated time remaining in human-readable format
 * @param ms - Milliseconds remaining, or null if unknown
 * @returns Formatted string like "~2m 30s" or empty string if null
 */
export function formatEta(ms: number | null): string {
  if (ms === null) {
    return '';
  }

  if (ms <= 0) {
    return 'almost done';
  }

  if (ms < 1000) {
    return 'less than a second';
  }

  if (ms < 60000) {
    return `~${Math.ceil(ms / 1000)}s`;
  }

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.ceil((ms % 60000) / 1000);

  if (seconds === 0) {
    return `~${minutes}m`;
  }

  return `~${minutes}m ${seconds}s`;
}

/**
 * Format a progress bar like "[========            ]"
 */
export function formatProgressBar(current: number, total: number, width: number = 20): string {
  if (total <= 0) {
    return `[${'?'.repeat(width)}]`;
  }

  const ratio = Math.min(current / total, 1);
  const filled = Math.round(ratio * width);

  return `[${'='.repeat(filled)}${' '.repeat(width - filled)}]`;
}

/**
 * Format a share of a total, like "42.5%"
 */
export function formatPercentage(part: number, total: number): string {
  if (total <= 0) {
    return '0.0%';
  }
  return `${((part / total) * 100).toFixed(1)}%`;
}

/**
 * Count entries sorted by count, largest first
 */
export function sortedCounts(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}
