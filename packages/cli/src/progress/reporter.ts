/**
 * Progress reporter with ora spinners
 */

import {
  ExtractionStatistics,
  REJECTION_LABELS,
  type CandidateRejection,
  type GameProgress,
  type Puzzle,
  type StatisticsSnapshot,
} from '@tacticforge/core';
import chalk from 'chalk';
import ora, { type Ora, type Color } from 'ora';

import {
  formatDuration,
  formatEta,
  formatFileSize,
  formatPercentage,
  formatProgressBar,
  sortedCounts,
} from './formatters.js';
import { TimeEstimator } from './time-estimator.js';
import type { ColorFunctions, InputSummary, ProgressReporterOptions } from './types.js';

export type { ProgressReporterOptions, InputSummary } from './types.js';

// Helper function for colorized output
function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

function moveLabel(gameIndex: number, moveNumber: number, san: string): string {
  return `Game ${gameIndex + 1}, move ${moveNumber} ${san}`;
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verbose: boolean;
  private readonly useSpinner: boolean;
  private readonly write: (line: string) => void;
  private readonly timeEstimator = new TimeEstimator();
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;
    this.useSpinner = options.spinner ?? true;
    this.write = options.write ?? ((line: string) => console.log(line));
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    this.print(this.c.bold(`tacticforge v${version}`));
    this.print('');
  }

  /**
   * Announce an input file
   */
  startInput(input: InputSummary): void {
    this.timeEstimator.reset();

    this.print(this.c.bold(`Input: ${input.path}`));
    this.print(`  Size: ${formatFileSize(input.sizeBytes)}`);
    this.print(`  Games: ${input.totalGames}`);
    if (input.resumedGames > 0) {
      this.print(
        this.c.yellow(`  Resuming after game ${input.resumedGames} of ${input.totalGames}`),
      );
    }

    if (this.silent || !this.useSpinner) return;
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: 'Analysing games...',
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update the spinner after a completed game
   */
  updateProgress(progress: GameProgress): void {
    this.timeEstimator.record(progress.gamesProcessed);
    if (this.silent || !this.spinner) return;

    const { gamesProcessed, totalGames, statistics } = progress;
    const etaMs = this.timeEstimator.estimateRemaining(gamesProcessed, totalGames);
    const etaStr = etaMs !== null ? this.c.dim(` (${formatEta(etaMs)} remaining)`) : '';

    this.spinner.text =
      `Game ${gamesProcessed}/${totalGames} ${formatProgressBar(gamesProcessed, totalGames)} ` +
      `${statistics.puzzlesFound} puzzle(s)${etaStr}`;
  }

  /**
   * Report an accepted puzzle (verbose mode only)
   */
  reportPuzzle(puzzle: Puzzle): void {
    if (!this.verbose) return;
    const { candidate } = puzzle;
    const move = moveLabel(candidate.gameIndex, candidate.moveNumber, candidate.blunderMove.san);
    this.printSafe(
      this.c.green(`  ✓ ${move}: `) +
        `${puzzle.objective}, ${puzzle.phase}, ${puzzle.solution.length} plies`,
    );
  }

  /**
   * Report a rejected candidate (verbose mode only)
   */
  reportRejection(rejection: CandidateRejection): void {
    if (!this.verbose) return;
    const move = moveLabel(rejection.gameIndex, rejection.moveNumber, rejection.move);
    this.printSafe(this.c.dim(`  ✗ ${move}: ${REJECTION_LABELS[rejection.reason]}`));
  }

  /**
   * Finish an input file
   */
  completeInput(path: string, gamesProcessed: number, puzzles: number): void {
    const detail = `${path}: ${gamesProcessed} game(s), ${puzzles} puzzle(s)`;
    if (this.spinner) {
      this.spinner.succeed(detail);
      this.spinner = null;
    } else {
      this.print(`  ${this.c.green('✓')} ${detail}`);
    }
  }

  /**
   * Print the final statistics panel
   */
  printSummary(statistics: StatisticsSnapshot, outputPath: string): void {
    this.print('');
    this.print(this.c.bold('Summary:'));
    this.printStatistics(statistics);
    this.print('');
    this.print(`Puzzles written to: ${this.c.cyan(outputPath)}`);
  }

  /**
   * Print the summary of a run stopped before the end
   */
  printInterrupted(statistics: StatisticsSnapshot, checkpointPath: string | undefined): void {
    this.stop();
    this.print('');
    this.print(this.c.yellow(this.c.bold('Interrupted.')));
    this.printStatistics(statistics);
    this.print('');
    if (checkpointPath) {
      this.print(`Progress saved to: ${this.c.cyan(checkpointPath)}`);
      this.print(this.c.dim('Run the same command again to resume.'));
    }
  }

  private printStatistics(statistics: StatisticsSnapshot): void {
    const totals = new ExtractionStatistics(statistics);
    const { totalGames, puzzlesFound, puzzlesRejected, elapsedMs } = totals;

    this.print(`  Games analysed: ${totalGames}`);
    this.print(`  Puzzles found: ${this.c.green(String(puzzlesFound))}`);
    this.print(`  Candidates rejected: ${puzzlesRejected}`);
    this.print(`  Total time: ${formatDuration(elapsedMs)}`);
    this.print(`  Average per game: ${formatDuration(totals.averageTimePerGame)}`);
    this.print(`  Extraction rate: ${totals.extractionRate.toFixed(2)} puzzles/game`);

    this.printBreakdown('Rejections', statistics.rejectionReasons, puzzlesRejected);
    this.printBreakdown('Objectives', statistics.objectives, puzzlesFound);
    this.printBreakdown('Phases', statistics.phases, puzzlesFound);
  }

  private printBreakdown(title: string, counts: Record<string, number>, total: number): void {
    const entries = sortedCounts(counts);
    if (entries.length === 0) return;

    this.print('');
    this.print(this.c.dim(`${title}:`));
    for (const [label, count] of entries) {
      this.print(`  ${label}: ${count} (${formatPercentage(count, total)})`);
    }
  }

  /**
   * Print a message (respects color and silent settings)
   */
  printMessage(message: string): void {
    this.print(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    this.print(this.c.green(`✓ ${message}`));
  }

  /**
   * Print a warning message, pausing the spinner if one is running
   */
  warn(message: string): void {
    this.printSafe(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Print an error message
   */
  printError(message: string): void {
    this.print(this.c.red(`✗ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  hasColors(): boolean {
    return this.useColor;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  private print(line: string): void {
    if (this.silent) return;
    this.write(line);
  }

  // Keeps lines from interleaving with the spinner frame
  private printSafe(line: string): void {
    if (this.silent) return;

    if (this.spinner) {
      const currentText = this.spinner.text;
      this.spinner.stop();
      this.write(line);
      this.spinner.start(currentText);
    } else {
      this.write(line);
    }
  }
}
