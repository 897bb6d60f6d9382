/**
 * Main orchestrator that runs puzzle extraction over the input files
 *
 * Inputs are processed one after another. Puzzles are appended to the
 * output as soon as their game is flushed, and the checkpoint of the
 * current input is rewritten after every game, so an interrupted run can
 * continue from the first game it did not finish.
 */

import { appendFile, mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import {
  PuzzleExtractor,
  emptyStatistics,
  mergeStatistics,
  renderPuzzle,
  type EngineService,
  type StatisticsSnapshot,
} from '@tacticforge/core';
import { EngineClosedError } from '@tacticforge/engine';
import { PgnParseError, parsePgn, type ParsedGame } from '@tacticforge/pgn';

import { toExtractionConfig } from '../config/extraction.js';
import type { TacticForgeConfig } from '../config/schema.js';
import {
  InputError,
  OutputError,
  PgnError,
  createEngineError,
  resolveAbsolutePath,
} from '../errors/index.js';
import type { ProgressReporter } from '../progress/reporter.js';
import {
  checkpointPath,
  createCheckpoint,
  deleteCheckpoint,
  loadCheckpoint,
  saveCheckpoint,
  type Checkpoint,
} from '../resume/checkpoint.js';

/**
 * Games read from one input file
 */
export interface InputGames {
  path: string;
  sizeBytes: number;
  games: ParsedGame[];
  /** Games skipped because their moves could not be replayed */
  skipped: number;
}

/**
 * Where processing of an input starts
 */
export interface InputPlan {
  input: InputGames;
  checkpointFile: string;
  resumeFrom?: Checkpoint;
}

export interface InputResult {
  path: string;
  gamesProcessed: number;
  totalGames: number;
  statistics: StatisticsSnapshot;
  completed: boolean;
}

export interface ExtractionRunOptions {
  inputs: readonly string[];
  config: TacticForgeConfig;
  engines: readonly EngineService[];
  reporter: ProgressReporter;
  signal?: AbortSignal;
}

export interface ExtractionSummary {
  /** Totals over every input, resumed parts included */
  statistics: StatisticsSnapshot;
  interrupted: boolean;
  outputPath: string;
  /** Checkpoint of the input the run stopped in */
  checkpointFile?: string;
  inputs: InputResult[];
}

/**
 * Read and parse an input file
 */
export async function readInputGames(
  inputPath: string,
  reporter: ProgressReporter,
): Promise<InputGames> {
  const absolutePath = resolveAbsolutePath(inputPath);

  let text: string;
  let sizeBytes: number;
  try {
    sizeBytes = (await stat(absolutePath)).size;
    text = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new InputError(
      `Input file not found or unreadable: ${absolutePath}`,
      error instanceof Error ? error.message : 'Check the file path and try again',
    );
  }

  let skipped = 0;
  let games: ParsedGame[];
  try {
    games = parsePgn(text, {
      onInvalidGame: (error) => {
        skipped++;
        reporter.warn(`${inputPath}: skipping ${error.message}`);
      },
    });
  } catch (error) {
    if (error instanceof PgnParseError) {
      throw new PgnError(error.message, inputPath, error.line, error.column);
    }
    throw new PgnError(error instanceof Error ? error.message : 'Failed to parse PGN', inputPath);
  }

  return { path: inputPath, sizeBytes, games, skipped };
}

/**
 * Find the resume point of an input
 */
async function planInput(
  input: InputGames,
  config: TacticForgeConfig,
  reporter: ProgressReporter,
): Promise<InputPlan> {
  const checkpointFile = checkpointPath(config.output.path, input.path);
  if (!config.output.resume) {
    return { input, checkpointFile };
  }

  const load = await loadCheckpoint(checkpointFile, input.path);
  if (load.status === 'invalid') {
    reporter.warn(`Ignoring checkpoint ${checkpointFile}: ${load.reason}`);
    return { input, checkpointFile };
  }
  if (load.status === 'loaded') {
    if (load.checkpoint.gamesProcessed > input.games.length) {
      reporter.warn(
        `Ignoring checkpoint ${checkpointFile}: ${load.checkpoint.gamesProcessed} games ` +
          `processed but the input has ${input.games.length}`,
      );
      return { input, checkpointFile };
    }
    return { input, checkpointFile, resumeFrom: load.checkpoint };
  }
  return { input, checkpointFile };
}

/**
 * Create the output directory, truncating the file unless appending
 */
async function prepareOutput(outputPath: string, append: boolean): Promise<void> {
  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    if (!append) {
      await writeFile(outputPath, '', 'utf-8');
    }
  } catch (error) {
    throw new OutputError(
      `Failed to open output file: ${outputPath}`,
      error instanceof Error ? error.message : undefined,
    );
  }
}

async function appendPuzzle(outputPath: string, pgn: string): Promise<void> {
  try {
    await appendFile(outputPath, `${pgn}\n\n`, 'utf-8');
  } catch (error) {
    throw new OutputError(
      `Failed to write output file: ${outputPath}`,
      error instanceof Error ? error.message : undefined,
    );
  }
}

/**
 * Extract puzzles from every input into the configured output file
 *
 * The output is appended to when any input resumes from a checkpoint and
 * truncated otherwise.
 */
export async function orchestrateExtraction(
  options: ExtractionRunOptions,
): Promise<ExtractionSummary> {
  const { config, reporter, signal } = options;
  const outputPath = resolveAbsolutePath(config.output.path);

  const plans: InputPlan[] = [];
  for (const inputPath of options.inputs) {
    const input = await readInputGames(inputPath, reporter);
    plans.push(await planInput(input, config, reporter));
  }

  await prepareOutput(
    outputPath,
    plans.some((plan) => plan.resumeFrom !== undefined),
  );

  // A crashed engine fails every later request; stop instead of finding nothing
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  signal?.addEventListener('abort', abort, { once: true });
  if (signal?.aborted) controller.abort();
  let engineFailure: unknown;

  const extractor = new PuzzleExtractor({
    engines: options.engines,
    config: toExtractionConfig(config),
    onEngineError: (error, fen, depth) => {
      if (error instanceof EngineClosedError) {
        engineFailure ??= error;
        controller.abort();
        return;
      }
      if (reporter.isVerbose()) {
        reporter.warn(`Analysis failed at depth ${depth} for ${fen}: ${error.message}`);
      }
    },
  });

  const results: InputResult[] = [];
  let total = emptyStatistics();
  let checkpointFile: string | undefined;

  try {
    for (const plan of plans) {
      const { input, resumeFrom } = plan;
      const startIndex = resumeFrom?.gamesProcessed ?? 0;

      reporter.startInput({
        path: input.path,
        sizeBytes: input.sizeBytes,
        totalGames: input.games.length,
        resumedGames: startIndex,
      });

      const run = await extractor.run(input.games, {
        startIndex,
        statistics: resumeFrom?.statistics ?? emptyStatistics(),
        signal: controller.signal,
        onPuzzle: async (puzzle) => {
          await appendPuzzle(outputPath, renderPuzzle(puzzle));
          reporter.reportPuzzle(puzzle);
        },
        onRejection: (rejection) => reporter.reportRejection(rejection),
        onGameComplete: async (progress) => {
          await saveCheckpoint(
            plan.checkpointFile,
            createCheckpoint(input.path, progress.gamesProcessed, progress.statistics),
          );
          reporter.updateProgress(progress);
        },
      });

      total = mergeStatistics(total, run.statistics);
      results.push({
        path: input.path,
        gamesProcessed: run.gamesProcessed,
        totalGames: input.games.length,
        statistics: run.statistics,
        completed: !run.interrupted,
      });

      if (run.interrupted) {
        await saveCheckpoint(
          plan.checkpointFile,
          createCheckpoint(input.path, run.gamesProcessed, run.statistics),
        );
        checkpointFile = plan.checkpointFile;
        break;
      }

      await deleteCheckpoint(plan.checkpointFile);
      reporter.completeInput(input.path, run.gamesProcessed, run.statistics.puzzlesFound);
    }
  } finally {
    signal?.removeEventListener('abort', abort);
    reporter.stop();
  }

  if (engineFailure !== undefined) {
    throw createEngineError(config.engine.path, engineFailure);
  }

  const summary: ExtractionSummary = {
    statistics: total,
    interrupted: checkpointFile !== undefined,
    outputPath,
    inputs: results,
  };
  if (checkpointFile) summary.checkpointFile = checkpointFile;
  return summary;
}
