/**
 * Puzzle Extractor
 *
 * Coordinates extraction over a set of games:
 * 1. Scan each game at scan depth
 * 2. Detect blunders
 * 3. Filter each candidate
 * 4. Build and validate the solution line
 * 5. Classify the puzzle
 *
 * Games are spread over one worker per engine. Results are handed to the
 * caller strictly in game order, so a caller persisting progress after
 * each game always describes a contiguous prefix of the input. Resume
 * state comes in and goes out as plain values; nothing here touches the
 * filesystem.
 */

import type { ParsedGame } from '@tacticforge/pgn';

import { classifyPuzzle } from '../classifier/puzzle-classifier.js';
import { findBlunders } from '../detection/blunder-detector.js';
import { scanGame } from '../detection/game-scanner.js';
import { deriveDepths, type AnalysisContext, type AnalysisDepths } from '../engine/analysis.js';
import { createCandidate, filterCandidate } from '../filters/candidate-filter.js';
import { buildSolution } from '../solution/solution-builder.js';
import type { CandidateRejection, EngineService, Puzzle } from '../types/puzzle.js';

import {
  resolveExtractionConfig,
  type ExtractionConfig,
  type ExtractionConfigInput,
} from './config.js';
import { ExtractionStatistics, type StatisticsSnapshot } from './statistics.js';

/**
 * Result of one candidate, in ply order within its game
 */
export type CandidateOutcome =
  | { kind: 'puzzle'; puzzle: Puzzle }
  | { kind: 'rejected'; rejection: CandidateRejection };

/**
 * Everything extracted from one game
 */
export interface GameExtraction {
  gameIndex: number;
  outcomes: CandidateOutcome[];
}

/**
 * Progress reported after each game is flushed
 */
export interface GameProgress {
  gameIndex: number;
  /** Games completed from the start of the input, resumed ones included */
  gamesProcessed: number;
  totalGames: number;
  puzzles: number;
  statistics: StatisticsSnapshot;
}

export interface RunOptions {
  /** Index of the first game to process */
  startIndex?: number;
  /** Statistics accumulated by earlier runs over the same input */
  statistics?: StatisticsSnapshot;
  signal?: AbortSignal;
  onGameStart?: (gameIndex: number, game: ParsedGame) => void;
  onPuzzle?: (puzzle: Puzzle) => void | Promise<void>;
  onRejection?: (rejection: CandidateRejection) => void | Promise<void>;
  onGameComplete?: (progress: GameProgress) => void | Promise<void>;
}

export interface RunResult {
  statistics: StatisticsSnapshot;
  /** Games completed from the start of the input */
  gamesProcessed: number;
  /** True when the run stopped before the last game */
  interrupted: boolean;
}

export interface PuzzleExtractorOptions {
  /** One engine per worker; an engine is never shared between workers */
  engines: readonly EngineService[];
  config?: ExtractionConfigInput;
  onEngineError?: (error: Error, fen: string, depth: number) => void;
}

export class PuzzleExtractor {
  readonly config: ExtractionConfig;
  readonly depths: AnalysisDepths;
  private readonly engines: readonly EngineService[];
  private readonly onEngineError: ((error: Error, fen: string, depth: number) => void) | undefined;

  constructor(options: PuzzleExtractorOptions) {
    if (options.engines.length === 0) {
      throw new Error('PuzzleExtractor needs at least one engine');
    }
    this.engines = options.engines;
    this.config = resolveExtractionConfig(options.config);
    this.depths = deriveDepths(this.config.depth);
    this.onEngineError = options.onEngineError;
  }

  /**
   * Extract puzzles from a single game
   *
   * @returns undefined when the signal aborted before the game finished
   */
  async extractFromGame(
    game: ParsedGame,
    gameIndex: number,
    engine: EngineService,
    signal?: AbortSignal,
  ): Promise<GameExtraction | undefined> {
    const analysis = this.createContext(engine);
    const trace = await scanGame(game, analysis, signal);
    if (signal?.aborted) return undefined;

    const outcomes: CandidateOutcome[] = [];
    for (const event of findBlunders(trace, this.config.thresholds.blunder)) {
      if (signal?.aborted) return undefined;

      const candidate = createCandidate(event, gameIndex, game.headers);
      const rejection = (reason: CandidateRejection['reason']): CandidateOutcome => ({
        kind: 'rejected',
        rejection: {
          gameIndex,
          ply: event.ply,
          move: event.move.san,
          moveNumber: event.moveNumber,
          reason,
        },
      });

      // A stage that ran into a dead engine reports a rejection it never proved
      const filtered = await filterCandidate(candidate, { analysis, config: this.config });
      if (signal?.aborted) return undefined;
      if (!filtered.accepted) {
        outcomes.push(rejection(filtered.reason));
        continue;
      }

      const solution = await buildSolution(filtered.candidate, analysis, {
        ...this.config.solution,
        thresholds: this.config.thresholds,
      });
      if (signal?.aborted) return undefined;
      if (!solution.success) {
        outcomes.push(rejection(solution.reason));
        continue;
      }

      const { objective, phase } = await classifyPuzzle(
        filtered.candidate,
        solution.finalFen,
        analysis,
        this.config.thresholds,
      );
      if (signal?.aborted) return undefined;
      const puzzle: Puzzle = Object.freeze({
        candidate: filtered.candidate,
        solution: solution.line,
        finalFen: solution.finalFen,
        objective,
        phase,
      });
      outcomes.push({ kind: 'puzzle', puzzle });
    }

    return { gameIndex, outcomes };
  }

  /**
   * Process games from `startIndex` to the end, or until aborted
   */
  async run(games: readonly ParsedGame[], options: RunOptions = {}): Promise<RunResult> {
    const { signal } = options;
    const startIndex = Math.max(0, Math.min(options.startIndex ?? 0, games.length));
    const statistics = new ExtractionStatistics(options.statistics);

    // Stops the other workers when one of them fails
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    signal?.addEventListener('abort', abort, { once: true });
    if (signal?.aborted) controller.abort();

    const completed = new Map<number, GameExtraction>();
    let nextIndex = startIndex;
    let flushIndex = startIndex;
    let lastMark = Date.now();
    let flushing: Promise<void> = Promise.resolve();

    const deliver = async (extraction: GameExtraction): Promise<void> => {
      let puzzles = 0;
      for (const outcome of extraction.outcomes) {
        if (outcome.kind === 'puzzle') {
          puzzles++;
          statistics.recordPuzzle(outcome.puzzle);
          await options.onPuzzle?.(outcome.puzzle);
        } else {
          statistics.recordRejection(outcome.rejection.reason);
          await options.onRejection?.(outcome.rejection);
        }
      }

      statistics.recordGame();
      const now = Date.now();
      statistics.addElapsed(now - lastMark);
      lastMark = now;

      await options.onGameComplete?.({
        gameIndex: extraction.gameIndex,
        gamesProcessed: extraction.gameIndex + 1,
        totalGames: games.length,
        puzzles,
        statistics: statistics.toSnapshot(),
      });
    };

    const drain = async (): Promise<void> => {
      for (let next = completed.get(flushIndex); next; next = completed.get(flushIndex)) {
        completed.delete(flushIndex);
        flushIndex++;
        await deliver(next);
      }
    };

    const worker = async (engine: EngineService): Promise<void> => {
      while (!controller.signal.aborted && nextIndex < games.length) {
        const gameIndex = nextIndex++;
        const game = games[gameIndex];
        if (!game) break;

        options.onGameStart?.(gameIndex, game);
        const extraction = await this.extractFromGame(game, gameIndex, engine, controller.signal);
        if (!extraction) break;

        completed.set(gameIndex, extraction);
        flushing = flushing.then(drain);
        await flushing;
      }
    };

    try {
      const results = await Promise.allSettled(
        this.engines.map((engine) =>
          worker(engine).catch((err: unknown) => {
            controller.abort();
            throw err;
          }),
        ),
      );
      await flushing;

      const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
      if (failure) {
        throw failure.reason;
      }
    } finally {
      signal?.removeEventListener('abort', abort);
    }

    statistics.addElapsed(Date.now() - lastMark);

    return {
      statistics: statistics.toSnapshot(),
      gamesProcessed: flushIndex,
      interrupted: flushIndex < games.length,
    };
  }

  private createContext(engine: EngineService): AnalysisContext {
    const context: AnalysisContext = { engine, depths: this.depths };
    if (this.onEngineError) context.onEngineError = this.onEngineError;
    return context;
  }
}
