/**
 * Extraction statistics, carried across resumed runs
 */

import { REJECTION_LABELS, type Puzzle, type RejectionReason } from '../types/puzzle.js';

/**
 * Plain, serializable view of the statistics
 */
export interface StatisticsSnapshot {
  totalGames: number;
  puzzlesFound: number;
  puzzlesRejected: number;
  /** Counts keyed by rejection label */
  rejectionReasons: Record<string, number>;
  objectives: Record<string, number>;
  phases: Record<string, number>;
  elapsedMs: number;
}

export function emptyStatistics(): StatisticsSnapshot {
  return {
    totalGames: 0,
    puzzlesFound: 0,
    puzzlesRejected: 0,
    rejectionReasons: {},
    objectives: {},
    phases: {},
    elapsedMs: 0,
  };
}

function increment(counts: Record<string, number>, key: string, by = 1): void {
  counts[key] = (counts[key] ?? 0) + by;
}

function addCounts(
  a: Record<string, number>,
  b: Record<string, number>,
): Record<string, number> {
  const sum = { ...a };
  for (const [key, count] of Object.entries(b)) increment(sum, key, count);
  return sum;
}

/**
 * Sum of two snapshots, e.g. the totals over several input files
 */
export function mergeStatistics(a: StatisticsSnapshot, b: StatisticsSnapshot): StatisticsSnapshot {
  return {
    totalGames: a.totalGames + b.totalGames,
    puzzlesFound: a.puzzlesFound + b.puzzlesFound,
    puzzlesRejected: a.puzzlesRejected + b.puzzlesRejected,
    rejectionReasons: addCounts(a.rejectionReasons, b.rejectionReasons),
    objectives: addCounts(a.objectives, b.objectives),
    phases: addCounts(a.phases, b.phases),
    elapsedMs: a.elapsedMs + b.elapsedMs,
  };
}

export class ExtractionStatistics {
  private readonly data: StatisticsSnapshot;

  constructor(initial: StatisticsSnapshot = emptyStatistics()) {
    this.data = {
      ...initial,
      rejectionReasons: { ...initial.rejectionReasons },
      objectives: { ...initial.objectives },
      phases: { ...initial.phases },
    };
  }

  recordGame(): void {
    this.data.totalGames++;
  }

  recordPuzzle(puzzle: Puzzle): void {
    this.data.puzzlesFound++;
    increment(this.data.objectives, puzzle.objective);
    increment(this.data.phases, puzzle.phase);
  }

  recordRejection(reason: RejectionReason): void {
    this.data.puzzlesRejected++;
    increment(this.data.rejectionReasons, REJECTION_LABELS[reason]);
  }

  addElapsed(ms: number): void {
    this.data.elapsedMs += Math.max(0, ms);
  }

  get totalGames(): number {
    return this.data.totalGames;
  }

  get puzzlesFound(): number {
    return this.data.puzzlesFound;
  }

  get puzzlesRejected(): number {
    return this.data.puzzlesRejected;
  }

  get elapsedMs(): number {
    return this.data.elapsedMs;
  }

  /**
   * Puzzles per analysed game
   */
  get extractionRate(): number {
    return this.data.totalGames === 0 ? 0 : this.data.puzzlesFound / this.data.totalGames;
  }

  get averageTimePerGame(): number {
    return this.data.totalGames === 0 ? 0 : this.data.elapsedMs / this.data.totalGames;
  }

  toSnapshot(): StatisticsSnapshot {
    return {
      ...this.data,
      rejectionReasons: { ...this.data.rejectionReasons },
      objectives: { ...this.data.objectives },
      phases: { ...this.data.phases },
    };
  }
}
