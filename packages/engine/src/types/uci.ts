/**
 * UCI engine types
 */

/**
 * Score as printed by the engine, from the side to move's perspective
 */
export interface UciScore {
  type: 'cp' | 'mate';
  /** Centipawns, or moves to mate (negative = side to move is mated) */
  value: number;
}

/**
 * One principal variation from an `info` line
 */
export interface UciLine {
  /** 1-based MultiPV index */
  multipv: number;
  depth: number;
  score: UciScore;
  /** Moves in UCI notation; empty for terminal positions */
  pv: string[];
}

/**
 * Options for a single analysis request
 */
export interface AnalyseOptions {
  /** Search depth passed to `go depth` */
  depth: number;
  /** Number of principal variations (default 1) */
  multipv?: number;
}
