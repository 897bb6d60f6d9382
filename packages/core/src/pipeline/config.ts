/**
 * Extraction configuration
 *
 * All thresholds are in centipawns from the solver's perspective unless
 * noted otherwise.
 */

/**
 * Evaluation thresholds used across detection, filtering and classification
 */
export interface PuzzleThresholds {
  /** Minimum evaluation swing against the mover to count as a blunder */
  blunder: number;
  /** Moves within this distance of the best move are equivalent */
  alternative: number;
  /** Required lead of the equivalent moves over the next best move */
  unicity: number;
  /** Final score at or above which the solver is considered winning */
  winningAdvantage: number;
  /** Final scores strictly inside ±drawingRange count as level */
  drawingRange: number;
  /** Gap between capturing a loose piece and the second best move */
  hangingGap: number;
  /** Pre-blunder advantage at which a gain is not instructive */
  nonInstructiveGain: number;
}

export interface FilterConfig {
  /** Plies the forced-move skip may consume */
  maxForcedPlies: number;
  /** Plies the capture probe may look ahead */
  maxCapturePlies: number;
  rejectNonInstructiveGain: boolean;
}

export interface SolutionConfig {
  /** Alternatives allowed beside the main move at a solver ply */
  maxVariants: number;
  /** Minimum number of solver moves in an accepted line */
  minSolverMoves: number;
  /** Maximum plies in a solution line */
  maxPlies: number;
}

/**
 * Configuration for a puzzle extraction run
 */
export interface ExtractionConfig {
  /** Base search depth; scan, solve and quick depths derive from it */
  depth: number;
  thresholds: PuzzleThresholds;
  filters: FilterConfig;
  solution: SolutionConfig;
}

export const DEFAULT_THRESHOLDS: PuzzleThresholds = {
  blunder: 150,
  alternative: 25,
  unicity: 150,
  winningAdvantage: 150,
  drawingRange: 100,
  hangingGap: 400,
  nonInstructiveGain: 300,
};

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  depth: 12,
  thresholds: DEFAULT_THRESHOLDS,
  filters: {
    maxForcedPlies: 5,
    maxCapturePlies: 5,
    rejectNonInstructiveGain: false,
  },
  solution: {
    maxVariants: 2,
    minSolverMoves: 2,
    maxPlies: 10,
  },
};

/**
 * Configuration with every section optional
 */
export interface ExtractionConfigInput {
  depth?: number;
  thresholds?: Partial<PuzzleThresholds>;
  filters?: Partial<FilterConfig>;
  solution?: Partial<SolutionConfig>;
}

/**
 * Fill the missing parts of a configuration from the defaults
 */
export function resolveExtractionConfig(config: ExtractionConfigInput = {}): ExtractionConfig {
  return {
    depth: config.depth ?? DEFAULT_EXTRACTION_CONFIG.depth,
    thresholds: { ...DEFAULT_THRESHOLDS, ...config.thresholds },
    filters: { ...DEFAULT_EXTRACTION_CONFIG.filters, ...config.filters },
    solution: { ...DEFAULT_EXTRACTION_CONFIG.solution, ...config.solution },
  };
}
