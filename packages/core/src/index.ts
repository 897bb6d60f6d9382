/**
 * @tacticforge/core - Puzzle extraction logic
 *
 * This package contains the extraction pipeline including:
 * - Score normalization and move-by-move game scanning
 * - Blunder detection and the candidate filter chain
 * - Solution line building with ambiguity checks
 * - Puzzle classification and PGN export
 */

export const VERSION = '0.1.0';

export * from './types/puzzle.js';

export {
  MATE_SCORE,
  normalize,
  relativeScore,
  scoreForSolver,
  scoreToWhite,
  whiteToPerspective,
} from './scoring/normalizer.js';

export {
  analyseWithRetry,
  deriveDepths,
  evaluatePosition,
  findBestMove,
  SCAN_DEPTH_MULTIPLIER,
  SOLVE_DEPTH_MULTIPLIER,
  QUICK_DEPTH_DIVISOR,
  type AnalysisContext,
  type AnalysisDepths,
  type RetryRequest,
} from './engine/analysis.js';

export { scanGame } from './detection/game-scanner.js';
export { detectBlunder, findBlunders } from './detection/blunder-detector.js';

export { createCandidate, filterCandidate, FILTER_STAGES } from './filters/candidate-filter.js';
export { isForcedPosition, skipForcedMoves, type ForcedMoveSkip } from './filters/forced-moves.js';
export { isHangingPiece } from './filters/hanging-piece.js';
export { isPureCaptureSequence } from './filters/capture-sequence.js';
export type { FilterContext, FilterStage } from './filters/types.js';

export {
  buildSolution,
  chooseSolverMove,
  type SolutionOptions,
  type SolverChoice,
} from './solution/solution-builder.js';

export {
  classifyObjective,
  classifyPhase,
  classifyPuzzle,
  OPENING_MAX_MOVE,
  ENDGAME_MIN_MOVE,
  ENDGAME_MAX_PIECES,
  type ObjectiveInput,
} from './classifier/puzzle-classifier.js';

export {
  puzzleHeaders,
  puzzleToGame,
  renderPuzzle,
  OBJECTIVE_HEADER,
  PHASE_HEADER,
} from './export/puzzle-exporter.js';

export * from './pipeline/index.js';
