/**
 * Puzzle classification
 *
 * Objective comes from the final position of the solution line, phase
 * from the position before the blunder.
 */

import { ChessPosition } from '@tacticforge/pgn';

import { evaluatePosition, type AnalysisContext } from '../engine/analysis.js';
import type { PuzzleThresholds } from '../pipeline/config.js';
import { normalize } from '../scoring/normalizer.js';
import type { Candidate, GamePhase, PuzzleObjective } from '../types/puzzle.js';

/** Full-move number up to which a position is in the opening */
export const OPENING_MAX_MOVE = 10;
/** Full-move number from which a position is in the endgame */
export const ENDGAME_MIN_MOVE = 30;
/** Non-king piece count at or below which a position is in the endgame */
export const ENDGAME_MAX_PIECES = 10;

export interface ObjectiveInput {
  checkmate: boolean;
  /** Solver-perspective evaluation of the final position, if available */
  finalScore?: number;
  /** Solver-perspective evaluation before the blunder */
  preBlunderScore: number;
}

export function classifyObjective(
  input: ObjectiveInput,
  thresholds: Pick<PuzzleThresholds, 'winningAdvantage' | 'drawingRange'>,
): PuzzleObjective {
  if (input.checkmate) {
    return 'Mate';
  }
  const { finalScore } = input;
  if (finalScore === undefined) {
    return 'Defesa';
  }

  const wasLosing = input.preBlunderScore < 0;
  if (finalScore >= thresholds.winningAdvantage) {
    return wasLosing ? 'Reversão' : 'Blunder';
  }
  if (Math.abs(finalScore) < thresholds.drawingRange) {
    return wasLosing ? 'Equalização' : 'Defesa';
  }
  return 'Defesa';
}

export function classifyPhase(fen: string): GamePhase {
  const position = ChessPosition.fromFen(fen);
  const moveNumber = position.moveNumber();

  if (moveNumber <= OPENING_MAX_MOVE) {
    return 'Abertura';
  }
  if (moveNumber >= ENDGAME_MIN_MOVE || position.nonKingPieceCount() <= ENDGAME_MAX_PIECES) {
    return 'Final';
  }
  return 'Meio-jogo';
}

/**
 * Objective and phase of a solved candidate
 *
 * Makes one quick-depth engine call unless the line ends in mate.
 */
export async function classifyPuzzle(
  candidate: Candidate,
  finalFen: string,
  context: AnalysisContext,
  thresholds: Pick<PuzzleThresholds, 'winningAdvantage' | 'drawingRange'>,
): Promise<{ objective: PuzzleObjective; phase: GamePhase }> {
  const phase = classifyPhase(candidate.fenPreBlunder);
  const checkmate = ChessPosition.fromFen(finalFen).isCheckmate();

  const input: ObjectiveInput = { checkmate, preBlunderScore: candidate.preBlunderScore };
  if (!checkmate) {
    const score = await evaluatePosition(context, finalFen, { depth: context.depths.quick });
    if (score) input.finalScore = normalize(score, candidate.solverColor);
  }

  return { objective: classifyObjective(input, thresholds), phase };
}
