import { ChessPosition, oppositeColor, type MoveResult } from '@tacticforge/pgn';

import { analyseWithRetry, type AnalysisContext } from '../engine/analysis.js';
import { scoreForSolver } from '../scoring/normalizer.js';

import type { FilterStage } from './types.js';

/**
 * Whether the blunder simply left a piece en prise
 *
 * The piece on the blunder's destination square must be attacked by the
 * side to move and defended by fewer pieces than attack it. The engine
 * then decides: taking the piece must be the best move and beat the
 * second best by more than `gap`. An engine failure means not hanging.
 */
export async function isHangingPiece(
  fenAfter: string,
  blunder: MoveResult,
  context: AnalysisContext,
  gap: number,
): Promise<boolean> {
  const position = ChessPosition.fromFen(fenAfter);
  const sideToMove = position.turn();
  if (!position.getPiece(blunder.to)) {
    return false;
  }

  const attackers = position.getAttackers(blunder.to, sideToMove).length;
  const defenders = position.getAttackers(blunder.to, oppositeColor(sideToMove)).length;
  if (attackers === 0 || defenders >= attackers) {
    return false;
  }

  const lines = await analyseWithRetry(context, fenAfter, {
    depth: context.depths.quick,
    multipv: 2,
  });
  const [best, second] = lines ?? [];
  if (!best || best.pv[0]?.slice(2, 4) !== blunder.to) {
    return false;
  }
  if (!second) {
    return true;
  }

  const bestScore = scoreForSolver(best.score, sideToMove, sideToMove);
  const secondScore = scoreForSolver(second.score, sideToMove, sideToMove);
  return bestScore - secondScore > gap;
}

export const hangingPieceStage: FilterStage = async (candidate, context) => {
  const hanging = await isHangingPiece(
    candidate.fenPostBlunder,
    candidate.blunderMove,
    context.analysis,
    context.config.thresholds.hangingGap,
  );
  return hanging ? { accepted: false, reason: 'hangingPiece' } : { accepted: true, candidate };
};
