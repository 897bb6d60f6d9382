/**
 * Forced-move skip
 *
 * The puzzle starts at the first position where the solver has a real
 * choice. Opponent moves and solver moves without alternatives before it
 * are played silently and kept as the forced sequence.
 */

import { ChessPosition, type MoveResult, type PieceColor } from '@tacticforge/pgn';

import { findBestMove, type AnalysisContext } from '../engine/analysis.js';

import type { FilterStage } from './types.js';

export type ForcedMoveSkip =
  | { found: true; adjustedFen: string; forcedSequence: MoveResult[] }
  | { found: false };

/**
 * A solver position is forced with a single legal move, or in check with
 * at most two
 */
export function isForcedPosition(position: ChessPosition): boolean {
  const legal = position.legalMoves().length;
  return legal === 1 || (position.isCheck() && legal <= 2);
}

/**
 * Walk from the post-blunder position to the first unforced solver position
 *
 * @returns found: false when no such position exists within maxPlies
 */
export async function skipForcedMoves(
  fen: string,
  solver: PieceColor,
  context: AnalysisContext,
  maxPlies: number,
): Promise<ForcedMoveSkip> {
  const position = ChessPosition.fromFen(fen);
  const request = { depth: context.depths.quick };
  const forcedSequence: MoveResult[] = [];

  for (let ply = 0; ply < maxPlies; ply++) {
    if (position.isGameOver()) break;

    let move: string | undefined;
    if (position.turn() !== solver) {
      move = await findBestMove(context, position, request);
    } else {
      if (!isForcedPosition(position)) {
        return { found: true, adjustedFen: position.fen(), forcedSequence };
      }
      const legal = position.legalMoves();
      move = legal.length === 1 ? legal[0] : await findBestMove(context, position, request);
    }

    if (move === undefined) break;
    forcedSequence.push(position.playUci(move));
  }

  return { found: false };
}

export const forcedMoveStage: FilterStage = async (candidate, context) => {
  const skip = await skipForcedMoves(
    candidate.fenPostBlunder,
    candidate.solverColor,
    context.analysis,
    context.config.filters.maxForcedPlies,
  );
  if (!skip.found) {
    return { accepted: false, reason: 'forcedSequence' };
  }
  return {
    accepted: true,
    candidate: {
      ...candidate,
      adjustedFen: skip.adjustedFen,
      forcedSequence: skip.forcedSequence,
    },
  };
};
