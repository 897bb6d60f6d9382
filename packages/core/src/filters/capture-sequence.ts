import { ChessPosition } from '@tacticforge/pgn';

import { findBestMove, type AnalysisContext } from '../engine/analysis.js';

import type { FilterStage } from './types.js';

/**
 * Whether the play after a capturing blunder is nothing but recaptures
 *
 * Follows the engine's best move for up to `maxPlies`. The first
 * non-capture ends the probe as "not pure captures"; otherwise at least
 * two analysed captures are needed.
 */
export async function isPureCaptureSequence(
  fenAfter: string,
  context: AnalysisContext,
  maxPlies: number,
): Promise<boolean> {
  const position = ChessPosition.fromFen(fenAfter);
  const request = { depth: context.depths.quick };
  let captures = 0;

  for (let ply = 0; ply < maxPlies; ply++) {
    if (position.isGameOver()) break;

    const move = await findBestMove(context, position, request);
    if (move === undefined) break;
    if (!position.isCapture(move)) {
      return false;
    }
    captures++;
    position.playUci(move);
  }

  return captures >= 2;
}

export const captureSequenceStage: FilterStage = async (candidate, context) => {
  if (candidate.blunderMove.captured === undefined) {
    return { accepted: true, candidate };
  }
  const capturesOnly = await isPureCaptureSequence(
    candidate.fenPostBlunder,
    context.analysis,
    context.config.filters.maxCapturePlies,
  );
  return capturesOnly ? { accepted: false, reason: 'capturesOnly' } : { accepted: true, candidate };
};
