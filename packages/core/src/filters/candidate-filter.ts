/**
 * Candidate filter chain
 *
 * Stages run in a fixed order and the first rejection ends the chain:
 * 1. Non-instructive gain (optional)
 * 2. Forced-move skip, which also sets the adjusted position
 * 3. Hanging piece
 * 4. Pure capture sequence
 */

import { whiteToPerspective } from '../scoring/normalizer.js';
import type { BlunderEvent, Candidate, FilterResult } from '../types/puzzle.js';

import { captureSequenceStage } from './capture-sequence.js';
import { forcedMoveStage } from './forced-moves.js';
import { hangingPieceStage } from './hanging-piece.js';
import { nonInstructiveGainStage } from './non-instructive-gain.js';
import type { FilterContext, FilterStage } from './types.js';

export const FILTER_STAGES: readonly FilterStage[] = [
  nonInstructiveGainStage,
  forcedMoveStage,
  hangingPieceStage,
  captureSequenceStage,
];

/**
 * Raw candidate for a blunder, before any filtering
 */
export function createCandidate(
  event: BlunderEvent,
  gameIndex: number,
  headers: Readonly<Record<string, string>>,
): Candidate {
  return {
    gameIndex,
    ply: event.ply,
    fenPreBlunder: event.fenBefore,
    fenPostBlunder: event.fenAfter,
    adjustedFen: event.fenAfter,
    blunderMove: event.move,
    forcedSequence: [],
    solverColor: event.solverColor,
    preBlunderScore: whiteToPerspective(event.cpBefore, event.solverColor),
    postBlunderScore: whiteToPerspective(event.cpAfter, event.solverColor),
    moveNumber: event.moveNumber,
    headers,
  };
}

/**
 * Run a candidate through the filter stages
 */
export async function filterCandidate(
  candidate: Candidate,
  context: FilterContext,
  stages: readonly FilterStage[] = FILTER_STAGES,
): Promise<FilterResult> {
  let result: FilterResult = { accepted: true, candidate };
  for (const stage of stages) {
    if (!result.accepted) break;
    result = await stage(result.candidate, context);
  }
  return result;
}
