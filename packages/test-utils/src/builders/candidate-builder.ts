/**
 * Candidate test data
 */

import type { Candidate } from '@tacticforge/core';
import { ChessPosition, oppositeColor } from '@tacticforge/pgn';

/**
 * Candidate for a blunder played from `fenPreBlunder`, before filtering
 *
 * Scores default to a level position that the blunder turned into a
 * clear advantage for the solver.
 */
export function buildCandidate(
  fenPreBlunder: string,
  blunderUci: string,
  overrides: Partial<Candidate> = {},
): Candidate {
  const position = ChessPosition.fromFen(fenPreBlunder);
  const mover = position.turn();
  const moveNumber = position.moveNumber();
  const move = position.playUci(blunderUci);

  return {
    gameIndex: 0,
    ply: 0,
    fenPreBlunder: move.fenBefore,
    fenPostBlunder: move.fenAfter,
    adjustedFen: move.fenAfter,
    blunderMove: move,
    forcedSequence: [],
    solverColor: oppositeColor(mover),
    preBlunderScore: 0,
    postBlunderScore: 500,
    moveNumber,
    headers: { Event: 'Test Game', White: 'Player1', Black: 'Player2', Result: '*' },
    ...overrides,
  };
}
