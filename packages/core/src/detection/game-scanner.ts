/**
 * Move-by-move evaluation of a game's main line
 */

import { ChessPosition, type ParsedGame } from '@tacticforge/pgn';

import { evaluatePosition, type AnalysisContext } from '../engine/analysis.js';
import { normalize } from '../scoring/normalizer.js';
import type { PlyTrace } from '../types/puzzle.js';

/**
 * Evaluate every position of the game at scan depth
 *
 * Plies are evaluated strictly in order: the score before a ply is the
 * score after the previous one. Scanning stops early, returning the plies
 * evaluated so far, when the signal is aborted.
 */
export async function scanGame(
  game: ParsedGame,
  context: AnalysisContext,
  signal?: AbortSignal,
): Promise<PlyTrace[]> {
  const request = { depth: context.depths.scan };
  const position = ChessPosition.fromFen(game.startFen);
  const trace: PlyTrace[] = [];

  const first = await evaluatePosition(context, position.fen(), request);
  let cpBefore = first ? normalize(first, 'w') : undefined;

  for (const [ply, info] of game.moves.entries()) {
    if (signal?.aborted) break;

    const mover = position.turn();
    const moveNumber = position.moveNumber();
    const move = position.playUci(info.uci);

    const after = await evaluatePosition(context, move.fenAfter, request);
    const cpAfter = after ? normalize(after, 'w') : undefined;

    const entry: PlyTrace = { ply, move, mover, moveNumber };
    if (cpBefore !== undefined) entry.cpBefore = cpBefore;
    if (cpAfter !== undefined) entry.cpAfter = cpAfter;
    trace.push(entry);

    cpBefore = cpAfter;
  }

  return trace;
}
