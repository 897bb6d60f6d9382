/**
 * Blunder detection over a scanned game
 */

import { oppositeColor } from '@tacticforge/pgn';

import type { BlunderEvent, PlyTrace } from '../types/puzzle.js';

/**
 * Check one ply for an evaluation swing against the side that moved
 *
 * Both evaluations are White-perspective: a White blunder lowers the
 * score, a Black blunder raises it.
 */
export function detectBlunder(entry: PlyTrace, threshold: number): BlunderEvent | undefined {
  const { cpBefore, cpAfter } = entry;
  if (cpBefore === undefined || cpAfter === undefined) {
    return undefined;
  }

  const swing = entry.mover === 'w' ? cpBefore - cpAfter : cpAfter - cpBefore;
  if (swing < threshold) {
    return undefined;
  }

  return {
    ply: entry.ply,
    fenBefore: entry.move.fenBefore,
    fenAfter: entry.move.fenAfter,
    move: entry.move,
    cpBefore,
    cpAfter,
    solverColor: oppositeColor(entry.mover),
    moveNumber: entry.moveNumber,
  };
}

/**
 * All blunders of a game, in ply order
 */
export function findBlunders(trace: readonly PlyTrace[], threshold: number): BlunderEvent[] {
  const events: BlunderEvent[] = [];
  for (const entry of trace) {
    const event = detectBlunder(entry, threshold);
    if (event) events.push(event);
  }
  return events;
}
