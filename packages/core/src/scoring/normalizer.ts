/**
 * Score normalization
 *
 * Every comparison in the extractor happens on one signed integer scale.
 * Mate scores saturate to ±MATE_SCORE whatever the distance to mate, so the
 * blunder and ambiguity thresholds apply to them unchanged.
 */

import type { PieceColor } from '@tacticforge/pgn';

import type { EngineScore, Score } from '../types/puzzle.js';

/** Value of a forced mate on the centipawn scale */
export const MATE_SCORE = 100000;

/**
 * Attach the side to move to an engine score
 */
export function relativeScore(score: EngineScore, sideToMove: PieceColor): Score {
  return { type: score.type, value: score.value, pov: sideToMove };
}

/**
 * Convert a score to centipawns from the given side's perspective
 */
export function normalize(score: Score, perspective: PieceColor): number {
  const own =
    score.type === 'mate' ? (score.value > 0 ? MATE_SCORE : -MATE_SCORE) : Math.round(score.value);
  // 0 - own keeps a level score at +0
  return score.pov === perspective ? own : 0 - own;
}

/**
 * White-perspective centipawns for a score relative to the side to move
 */
export function scoreToWhite(score: EngineScore, sideToMove: PieceColor): number {
  return normalize(relativeScore(score, sideToMove), 'w');
}

/**
 * Re-express a White-perspective value for the given side
 */
export function whiteToPerspective(cp: number, perspective: PieceColor): number {
  return perspective === 'w' ? cp : 0 - cp;
}

/**
 * Solver-perspective centipawns for a score relative to the side to move
 */
export function scoreForSolver(
  score: EngineScore,
  sideToMove: PieceColor,
  solver: PieceColor,
): number {
  return normalize(relativeScore(score, sideToMove), solver);
}
