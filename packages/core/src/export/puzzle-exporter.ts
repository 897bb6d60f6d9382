/**
 * Puzzle export to PGN
 *
 * A puzzle is written as a game starting from the pre-blunder position:
 * the blunder, the forced moves, then the solution line with each solver
 * alternative as a one-move variation.
 */

import {
  ChessPosition,
  renderPgn,
  type GameMetadata,
  type MoveInfo,
  type ParsedGame,
  type RenderOptions,
} from '@tacticforge/pgn';

import type { Puzzle, SolutionMove } from '../types/puzzle.js';

export const OBJECTIVE_HEADER = 'Objetivo';
export const PHASE_HEADER = 'Fase';

/**
 * Play a move on the position and describe it for the renderer
 */
function playMove(position: ChessPosition, uci: string): MoveInfo {
  const moveNumber = position.moveNumber();
  const isWhiteMove = position.turn() === 'w';
  const played = position.playUci(uci);
  return {
    moveNumber,
    san: played.san,
    uci: played.uci,
    isWhiteMove,
    fenBefore: played.fenBefore,
    fenAfter: played.fenAfter,
  };
}

function alternativeLine(fen: string, alternative: SolutionMove): MoveInfo[] {
  return [playMove(ChessPosition.fromFen(fen), alternative.uci)];
}

/**
 * Headers of the exported game: the source headers, then the setup and
 * classification tags
 */
export function puzzleHeaders(puzzle: Puzzle): Record<string, string> {
  return {
    ...puzzle.candidate.headers,
    SetUp: '1',
    FEN: puzzle.candidate.fenPreBlunder,
    [OBJECTIVE_HEADER]: puzzle.objective,
    [PHASE_HEADER]: puzzle.phase,
  };
}

/**
 * Build the game the puzzle is exported as
 */
export function puzzleToGame(puzzle: Puzzle): ParsedGame {
  const { candidate } = puzzle;
  const headers = puzzleHeaders(puzzle);
  const position = ChessPosition.fromFen(candidate.fenPreBlunder);

  const moves: MoveInfo[] = [playMove(position, candidate.blunderMove.uci)];
  for (const forced of candidate.forcedSequence) {
    moves.push(playMove(position, forced.uci));
  }
  for (const node of puzzle.solution) {
    const move = playMove(position, node.uci);
    if (node.alternatives.length > 0) {
      move.variations = node.alternatives.map((alt) => alternativeLine(node.fenBefore, alt));
    }
    moves.push(move);
  }

  const metadata: GameMetadata = {
    white: headers.White ?? 'Unknown',
    black: headers.Black ?? 'Unknown',
    result: headers.Result ?? '*',
  };

  return { metadata, headers, startFen: candidate.fenPreBlunder, moves };
}

/**
 * Render a puzzle as PGN text
 */
export function renderPuzzle(puzzle: Puzzle, options?: RenderOptions): string {
  return renderPgn(puzzleToGame(puzzle), options);
}
