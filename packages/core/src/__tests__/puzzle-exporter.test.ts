import { ChessPosition, parsePgn } from '@tacticforge/pgn';
import { buildCandidate, playMoves } from '@tacticforge/test-utils';
import { describe, it, expect } from 'vitest';

import { puzzleHeaders, puzzleToGame, renderPuzzle } from '../export/puzzle-exporter.js';
import type { Puzzle, SolutionNode } from '../types/puzzle.js';

const PRE = '3k4/8/8/8/8/8/1R6/R5K1 b - - 0 29';
const START = playMoves(PRE, 'd8e8');

function solutionLine(fen: string, moves: Array<[string, string[]]>): SolutionNode[] {
  const position = ChessPosition.fromFen(fen);
  return moves.map(([uci, alternatives]) => {
    const color = position.turn();
    const alts = alternatives.map((alt) => ({ uci: alt, san: position.uciToSan(alt) }));
    const played = position.playUci(uci);
    return {
      uci,
      san: played.san,
      color,
      fenBefore: played.fenBefore,
      fenAfter: played.fenAfter,
      alternatives: alts,
    };
  });
}

function rookMatePuzzle(): Puzzle {
  const solution = solutionLine(START, [
    ['a1a7', ['b2b7']],
    ['e8f8', []],
    ['b2b8', []],
  ]);
  return {
    candidate: buildCandidate(PRE, 'd8e8', {
      headers: { Event: 'Club Night', White: 'Alpha', Black: 'Beta', Result: '1-0', ECO: 'A00' },
    }),
    solution,
    finalFen: solution[solution.length - 1]?.fenAfter ?? START,
    objective: 'Mate',
    phase: 'Final',
  };
}

describe('Puzzle Exporter', () => {
  it('should add the setup and classification headers after the source headers', () => {
    expect(puzzleHeaders(rookMatePuzzle())).toEqual({
      Event: 'Club Night',
      White: 'Alpha',
      Black: 'Beta',
      Result: '1-0',
      ECO: 'A00',
      SetUp: '1',
      FEN: PRE,
      Objetivo: 'Mate',
      Fase: 'Final',
    });
  });

  it('should start the move list with the blunder', () => {
    const game = puzzleToGame(rookMatePuzzle());

    expect(game.startFen).toBe(PRE);
    expect(game.moves.map((m) => m.san)).toEqual(['Ke8', 'Ra7', 'Kf8', 'Rb8#']);
    expect(game.moves[1]?.variations?.map((line) => line.map((m) => m.san))).toEqual([['Rb7']]);
    expect(game.moves[2]?.variations).toBeUndefined();
  });

  it('should place forced moves between the blunder and the solution', () => {
    const cornered = 'k7/8/1K6/8/8/8/8/6R1 w - - 0 40';
    const post = playMoves(cornered, 'g1h1');
    const forced = [ChessPosition.fromFen(post).playUci('a8b8')];
    const afterForced = playMoves(post, 'a8b8');
    const puzzle: Puzzle = {
      candidate: buildCandidate(cornered, 'g1h1', {
        adjustedFen: afterForced,
        forcedSequence: forced,
      }),
      solution: solutionLine(afterForced, [['h1h7', []]]),
      finalFen: playMoves(afterForced, 'h1h7'),
      objective: 'Defesa',
      phase: 'Final',
    };

    expect(puzzleToGame(puzzle).moves.map((m) => m.san)).toEqual(['Rh1', 'Kb8', 'Rh7']);
  });

  it('should render alternatives as variations', () => {
    const pgn = renderPuzzle(rookMatePuzzle());

    expect(pgn.split('\n')).toEqual([
      '[Event "Club Night"]',
      '[Site "?"]',
      '[Date "????.??.??"]',
      '[Round "?"]',
      '[White "Alpha"]',
      '[Black "Beta"]',
      '[Result "1-0"]',
      '[ECO "A00"]',
      '[SetUp "1"]',
      `[FEN "${PRE}"]`,
      '[Objetivo "Mate"]',
      '[Fase "Final"]',
      '',
      '29... Ke8 30. Ra7 ( 30. Rb7 ) 30... Kf8 31. Rb8# 1-0',
    ]);
  });

  it('should survive a round trip through the parser', () => {
    const [game] = parsePgn(renderPuzzle(rookMatePuzzle()));

    expect(game?.startFen).toBe(PRE);
    expect(game?.moves.map((m) => m.uci)).toEqual(['d8e8', 'a1a7', 'e8f8', 'b2b8']);
    expect(game?.headers.Objetivo).toBe('Mate');
    expect(game?.headers.Fase).toBe('Final');
  });
});
