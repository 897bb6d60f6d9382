import { ChessPosition } from '@tacticforge/pgn';
import { buildCandidate, createMockEngine, playMoves, type MockEngine } from '@tacticforge/test-utils';
import { describe, it, expect } from 'vitest';

import { deriveDepths, type AnalysisContext } from '../engine/analysis.js';
import { isPureCaptureSequence } from '../filters/capture-sequence.js';
import { createCandidate, filterCandidate } from '../filters/candidate-filter.js';
import { isForcedPosition, skipForcedMoves } from '../filters/forced-moves.js';
import { isHangingPiece } from '../filters/hanging-piece.js';
import type { FilterContext } from '../filters/types.js';
import { resolveExtractionConfig } from '../pipeline/config.js';
import type { BlunderEvent } from '../types/puzzle.js';

// White's queen steps onto a square the c6 pawn attacks
const LOOSE_QUEEN_PRE = '4k3/8/2p5/8/8/8/8/3QK3 w - - 0 20';
const LOOSE_QUEEN_POST = playMoves(LOOSE_QUEEN_PRE, 'd1d5');

// White captures on d5 and the pieces come off
const EXCHANGE_PRE = '4k3/8/2p5/3p4/8/3Q4/8/3RK3 w - - 0 20';
const EXCHANGE_POST = playMoves(EXCHANGE_PRE, 'd3d5');

// Black's king is left with a single legal move
const CORNERED_PRE = 'k7/8/1K6/8/8/8/8/6R1 w - - 0 40';
const CORNERED_POST = playMoves(CORNERED_PRE, 'g1h1');

function analysisFor(engine: MockEngine): AnalysisContext {
  return { engine, depths: deriveDepths(12) };
}

function filterContextFor(
  engine: MockEngine,
  filters: Partial<FilterContext['config']['filters']> = {},
): FilterContext {
  return { analysis: analysisFor(engine), config: resolveExtractionConfig({ filters }) };
}

function blunderMove(fen: string, uci: string) {
  return ChessPosition.fromFen(fen).playUci(uci);
}

describe('Candidate Filter Chain', () => {
  describe('createCandidate', () => {
    it('should express the scores for the solver', () => {
      const move = blunderMove(LOOSE_QUEEN_PRE, 'd1d5');
      const event: BlunderEvent = {
        ply: 38,
        fenBefore: move.fenBefore,
        fenAfter: move.fenAfter,
        move,
        cpBefore: 50,
        cpAfter: -800,
        solverColor: 'b',
        moveNumber: 20,
      };

      const candidate = createCandidate(event, 3, { White: 'Player1' });

      expect(candidate.preBlunderScore).toBe(-50);
      expect(candidate.postBlunderScore).toBe(800);
      expect(candidate.adjustedFen).toBe(LOOSE_QUEEN_POST);
      expect(candidate.forcedSequence).toEqual([]);
      expect(candidate.gameIndex).toBe(3);
      expect(candidate.headers).toEqual({ White: 'Player1' });
    });
  });

  describe('forced-move skip', () => {
    it('should recognise single-move and check-evasion positions', () => {
      expect(isForcedPosition(ChessPosition.fromFen(CORNERED_POST))).toBe(true);
      expect(isForcedPosition(ChessPosition.fromFen(LOOSE_QUEEN_POST))).toBe(false);
    });

    it('should keep the post-blunder position when the solver has a choice', async () => {
      const engine = createMockEngine();

      const skip = await skipForcedMoves(LOOSE_QUEEN_POST, 'b', analysisFor(engine), 5);

      expect(skip).toEqual({ found: true, adjustedFen: LOOSE_QUEEN_POST, forcedSequence: [] });
      expect(engine.analyse).not.toHaveBeenCalled();
    });

    it('should play forced moves and engine replies up to the first real choice', async () => {
      const afterKb8 = playMoves(CORNERED_POST, 'a8b8');
      const engine = createMockEngine({ positions: { [afterKb8]: [{ pv: ['h1h2'], cp: 0 }] } });

      const skip = await skipForcedMoves(CORNERED_POST, 'b', analysisFor(engine), 5);

      expect(skip.found).toBe(true);
      if (!skip.found) return;
      expect(skip.forcedSequence.map((m) => m.san)).toEqual(['Kb8', 'Rh2']);
      expect(skip.adjustedFen).toBe(playMoves(afterKb8, 'h1h2'));
      expect(engine.requestsFor(afterKb8)).toEqual([{ depth: 3, multipv: 1 }]);
      expect(engine.requestsFor(CORNERED_POST)).toEqual([]);
    });

    it('should give up when the opponent reply is unavailable', async () => {
      const skip = await skipForcedMoves(CORNERED_POST, 'b', analysisFor(createMockEngine()), 5);
      expect(skip).toEqual({ found: false });
    });

    it('should give up after the ply limit', async () => {
      const afterKb8 = playMoves(CORNERED_POST, 'a8b8');
      const engine = createMockEngine({ positions: { [afterKb8]: [{ pv: ['h1h2'], cp: 0 }] } });

      const skip = await skipForcedMoves(CORNERED_POST, 'b', analysisFor(engine), 1);

      expect(skip).toEqual({ found: false });
    });

    it('should give up when the game ends', async () => {
      const afterKb8 = playMoves(CORNERED_POST, 'a8b8');
      const engine = createMockEngine({ positions: { [afterKb8]: [{ pv: ['h1h8'], mate: 1 }] } });

      const skip = await skipForcedMoves(CORNERED_POST, 'b', analysisFor(engine), 5);

      expect(skip).toEqual({ found: false });
    });
  });

  describe('hanging piece', () => {
    const queenMove = blunderMove(LOOSE_QUEEN_PRE, 'd1d5');

    it('should flag a piece whose capture is far better than anything else', async () => {
      const engine = createMockEngine({
        positions: {
          [LOOSE_QUEEN_POST]: [
            { pv: ['c6d5'], cp: 850 },
            { pv: ['e8f8'], cp: 0 },
          ],
        },
      });

      expect(await isHangingPiece(LOOSE_QUEEN_POST, queenMove, analysisFor(engine), 400)).toBe(true);
      expect(engine.requestsFor(LOOSE_QUEEN_POST)).toEqual([{ depth: 3, multipv: 2 }]);
    });

    it('should not flag a capture that leaves a close second best', async () => {
      const engine = createMockEngine({
        positions: {
          [LOOSE_QUEEN_POST]: [
            { pv: ['c6d5'], cp: 850 },
            { pv: ['e8f8'], cp: 450 },
          ],
        },
      });

      expect(await isHangingPiece(LOOSE_QUEEN_POST, queenMove, analysisFor(engine), 400)).toBe(false);
    });

    it('should require the gap to exceed the threshold strictly', async () => {
      const engine = createMockEngine({
        positions: {
          [LOOSE_QUEEN_POST]: [
            { pv: ['c6d5'], cp: 800 },
            { pv: ['e8f8'], cp: 400 },
          ],
        },
      });

      expect(await isHangingPiece(LOOSE_QUEEN_POST, queenMove, analysisFor(engine), 400)).toBe(false);
    });

    it('should flag the capture when it is the only line', async () => {
      const engine = createMockEngine({
        positions: { [LOOSE_QUEEN_POST]: [{ pv: ['c6d5'], cp: 850 }] },
      });

      expect(await isHangingPiece(LOOSE_QUEEN_POST, queenMove, analysisFor(engine), 400)).toBe(true);
    });

    it('should not flag when the best move is elsewhere', async () => {
      const engine = createMockEngine({
        positions: {
          [LOOSE_QUEEN_POST]: [
            { pv: ['e8f8'], cp: 900 },
            { pv: ['c6d5'], cp: 0 },
          ],
        },
      });

      expect(await isHangingPiece(LOOSE_QUEEN_POST, queenMove, analysisFor(engine), 400)).toBe(false);
    });

    it('should not flag when analysis is unavailable', async () => {
      expect(
        await isHangingPiece(LOOSE_QUEEN_POST, queenMove, analysisFor(createMockEngine()), 400),
      ).toBe(false);
    });

    it('should not consult the engine for a defended piece', async () => {
      const pre = '4k3/8/2p5/8/8/8/3Q4/3RK3 w - - 0 20';
      const move = blunderMove(pre, 'd2d5');
      const engine = createMockEngine();

      expect(await isHangingPiece(move.fenAfter, move, analysisFor(engine), 400)).toBe(false);
      expect(engine.analyse).not.toHaveBeenCalled();
    });
  });

  describe('capture sequence', () => {
    const afterRecapture = playMoves(EXCHANGE_POST, 'c6d5');

    it('should flag a run of best-move captures', async () => {
      const engine = createMockEngine({
        positions: {
          [EXCHANGE_POST]: [{ pv: ['c6d5'], cp: 300 }],
          [afterRecapture]: [{ pv: ['d1d5'], cp: 500 }],
        },
      });

      expect(await isPureCaptureSequence(EXCHANGE_POST, analysisFor(engine), 5)).toBe(true);
    });

    it('should stop at the first quiet best move', async () => {
      const engine = createMockEngine({
        positions: {
          [EXCHANGE_POST]: [{ pv: ['c6d5'], cp: 300 }],
          [afterRecapture]: [{ pv: ['e1e2'], cp: 0 }],
        },
      });

      expect(await isPureCaptureSequence(EXCHANGE_POST, analysisFor(engine), 5)).toBe(false);
    });

    it('should need at least two captures', async () => {
      const engine = createMockEngine({
        positions: { [EXCHANGE_POST]: [{ pv: ['c6d5'], cp: 300 }] },
      });

      expect(await isPureCaptureSequence(EXCHANGE_POST, analysisFor(engine), 5)).toBe(false);
    });

    it('should respect the ply limit', async () => {
      const engine = createMockEngine({
        positions: {
          [EXCHANGE_POST]: [{ pv: ['c6d5'], cp: 300 }],
          [afterRecapture]: [{ pv: ['d1d5'], cp: 500 }],
        },
      });

      expect(await isPureCaptureSequence(EXCHANGE_POST, analysisFor(engine), 1)).toBe(false);
      expect(engine.requestsFor(afterRecapture)).toEqual([]);
    });
  });

  describe('filterCandidate', () => {
    it('should reject a fully forced continuation', async () => {
      const candidate = buildCandidate(CORNERED_PRE, 'g1h1');

      const result = await filterCandidate(candidate, filterContextFor(createMockEngine()));

      expect(result).toEqual({ accepted: false, reason: 'forcedSequence' });
    });

    it('should reject a hanging piece', async () => {
      const engine = createMockEngine({
        positions: {
          [LOOSE_QUEEN_POST]: [
            { pv: ['c6d5'], cp: 850 },
            { pv: ['e8f8'], cp: 0 },
          ],
        },
      });

      const result = await filterCandidate(
        buildCandidate(LOOSE_QUEEN_PRE, 'd1d5'),
        filterContextFor(engine),
      );

      expect(result).toEqual({ accepted: false, reason: 'hangingPiece' });
    });

    it('should reject a capturing blunder followed only by captures', async () => {
      const engine = createMockEngine({
        positions: {
          [EXCHANGE_POST]: [{ pv: ['c6d5'], cp: 300 }],
          [playMoves(EXCHANGE_POST, 'c6d5')]: [{ pv: ['d1d5'], cp: 500 }],
        },
      });

      const result = await filterCandidate(
        buildCandidate(EXCHANGE_PRE, 'd3d5'),
        filterContextFor(engine),
      );

      expect(result).toEqual({ accepted: false, reason: 'capturesOnly' });
    });

    it('should accept a candidate passing every stage', async () => {
      const engine = createMockEngine({
        positions: {
          [LOOSE_QUEEN_POST]: [
            { pv: ['c6d5'], cp: 850 },
            { pv: ['e8f8'], cp: 700 },
          ],
        },
      });
      const candidate = buildCandidate(LOOSE_QUEEN_PRE, 'd1d5');

      const result = await filterCandidate(candidate, filterContextFor(engine));

      expect(result).toEqual({ accepted: true, candidate });
    });

    it('should carry the adjusted position out of the forced-move skip', async () => {
      const afterKb8 = playMoves(CORNERED_POST, 'a8b8');
      const engine = createMockEngine({ positions: { [afterKb8]: [{ pv: ['h1h2'], cp: 0 }] } });

      const result = await filterCandidate(
        buildCandidate(CORNERED_PRE, 'g1h1'),
        filterContextFor(engine),
      );

      expect(result.accepted).toBe(true);
      if (!result.accepted) return;
      expect(result.candidate.adjustedFen).toBe(playMoves(afterKb8, 'h1h2'));
      expect(result.candidate.forcedSequence.map((m) => m.uci)).toEqual(['a8b8', 'h1h2']);
    });

    it('should reject a non-instructive gain only when enabled', async () => {
      const engine = createMockEngine();
      const candidate = buildCandidate(CORNERED_PRE, 'g1h1', { preBlunderScore: 400 });

      const enabled = await filterCandidate(
        candidate,
        filterContextFor(engine, { rejectNonInstructiveGain: true }),
      );
      expect(enabled).toEqual({ accepted: false, reason: 'nonInstructiveGain' });
      expect(engine.analyse).not.toHaveBeenCalled();

      const disabled = await filterCandidate(candidate, filterContextFor(engine));
      expect(disabled).toEqual({ accepted: false, reason: 'forcedSequence' });
    });
  });
});
