import { STARTING_FEN } from '@tacticforge/pgn';
import { buildCandidate, createMockEngine } from '@tacticforge/test-utils';
import { describe, it, expect } from 'vitest';

import {
  classifyObjective,
  classifyPhase,
  classifyPuzzle,
  type ObjectiveInput,
} from '../classifier/puzzle-classifier.js';
import { deriveDepths } from '../engine/analysis.js';
import { DEFAULT_THRESHOLDS } from '../pipeline/config.js';

const CANDIDATE = buildCandidate('3k4/8/8/8/8/8/1R6/R5K1 b - - 0 29', 'd8e8', {
  preBlunderScore: -50,
});
const FINAL = '4k3/8/8/8/8/8/R7/6K1 b - - 0 40';

function objective(finalScore: number | undefined, preBlunderScore: number) {
  const input: ObjectiveInput = { checkmate: false, preBlunderScore };
  if (finalScore !== undefined) input.finalScore = finalScore;
  return classifyObjective(input, DEFAULT_THRESHOLDS);
}

describe('Puzzle Classifier', () => {
  describe('classifyObjective', () => {
    it('should classify a checkmate as Mate', () => {
      expect(classifyObjective({ checkmate: true, preBlunderScore: 900 }, DEFAULT_THRESHOLDS)).toBe(
        'Mate',
      );
    });

    it('should separate Reversão from Blunder by the pre-blunder score', () => {
      expect(objective(200, -50)).toBe('Reversão');
      expect(objective(200, 0)).toBe('Blunder');
      expect(objective(150, 10)).toBe('Blunder');
    });

    it('should separate Equalização from Defesa inside the drawing range', () => {
      expect(objective(50, -200)).toBe('Equalização');
      expect(objective(-99, -1)).toBe('Equalização');
      expect(objective(50, 100)).toBe('Defesa');
    });

    it('should fall back to Defesa outside both ranges', () => {
      expect(objective(-100, -300)).toBe('Defesa');
      expect(objective(120, -300)).toBe('Defesa');
      expect(objective(undefined, -300)).toBe('Defesa');
    });
  });

  describe('classifyPhase', () => {
    it('should place early moves in the opening', () => {
      expect(classifyPhase(STARTING_FEN)).toBe('Abertura');
      expect(
        classifyPhase('r1bqkbnr/pppp1ppp/2n5/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R w KQkq - 2 10'),
      ).toBe('Abertura');
    });

    it('should place a full board after move 10 in the middlegame', () => {
      expect(
        classifyPhase('r1bq1rk1/pp3ppp/2n2n2/3p4/3P4/2N2N2/PP3PPP/R1BQ1RK1 w - - 0 20'),
      ).toBe('Meio-jogo');
    });

    it('should place late moves in the endgame', () => {
      expect(classifyPhase('4k3/pp6/8/8/8/8/PP6/R3K2R w - - 0 35')).toBe('Final');
      expect(
        classifyPhase('r1bq1rk1/pp3ppp/2n2n2/3p4/3P4/2N2N2/PP3PPP/R1BQ1RK1 w - - 0 30'),
      ).toBe('Final');
    });

    it('should place reduced material in the endgame', () => {
      expect(classifyPhase('4k3/8/8/8/8/8/PPPP4/4K3 w - - 0 20')).toBe('Final');
    });
  });

  describe('classifyPuzzle', () => {
    it('should classify a mating line without the engine', async () => {
      const engine = createMockEngine();
      const mate = '1R3k2/R7/8/8/8/8/8/6K1 b - - 3 31';

      const result = await classifyPuzzle(
        CANDIDATE,
        mate,
        { engine, depths: deriveDepths(12) },
        DEFAULT_THRESHOLDS,
      );

      expect(result).toEqual({ objective: 'Mate', phase: 'Final' });
      expect(engine.analyse).not.toHaveBeenCalled();
    });

    it('should evaluate the final position for the solver at quick depth', async () => {
      const engine = createMockEngine({ positions: { [FINAL]: [{ pv: ['e8d7'], cp: -400 }] } });

      const result = await classifyPuzzle(
        CANDIDATE,
        FINAL,
        { engine, depths: deriveDepths(12) },
        DEFAULT_THRESHOLDS,
      );

      expect(result.objective).toBe('Reversão');
      expect(engine.requestsFor(FINAL)).toEqual([{ depth: 3, multipv: 1 }]);
    });

    it('should default to Defesa when the final position cannot be analysed', async () => {
      const result = await classifyPuzzle(
        CANDIDATE,
        FINAL,
        { engine: createMockEngine(), depths: deriveDepths(12) },
        DEFAULT_THRESHOLDS,
      );

      expect(result.objective).toBe('Defesa');
    });
  });
});
