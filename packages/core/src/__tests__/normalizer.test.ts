import { describe, it, expect } from 'vitest';

import {
  MATE_SCORE,
  normalize,
  relativeScore,
  scoreForSolver,
  scoreToWhite,
  whiteToPerspective,
} from '../scoring/normalizer.js';
import type { Score } from '../types/puzzle.js';

describe('Score Normalizer', () => {
  describe('normalize', () => {
    it('should pass centipawns through for the same side', () => {
      expect(normalize({ type: 'cp', value: 120, pov: 'w' }, 'w')).toBe(120);
    });

    it('should flip centipawns for the other side', () => {
      expect(normalize({ type: 'cp', value: 120, pov: 'w' }, 'b')).toBe(-120);
      expect(normalize({ type: 'cp', value: -45, pov: 'b' }, 'w')).toBe(45);
    });

    it('should saturate mate scores whatever the distance', () => {
      expect(normalize({ type: 'mate', value: 1, pov: 'b' }, 'b')).toBe(MATE_SCORE);
      expect(normalize({ type: 'mate', value: 12, pov: 'b' }, 'b')).toBe(MATE_SCORE);
      expect(normalize({ type: 'mate', value: 3, pov: 'b' }, 'w')).toBe(-MATE_SCORE);
    });

    it('should score being mated as the losing side', () => {
      expect(normalize({ type: 'mate', value: -2, pov: 'w' }, 'w')).toBe(-MATE_SCORE);
      expect(normalize({ type: 'mate', value: -2, pov: 'w' }, 'b')).toBe(MATE_SCORE);
    });

    it('should treat mate 0 as the side to move being mated', () => {
      expect(normalize({ type: 'mate', value: 0, pov: 'w' }, 'w')).toBe(-MATE_SCORE);
      expect(normalize({ type: 'mate', value: 0, pov: 'w' }, 'b')).toBe(MATE_SCORE);
    });

    it('should keep a level score at zero for both sides', () => {
      expect(normalize({ type: 'cp', value: 0, pov: 'w' }, 'b')).toBe(0);
      expect(normalize({ type: 'cp', value: 0, pov: 'b' }, 'b')).toBe(0);
    });

    it('should be antisymmetric between the two sides', () => {
      const scores: Score[] = [
        { type: 'cp', value: 250, pov: 'w' },
        { type: 'cp', value: -80, pov: 'b' },
        { type: 'cp', value: 0, pov: 'w' },
        { type: 'mate', value: 4, pov: 'w' },
        { type: 'mate', value: -1, pov: 'b' },
      ];
      for (const score of scores) {
        expect(normalize(score, 'w') + normalize(score, 'b')).toBe(0);
      }
    });
  });

  describe('helpers', () => {
    it('should attach the side to move', () => {
      expect(relativeScore({ type: 'cp', value: 30 }, 'b')).toEqual({
        type: 'cp',
        value: 30,
        pov: 'b',
      });
    });

    it('should convert side-to-move scores to White perspective', () => {
      expect(scoreToWhite({ type: 'cp', value: 50 }, 'w')).toBe(50);
      expect(scoreToWhite({ type: 'cp', value: 50 }, 'b')).toBe(-50);
      expect(scoreToWhite({ type: 'mate', value: 2 }, 'b')).toBe(-MATE_SCORE);
    });

    it('should convert side-to-move scores to the solver perspective', () => {
      expect(scoreForSolver({ type: 'cp', value: 300 }, 'b', 'b')).toBe(300);
      expect(scoreForSolver({ type: 'cp', value: 300 }, 'b', 'w')).toBe(-300);
    });

    it('should re-express White-perspective values', () => {
      expect(whiteToPerspective(75, 'w')).toBe(75);
      expect(whiteToPerspective(75, 'b')).toBe(-75);
      expect(whiteToPerspective(0, 'b')).toBe(0);
    });
  });
});
