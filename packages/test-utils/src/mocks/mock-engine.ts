/**
 * Scripted engine oracle for testing
 *
 * Implements the core EngineService. Answers are looked up by position
 * (piece placement and side to move), so scripted positions match however
 * the move counters of the FEN evolved.
 */

import type { EngineLine, EngineRequest, EngineService } from '@tacticforge/core';
import { vi, type Mock } from 'vitest';

/**
 * One scripted principal variation
 *
 * Exactly one of `cp` and `mate` should be given; `cp` defaults to 0.
 */
export interface ScriptedLine {
  /** Moves in UCI notation; empty for a bare evaluation */
  pv?: string[];
  cp?: number;
  mate?: number;
}

/**
 * What the engine does for a position: answer with lines, or fail
 */
export type ScriptedAnswer = ScriptedLine[] | 'fail';

export interface MockEngineConfig {
  /** Scripted answers keyed by FEN */
  positions?: Record<string, ScriptedAnswer>;
  /** Answer for positions without a script (default: fail) */
  fallback?: ScriptedAnswer;
}

export interface MockEngine extends EngineService {
  analyse: Mock<(fen: string, request: EngineRequest) => Promise<EngineLine[]>>;
  /** Add or replace the answer for a position */
  script(fen: string, answer: ScriptedAnswer): void;
  /** Requests made for a position */
  requestsFor(fen: string): EngineRequest[];
}

/**
 * Key identifying a position independently of its move counters
 */
export function positionKey(fen: string): string {
  return fen.split(' ').slice(0, 2).join(' ');
}

function toEngineLine(line: ScriptedLine, depth: number): EngineLine {
  const score =
    line.mate !== undefined
      ? { type: 'mate' as const, value: line.mate }
      : { type: 'cp' as const, value: line.cp ?? 0 };
  return { score, pv: line.pv ?? [], depth };
}

export function createMockEngine(config: MockEngineConfig = {}): MockEngine {
  const answers = new Map<string, ScriptedAnswer>();
  for (const [fen, answer] of Object.entries(config.positions ?? {})) {
    answers.set(positionKey(fen), answer);
  }
  const fallback = config.fallback ?? 'fail';

  const analyse = vi.fn(async (fen: string, request: EngineRequest): Promise<EngineLine[]> => {
    const answer = answers.get(positionKey(fen)) ?? fallback;
    if (answer === 'fail') {
      throw new Error(`Engine analysis failed for position: ${fen}`);
    }
    return answer.slice(0, request.multipv).map((line) => toEngineLine(line, request.depth));
  });

  return {
    analyse,
    script(fen, answer) {
      answers.set(positionKey(fen), answer);
    },
    requestsFor(fen) {
      const key = positionKey(fen);
      return analyse.mock.calls
        .filter(([calledFen]) => positionKey(calledFen) === key)
        .map(([, request]) => request);
    },
  };
}
