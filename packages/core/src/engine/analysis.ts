/**
 * Engine access helpers shared by every analysis stage
 *
 * The engine is never held globally: each stage receives an
 * AnalysisContext owned by the caller that acquired the engine.
 */

import { ChessPosition } from '@tacticforge/pgn';

import type { EngineLine, EngineService, Score } from '../types/puzzle.js';

/**
 * Search depths derived from the configured base depth
 */
export interface AnalysisDepths {
  /** Move-by-move evaluation of the game */
  scan: number;
  /** Solution line search */
  solve: number;
  /** Filter probes and final classification */
  quick: number;
}

export const SCAN_DEPTH_MULTIPLIER = 0.5;
export const SOLVE_DEPTH_MULTIPLIER = 1.5;
export const QUICK_DEPTH_DIVISOR = 4;

export function deriveDepths(baseDepth: number): AnalysisDepths {
  return {
    scan: Math.max(1, Math.floor(baseDepth * SCAN_DEPTH_MULTIPLIER)),
    solve: Math.max(1, Math.floor(baseDepth * SOLVE_DEPTH_MULTIPLIER)),
    quick: Math.max(1, Math.floor(baseDepth / QUICK_DEPTH_DIVISOR)),
  };
}

/**
 * Everything an analysis stage needs to talk to the engine
 */
export interface AnalysisContext {
  engine: EngineService;
  depths: AnalysisDepths;
  /** Notified of every failed engine request, including retried ones */
  onEngineError?: (error: Error, fen: string, depth: number) => void;
}

export interface RetryRequest {
  depth: number;
  multipv?: number;
  /** Depth of the single retry; defaults to the quick depth */
  retryDepth?: number;
}

/**
 * Analyse a position, retrying once at a reduced depth
 *
 * An empty answer counts as a failure.
 *
 * @returns Lines best-first, or undefined when analysis is unavailable
 */
export async function analyseWithRetry(
  context: AnalysisContext,
  fen: string,
  request: RetryRequest,
): Promise<EngineLine[] | undefined> {
  const multipv = request.multipv ?? 1;
  const depths = [request.depth, request.retryDepth ?? context.depths.quick];

  for (const depth of depths) {
    try {
      const lines = await context.engine.analyse(fen, { depth, multipv });
      if (lines.length > 0) {
        return lines;
      }
      context.onEngineError?.(new Error('Engine returned no lines'), fen, depth);
    } catch (err) {
      context.onEngineError?.(err instanceof Error ? err : new Error(String(err)), fen, depth);
    }
  }
  return undefined;
}

/**
 * Evaluate a position for the side to move
 *
 * Finished games are scored without the engine: a mated side gets
 * "mate 0", stalemate and dead positions are level.
 */
export async function evaluatePosition(
  context: AnalysisContext,
  fen: string,
  request: RetryRequest,
): Promise<Score | undefined> {
  const position = ChessPosition.fromFen(fen);
  const pov = position.turn();

  if (position.isCheckmate()) {
    return { type: 'mate', value: 0, pov };
  }
  if (position.isStalemate() || position.isInsufficientMaterial()) {
    return { type: 'cp', value: 0, pov };
  }

  const lines = await analyseWithRetry(context, fen, request);
  const best = lines?.[0];
  return best ? { ...best.score, pov } : undefined;
}

/**
 * The engine's best move if it is legal in the position
 */
export async function findBestMove(
  context: AnalysisContext,
  position: ChessPosition,
  request: RetryRequest,
): Promise<string | undefined> {
  const lines = await analyseWithRetry(context, position.fen(), request);
  const move = lines?.[0]?.pv[0];
  return move !== undefined && position.legalMoves().includes(move) ? move : undefined;
}
