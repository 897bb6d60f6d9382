/**
 * Solution line builder
 *
 * Alternates solver and opponent plies from the adjusted position:
 * - Solver plies ask for maxVariants + 2 lines and must be unambiguous:
 *   few enough equivalent moves, and a clear margin over the rest.
 * - Opponent plies take the engine's best reply, or the first legal move
 *   when the engine has nothing to say.
 *
 * The line always ends on a solver move.
 */

import { ChessPosition, type PieceColor } from '@tacticforge/pgn';

import { analyseWithRetry, type AnalysisContext } from '../engine/analysis.js';
import type { PuzzleThresholds, SolutionConfig } from '../pipeline/config.js';
import { scoreForSolver } from '../scoring/normalizer.js';
import type {
  Candidate,
  EngineLine,
  RejectionReason,
  SolutionMove,
  SolutionNode,
  SolutionResult,
} from '../types/puzzle.js';

export interface SolutionOptions extends SolutionConfig {
  thresholds: Pick<PuzzleThresholds, 'alternative' | 'unicity'>;
}

interface ScoredMove {
  uci: string;
  score: number;
}

/**
 * Decision at a solver ply
 */
export type SolverChoice =
  | { kind: 'move'; main: string; alternatives: string[] }
  | { kind: 'rejected'; reason: RejectionReason }
  | { kind: 'none' };

/**
 * Pick the solver's move from the engine's lines
 *
 * Lines whose first move is illegal or repeated are ignored. Moves within
 * `alternative` of the best form the equivalence cluster; its weakest
 * member must lead the best move outside it by at least `unicity`.
 */
export function chooseSolverMove(
  lines: readonly EngineLine[],
  position: ChessPosition,
  solver: PieceColor,
  options: SolutionOptions,
): SolverChoice {
  const legal = new Set(position.legalMoves());
  const sideToMove = position.turn();
  const scored: ScoredMove[] = [];

  for (const line of lines) {
    const uci = line.pv[0];
    if (uci === undefined || !legal.has(uci) || scored.some((m) => m.uci === uci)) continue;
    scored.push({ uci, score: scoreForSolver(line.score, sideToMove, solver) });
  }
  // Stable: ties keep the engine's order
  scored.sort((a, b) => b.score - a.score);

  const [best] = scored;
  if (!best) {
    return { kind: 'none' };
  }

  const { alternative, unicity } = options.thresholds;
  const cluster = scored.filter((m) => best.score - m.score <= alternative);
  if (cluster.length > options.maxVariants + 1) {
    return { kind: 'rejected', reason: 'multipleSolutions' };
  }

  const outside = scored.find((m) => best.score - m.score > alternative);
  const weakest = cluster[cluster.length - 1] ?? best;
  if (outside && weakest.score - outside.score < unicity) {
    return { kind: 'rejected', reason: 'insufficientMargin' };
  }

  return { kind: 'move', main: best.uci, alternatives: cluster.slice(1).map((m) => m.uci) };
}

/**
 * The opponent's reply: engine best move at solve depth, retried at scan
 * depth, else the first legal move
 */
async function opponentReply(
  position: ChessPosition,
  context: AnalysisContext,
): Promise<string | undefined> {
  const lines = await analyseWithRetry(context, position.fen(), {
    depth: context.depths.solve,
    retryDepth: context.depths.scan,
  });
  const legal = position.legalMoves();
  const move = lines?.[0]?.pv[0];
  return move !== undefined && legal.includes(move) ? move : legal[0];
}

function toSolutionMove(position: ChessPosition, uci: string): SolutionMove {
  return Object.freeze({ uci, san: position.uciToSan(uci) });
}

function appendNode(
  line: readonly SolutionNode[],
  position: ChessPosition,
  uci: string,
  alternatives: readonly SolutionMove[] = [],
): readonly SolutionNode[] {
  const color = position.turn();
  const played = position.playUci(uci);
  const node: SolutionNode = Object.freeze({
    uci: played.uci,
    san: played.san,
    color,
    fenBefore: played.fenBefore,
    fenAfter: played.fenAfter,
    alternatives: Object.freeze([...alternatives]),
  });
  return Object.freeze([...line, node]);
}

/**
 * Build and validate the solution line for a filtered candidate
 */
export async function buildSolution(
  candidate: Candidate,
  context: AnalysisContext,
  options: SolutionOptions,
): Promise<SolutionResult> {
  const solver = candidate.solverColor;
  const position = ChessPosition.fromFen(candidate.adjustedFen);
  let line: readonly SolutionNode[] = [];

  while (line.length < options.maxPlies && !position.isGameOver()) {
    if (position.turn() === solver) {
      const lines = await analyseWithRetry(context, position.fen(), {
        depth: context.depths.solve,
        multipv: options.maxVariants + 2,
        retryDepth: context.depths.scan,
      });
      if (!lines) break;

      const choice = chooseSolverMove(lines, position, solver, options);
      if (choice.kind === 'rejected') {
        return { success: false, reason: choice.reason };
      }
      if (choice.kind === 'none') break;

      const alternatives = choice.alternatives.map((uci) => toSolutionMove(position, uci));
      line = appendNode(line, position, choice.main, alternatives);
    } else {
      const reply = await opponentReply(position, context);
      if (reply === undefined) break;
      line = appendNode(line, position, reply);
    }
  }

  const last = line[line.length - 1];
  if (last && last.color !== solver) {
    line = line.slice(0, -1);
  }

  const solverMoves = line.filter((node) => node.color === solver).length;
  if (solverMoves < options.minSolverMoves) {
    return { success: false, reason: 'tooShort' };
  }

  const finalFen = line[line.length - 1]?.fenAfter ?? candidate.adjustedFen;
  return { success: true, line: Object.freeze(line), finalFen };
}
