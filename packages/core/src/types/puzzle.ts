/**
 * Puzzle extraction type definitions
 *
 * Positions cross module boundaries as FEN strings. Every object produced
 * here is treated as immutable once returned; solution trees are built by
 * appending to fresh arrays, never by editing nodes in place.
 */

import type { MoveResult, PieceColor } from '@tacticforge/pgn';

// ============================================================================
// Engine Types
// ============================================================================

/**
 * Engine score relative to the side to move (UCI convention)
 *
 * A positive mate value means the side to move delivers mate; zero or a
 * negative value means it is (or will be) mated.
 */
export interface EngineScore {
  type: 'cp' | 'mate';
  value: number;
}

/**
 * One principal variation returned by the engine
 */
export interface EngineLine {
  score: EngineScore;
  /** Moves in UCI notation, best move first */
  pv: string[];
  /** Depth the line was searched to */
  depth?: number;
}

/**
 * Analysis request for a single position
 */
export interface EngineRequest {
  depth: number;
  multipv: number;
}

/**
 * Engine oracle used by every analysis step
 *
 * Implementations return lines ordered best-first and may reject on any
 * failure; callers decide whether to retry.
 */
export interface EngineService {
  analyse(fen: string, request: EngineRequest): Promise<EngineLine[]>;
}

/**
 * A score together with the side it is expressed for
 */
export interface Score extends EngineScore {
  pov: PieceColor;
}

// ============================================================================
// Detection Types
// ============================================================================

/**
 * One ply of a scanned game, with White-perspective evaluations
 */
export interface PlyTrace {
  /** Zero-based index in the main line */
  ply: number;
  move: MoveResult;
  mover: PieceColor;
  /** Full-move number of the position before the move */
  moveNumber: number;
  /** Evaluation before the move, undefined when analysis was unavailable */
  cpBefore?: number;
  /** Evaluation after the move, undefined when analysis was unavailable */
  cpAfter?: number;
}

/**
 * A move that swung the evaluation against the side that played it
 */
export interface BlunderEvent {
  ply: number;
  fenBefore: string;
  fenAfter: string;
  move: MoveResult;
  /** White-perspective evaluation before the blunder */
  cpBefore: number;
  /** White-perspective evaluation after the blunder */
  cpAfter: number;
  /** The side that did not blunder and must punish it */
  solverColor: PieceColor;
  moveNumber: number;
}

// ============================================================================
// Candidate Types
// ============================================================================

/**
 * Why a candidate was discarded
 */
export type RejectionReason =
  | 'nonInstructiveGain'
  | 'forcedSequence'
  | 'hangingPiece'
  | 'capturesOnly'
  | 'multipleSolutions'
  | 'insufficientMargin'
  | 'tooShort';

/**
 * Labels used in statistics, checkpoints and console output
 */
export const REJECTION_LABELS: Readonly<Record<RejectionReason, string>> = {
  nonInstructiveGain: 'ganho não instrutivo',
  forcedSequence: 'sequência forçada',
  hangingPiece: 'peça solta',
  capturesOnly: 'apenas capturas',
  multipleSolutions: 'múltiplas soluções',
  insufficientMargin: 'margem insuficiente',
  tooShort: 'sequência muito curta',
};

/**
 * A blunder that is being turned into a puzzle
 */
export interface Candidate {
  readonly gameIndex: number;
  readonly ply: number;
  readonly fenPreBlunder: string;
  readonly fenPostBlunder: string;
  /** Position after the forced moves, where the solver first has a choice */
  readonly adjustedFen: string;
  readonly blunderMove: MoveResult;
  readonly forcedSequence: readonly MoveResult[];
  readonly solverColor: PieceColor;
  /** Evaluation before the blunder, from the solver's perspective */
  readonly preBlunderScore: number;
  /** Evaluation after the blunder, from the solver's perspective */
  readonly postBlunderScore: number;
  readonly moveNumber: number;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Outcome of a filter stage or of the whole chain
 */
export type FilterResult =
  | { readonly accepted: true; readonly candidate: Candidate }
  | { readonly accepted: false; readonly reason: RejectionReason };

// ============================================================================
// Solution Types
// ============================================================================

export interface SolutionMove {
  readonly uci: string;
  readonly san: string;
}

/**
 * A main-line move with the equally good moves the solver could also play
 */
export interface SolutionNode extends SolutionMove {
  readonly color: PieceColor;
  readonly fenBefore: string;
  readonly fenAfter: string;
  /** Only ever populated on solver moves */
  readonly alternatives: readonly SolutionMove[];
}

export type SolutionResult =
  | { readonly success: true; readonly line: readonly SolutionNode[]; readonly finalFen: string }
  | { readonly success: false; readonly reason: RejectionReason };

// ============================================================================
// Puzzle Types
// ============================================================================

export type PuzzleObjective = 'Mate' | 'Reversão' | 'Equalização' | 'Defesa' | 'Blunder';

export type GamePhase = 'Abertura' | 'Meio-jogo' | 'Final';

/**
 * A classified puzzle, ready for export
 */
export interface Puzzle {
  readonly candidate: Candidate;
  readonly solution: readonly SolutionNode[];
  readonly finalFen: string;
  readonly objective: PuzzleObjective;
  readonly phase: GamePhase;
}

/**
 * A candidate that did not become a puzzle
 */
export interface CandidateRejection {
  readonly gameIndex: number;
  readonly ply: number;
  /** SAN of the blunder, for display */
  readonly move: string;
  readonly moveNumber: number;
  readonly reason: RejectionReason;
}
