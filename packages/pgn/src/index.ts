/**
 * @tacticforge/pgn - PGN parsing and rendering for puzzle extraction
 *
 * This package handles:
 * - PGN tag parsing, with every header kept in source order
 * - Move text parsing (SAN notation) from the standard start or a FEN tag
 * - Rendering a start position plus a move tree with variations back to PGN
 */

export const VERSION = '0.1.0';

/**
 * Game metadata from PGN headers
 */
export interface GameMetadata {
  event?: string;
  site?: string;
  date?: string;
  round?: string;
  white: string;
  black: string;
  result: string;
  whiteElo?: number;
  blackElo?: number;
  timeControl?: string;
  eco?: string;
}

/**
 * A single move with position information and optional annotations
 */
export interface MoveInfo {
  moveNumber: number;
  san: string;
  uci: string;
  isWhiteMove: boolean;
  fenBefore: string;
  fenAfter: string;
  /** Comment appearing after the move */
  commentAfter?: string;
  /** Variations (alternative lines) replacing this move */
  variations?: MoveInfo[][];
}

/**
 * A fully parsed game
 */
export interface ParsedGame {
  metadata: GameMetadata;
  /** Every header as written in the source, in source order */
  headers: Record<string, string>;
  /** Position before the first move (FEN tag or the standard start) */
  startFen: string;
  moves: MoveInfo[];
}

export { parsePgnString as parsePgn } from './parser/pgn-parser.js';
export type { ParseOptions } from './parser/pgn-parser.js';

export {
  renderPgnString as renderPgn,
  wrapMoveText,
  DEFAULT_MAX_LINE_LENGTH,
} from './renderer/pgn-renderer.js';
export type { RenderOptions } from './renderer/pgn-renderer.js';

export { ChessPosition, STARTING_FEN, oppositeColor } from './chess/index.js';
export type { MoveResult, PieceColor } from './chess/index.js';

export { PgnParseError, InvalidFenError, IllegalMoveError, GameParseError } from './errors.js';
