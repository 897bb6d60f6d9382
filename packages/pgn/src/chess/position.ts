import { Chess, type Move, type Square } from 'chess.js';

import { InvalidFenError, IllegalMoveError } from '../errors.js';

/**
 * Side to move, as chess.js and FEN spell it
 */
export type PieceColor = 'w' | 'b';

/**
 * Result of applying a move to a position
 */
export interface MoveResult {
  /** The move in Standard Algebraic Notation */
  san: string;
  /** The move in UCI coordinate notation (e.g. "e7e8q") */
  uci: string;
  from: string;
  to: string;
  /** Piece type captured by the move, if any */
  captured?: string;
  /** FEN before the move was made */
  fenBefore: string;
  /** FEN after the move was made */
  fenAfter: string;
}

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const SQUARE_PATTERN = /^[a-h][1-8]$/;
const UCI_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

function isSquare(value: string): value is Square {
  return SQUARE_PATTERN.test(value);
}

/**
 * The opposite side
 */
export function oppositeColor(color: PieceColor): PieceColor {
  return color === 'w' ? 'b' : 'w';
}

function toUci(move: Move): string {
  return move.from + move.to + (move.promotion ?? '');
}

function toMoveResult(move: Move, fenBefore: string, fenAfter: string): MoveResult {
  const result: MoveResult = {
    san: move.san,
    uci: toUci(move),
    from: move.from,
    to: move.to,
    fenBefore,
    fenAfter,
  };
  if (move.captured) {
    result.captured = move.captured;
  }
  return result;
}

/**
 * A chess position wrapper around chess.js
 *
 * Positions handed out by the rest of the system are FEN strings; a
 * ChessPosition is the working copy used to generate moves from one.
 */
export class ChessPosition {
  private chess: Chess;

  constructor(fen?: string) {
    if (fen) {
      try {
        this.chess = new Chess(fen);
      } catch {
        throw new InvalidFenError(`Invalid FEN: ${fen}`);
      }
    } else {
      this.chess = new Chess();
    }
  }

  /**
   * Create a position from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessPosition {
    return new ChessPosition(fen);
  }

  fen(): string {
    return this.chess.fen();
  }

  turn(): PieceColor {
    return this.chess.turn();
  }

  /**
   * Full-move number from the FEN counters
   */
  moveNumber(): number {
    return this.chess.moveNumber();
  }

  /**
   * Apply a move in SAN notation
   * @throws IllegalMoveError if the move is not legal
   */
  move(san: string): MoveResult {
    const fenBefore = this.chess.fen();
    let played: Move;
    try {
      played = this.chess.move(san);
    } catch {
      throw new IllegalMoveError(san, fenBefore);
    }
    return toMoveResult(played, fenBefore, this.chess.fen());
  }

  /**
   * Apply a move in UCI notation
   * @throws IllegalMoveError if the move is malformed or not legal
   */
  playUci(uci: string): MoveResult {
    const fenBefore = this.chess.fen();
    const match = UCI_PATTERN.exec(uci);
    if (!match?.[1] || !match[2]) {
      throw new IllegalMoveError(uci, fenBefore);
    }

    // Build move object conditionally to satisfy exactOptionalPropertyTypes
    const moveObj: { from: string; to: string; promotion?: string } = {
      from: match[1],
      to: match[2],
    };
    if (match[3]) {
      moveObj.promotion = match[3];
    }

    let played: Move;
    try {
      played = this.chess.move(moveObj);
    } catch {
      throw new IllegalMoveError(uci, fenBefore);
    }
    return toMoveResult(played, fenBefore, this.chess.fen());
  }

  /**
   * Convert a UCI move to SAN without changing the position
   * @throws IllegalMoveError if the move is not legal
   */
  uciToSan(uci: string): string {
    return this.clone().playUci(uci).san;
  }

  /**
   * All legal moves in UCI notation, in chess.js generation order
   */
  legalMoves(): string[] {
    return this.chess.moves({ verbose: true }).map(toUci);
  }

  /**
   * Whether a legal UCI move captures a piece (en passant included)
   */
  isCapture(uci: string): boolean {
    const move = this.chess.moves({ verbose: true }).find((m) => toUci(m) === uci);
    return move?.captured !== undefined;
  }

  isCheck(): boolean {
    return this.chess.isCheck();
  }

  isCheckmate(): boolean {
    return this.chess.isCheckmate();
  }

  isStalemate(): boolean {
    return this.chess.isStalemate();
  }

  isInsufficientMaterial(): boolean {
    return this.chess.isInsufficientMaterial();
  }

  /**
   * Checkmate, stalemate or insufficient material.
   * Repetition and the fifty-move rule are ignored: a position rebuilt
   * from FEN carries no history.
   */
  isGameOver(): boolean {
    return this.isCheckmate() || this.isStalemate() || this.isInsufficientMaterial();
  }

  clone(): ChessPosition {
    return new ChessPosition(this.fen());
  }

  /**
   * Get the piece at a square
   * @param square - Square in algebraic notation (e.g., "e4")
   */
  getPiece(square: string): { type: string; color: PieceColor } | undefined {
    if (!isSquare(square)) return undefined;
    const piece = this.chess.get(square);
    if (!piece) return undefined;
    return { type: piece.type, color: piece.color };
  }

  /**
   * Squares holding pieces of `byColor` that attack `square`
   */
  getAttackers(square: string, byColor: PieceColor): string[] {
    if (!isSquare(square)) return [];
    return this.chess.attackers(square, byColor);
  }

  /**
   * Number of pieces on the board, pawns included, kings excluded
   */
  nonKingPieceCount(): number {
    let count = 0;
    for (const rank of this.chess.board()) {
      for (const piece of rank) {
        if (piece && piece.type !== 'k') {
          count++;
        }
      }
    }
    return count;
  }
}
