/**
 * Fluent builder for ParsedGame test data
 */

import { ChessPosition, STARTING_FEN, type MoveInfo, type ParsedGame } from '@tacticforge/pgn';

/**
 * Default headers of a built game
 */
function defaultHeaders(): Record<string, string> {
  return {
    Event: 'Test Game',
    White: 'Player1',
    Black: 'Player2',
    Result: '*',
  };
}

/**
 * Fluent builder for creating ParsedGame instances from UCI moves
 */
export class GameBuilder {
  private startFen = STARTING_FEN;
  private headers: Record<string, string> = defaultHeaders();
  private moves: string[] = [];

  /**
   * Start from a position other than the standard one
   */
  from(fen: string): this {
    this.startFen = fen;
    return this;
  }

  withHeaders(headers: Record<string, string>): this {
    this.headers = { ...this.headers, ...headers };
    return this;
  }

  /**
   * Append moves in UCI notation
   */
  play(...moves: string[]): this {
    this.moves.push(...moves);
    return this;
  }

  build(): ParsedGame {
    const position = ChessPosition.fromFen(this.startFen);
    const moves: MoveInfo[] = this.moves.map((uci) => {
      const moveNumber = position.moveNumber();
      const isWhiteMove = position.turn() === 'w';
      const played = position.playUci(uci);
      return {
        moveNumber,
        san: played.san,
        uci: played.uci,
        isWhiteMove,
        fenBefore: played.fenBefore,
        fenAfter: played.fenAfter,
      };
    });

    const headers = { ...this.headers };
    if (this.startFen !== STARTING_FEN) {
      headers.SetUp = '1';
      headers.FEN = this.startFen;
    }

    return {
      metadata: {
        white: headers.White ?? 'Unknown',
        black: headers.Black ?? 'Unknown',
        result: headers.Result ?? '*',
      },
      headers,
      startFen: this.startFen,
      moves,
    };
  }
}

/**
 * Create a new game builder
 */
export function gameBuilder(): GameBuilder {
  return new GameBuilder();
}

/**
 * FEN reached by playing UCI moves from a position
 */
export function playMoves(fen: string, ...moves: string[]): string {
  const position = ChessPosition.fromFen(fen);
  for (const move of moves) {
    position.playUci(move);
  }
  return position.fen();
}
