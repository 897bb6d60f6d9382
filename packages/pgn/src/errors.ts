/**
 * Error thrown when PGN parsing fails
 */
export class PgnParseError extends Error {
  constructor(
    message: string,
    public line?: number,
    public column?: number,
  ) {
    super(message);
    this.name = 'PgnParseError';
  }
}

/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when an illegal or malformed move is applied
 */
export class IllegalMoveError extends Error {
  constructor(
    public readonly move: string,
    public readonly fen: string,
  ) {
    super(`Illegal move "${move}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}

/**
 * Error raised for one game of a collection; carries the game's position in the input
 */
export class GameParseError extends Error {
  constructor(
    public readonly gameIndex: number,
    public readonly error: Error,
  ) {
    super(`Game ${gameIndex + 1}: ${error.message}`);
    this.name = 'GameParseError';
  }
}
