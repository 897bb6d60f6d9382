export { ChessPosition, STARTING_FEN, oppositeColor } from './position.js';
export type { MoveResult, PieceColor } from './position.js';
