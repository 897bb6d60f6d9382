import { parse } from '@mliebelt/pgn-parser';

import { ChessPosition, STARTING_FEN } from '../chess/position.js';
import { GameParseError, PgnParseError } from '../errors.js';
import type { GameMetadata, MoveInfo, ParsedGame } from '../index.js';

/**
 * Tag value shapes produced by pgn-parser: plain strings, Elo numbers,
 * objects such as Date/Time with a `value`, or TimeControl period arrays
 */
type RawTagValue = string | number | { value?: string } | Array<{ value?: string }> | undefined;

/**
 * Raw tags from pgn-parser (object format)
 */
type RawTags = Record<string, unknown>;

/**
 * Raw move from pgn-parser
 */
interface RawMove {
  notation?: {
    notation: string;
  };
  commentAfter?: string;
}

/**
 * Raw game from pgn-parser
 */
interface RawGame {
  tags?: RawTags;
  moves?: RawMove[];
}

export interface ParseOptions {
  /**
   * Called for a game whose move text cannot be replayed. When given, the
   * game is skipped; otherwise the error is thrown.
   */
  onInvalidGame?: (error: GameParseError) => void;
}

/**
 * Parse a PGN string into an array of ParsedGame objects
 *
 * Only the main line of each game is replayed; variations in the source
 * are dropped.
 *
 * @param pgnString - The PGN content to parse (can contain multiple games)
 * @throws PgnParseError if the PGN is malformed
 * @throws GameParseError if a game contains an illegal move and no handler is given
 */
export function parsePgnString(pgnString: string, options: ParseOptions = {}): ParsedGame[] {
  if (!pgnString.trim()) {
    return [];
  }

  let parsed: RawGame[];
  try {
    parsed = parse(pgnString, { startRule: 'games' }) as RawGame[];
  } catch (err) {
    throw new PgnParseError(`Failed to parse PGN: ${String(err)}`);
  }

  const games: ParsedGame[] = [];
  parsed.forEach((rawGame, index) => {
    try {
      games.push(transformGame(rawGame));
    } catch (err) {
      const error = new GameParseError(index, err instanceof Error ? err : new Error(String(err)));
      if (!options.onInvalidGame) {
        throw error;
      }
      options.onInvalidGame(error);
    }
  });
  return games;
}

/**
 * Transform a raw parsed game into our ParsedGame format
 */
function transformGame(rawGame: RawGame): ParsedGame {
  const headers = extractHeaders(rawGame.tags ?? {});
  const metadata = extractMetadata(headers);

  const position = headers.FEN ? ChessPosition.fromFen(headers.FEN) : new ChessPosition();
  const startFen = headers.FEN ? position.fen() : STARTING_FEN;

  return { metadata, headers, startFen, moves: processMoves(rawGame.moves ?? [], position) };
}

/**
 * Flatten pgn-parser's typed tag values back into header strings
 */
function extractHeaders(tags: RawTags): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, raw] of Object.entries(tags)) {
    const value = tagValueToString(toRawTagValue(raw));
    if (value !== undefined) {
      headers[name] = value;
    }
  }
  return headers;
}

function toRawTagValue(raw: unknown): RawTagValue {
  if (typeof raw === 'string' || typeof raw === 'number') return raw;
  if (Array.isArray(raw)) {
    return raw.filter((item): item is { value?: string } => typeof item === 'object' && item !== null);
  }
  if (typeof raw === 'object' && raw !== null && 'value' in raw && typeof raw.value === 'string') {
    return { value: raw.value };
  }
  return undefined;
}

function tagValueToString(value: RawTagValue): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) {
    // TimeControl periods are colon separated in PGN
    const periods = value.map((period) => period.value).filter((v): v is string => !!v);
    return periods.length > 0 ? periods.join(':') : undefined;
  }
  return value?.value;
}

/**
 * Extract game metadata from PGN headers
 */
function extractMetadata(headers: Record<string, string>): GameMetadata {
  const metadata: GameMetadata = {
    white: headers.White ?? 'Unknown',
    black: headers.Black ?? 'Unknown',
    result: headers.Result ?? '*',
  };

  // Only set optional properties if they have values
  if (headers.Event !== undefined) metadata.event = headers.Event;
  if (headers.Site !== undefined) metadata.site = headers.Site;
  if (headers.Date !== undefined) metadata.date = headers.Date;
  if (headers.Round !== undefined) metadata.round = headers.Round;
  if (headers.ECO !== undefined) metadata.eco = headers.ECO;
  if (headers.TimeControl !== undefined) metadata.timeControl = headers.TimeControl;

  const whiteElo = parseElo(headers.WhiteElo);
  if (whiteElo !== undefined) metadata.whiteElo = whiteElo;

  const blackElo = parseElo(headers.BlackElo);
  if (blackElo !== undefined) metadata.blackElo = blackElo;

  return metadata;
}

/**
 * Parse an Elo string to a number, returning undefined if invalid.
 * pgn-parser reports "?" and "-" as 0.
 */
function parseElo(elo: string | undefined): number | undefined {
  if (!elo || elo === '?' || elo === '-') {
    return undefined;
  }
  const parsed = parseInt(elo, 10);
  return isNaN(parsed) || parsed <= 0 ? undefined : parsed;
}

/**
 * Replay the main line from the raw parser output
 */
function processMoves(rawMoves: RawMove[], position: ChessPosition): MoveInfo[] {
  const moves: MoveInfo[] = [];

  for (const rawMove of rawMoves) {
    // Skip if no notation (could be a comment-only entry)
    if (!rawMove.notation?.notation) {
      continue;
    }

    const moveNumber = position.moveNumber();
    const isWhiteMove = position.turn() === 'w';
    const result = position.move(rawMove.notation.notation);

    const move: MoveInfo = {
      moveNumber,
      san: result.san,
      uci: result.uci,
      isWhiteMove,
      fenBefore: result.fenBefore,
      fenAfter: result.fenAfter,
    };
    if (rawMove.commentAfter) {
      move.commentAfter = rawMove.commentAfter;
    }
    moves.push(move);
  }

  return moves;
}
