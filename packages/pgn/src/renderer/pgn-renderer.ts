import type { MoveInfo, ParsedGame } from '../index.js';

/**
 * Default maximum line length for PGN output
 */
export const DEFAULT_MAX_LINE_LENGTH = 80;

/**
 * Seven Tag Roster, with the placeholder written when a header is missing
 */
const SEVEN_TAG_ROSTER: ReadonlyArray<readonly [string, string]> = [
  ['Event', '?'],
  ['Site', '?'],
  ['Date', '????.??.??'],
  ['Round', '?'],
  ['White', '?'],
  ['Black', '?'],
  ['Result', '*'],
];

/**
 * Options for PGN rendering
 */
export interface RenderOptions {
  /**
   * Maximum line length for move text (default: 80)
   * Set to 0 to disable line wrapping
   */
  maxLineLength?: number;
}

/**
 * Render a game (start position, headers, move tree) to PGN
 *
 * @param game - The game to render
 * @param options - Optional rendering options
 * @returns Valid PGN string
 */
export function renderPgnString(game: ParsedGame, options?: RenderOptions): string {
  const result = game.headers.Result ?? game.metadata.result;
  const moveText = renderMoves(game.moves, result);

  const maxLineLength = options?.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  const body = maxLineLength > 0 ? wrapMoveText(moveText, maxLineLength) : moveText;

  return [renderTags(game), '', body].join('\n');
}

/**
 * Seven Tag Roster first, then every other header in insertion order
 */
function renderTags(game: ParsedGame): string {
  const lines: string[] = [];

  for (const [name, placeholder] of SEVEN_TAG_ROSTER) {
    lines.push(renderTag(name, game.headers[name] ?? placeholder));
  }

  for (const [name, value] of Object.entries(game.headers)) {
    if (!SEVEN_TAG_ROSTER.some(([rosterName]) => rosterName === name)) {
      lines.push(renderTag(name, value));
    }
  }

  return lines.join('\n');
}

/**
 * Render a single PGN tag
 */
function renderTag(name: string, value: string): string {
  const escapedValue = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `[${name} "${escapedValue}"]`;
}

/**
 * Render the move text section
 */
function renderMoves(moves: MoveInfo[], result: string): string {
  const parts = renderLine(moves);
  parts.push(result);
  return parts.join(' ');
}

/**
 * Render a sequence of moves. A black move gets an explicit "N..." when it
 * opens the sequence or follows a comment or a variation.
 */
function renderLine(moves: MoveInfo[]): string[] {
  const parts: string[] = [];
  let needsNumber = true;

  for (const move of moves) {
    if (move.isWhiteMove) {
      parts.push(`${move.moveNumber}.`);
    } else if (needsNumber) {
      parts.push(`${move.moveNumber}...`);
    }
    parts.push(move.san);
    needsNumber = false;

    if (move.commentAfter) {
      parts.push(`{${escapeComment(move.commentAfter)}}`);
      needsNumber = true;
    }

    for (const variation of move.variations ?? []) {
      if (variation.length === 0) continue;
      parts.push(`( ${renderLine(variation).join(' ')} )`);
      needsNumber = true;
    }
  }

  return parts;
}

/**
 * PGN comments are enclosed in braces, so closing braces are escaped
 */
function escapeComment(comment: string): string {
  return comment.replace(/\}/g, '\\}');
}

/**
 * Wrap move text to respect maximum line length
 *
 * Breaks only at spaces, never inside a comment or a variation.
 *
 * @param text - The move text to wrap
 * @param maxLength - Maximum line length
 * @returns Wrapped text with newlines
 */
export function wrapMoveText(text: string, maxLength: number): string {
  if (!text || maxLength <= 0) {
    return text;
  }

  const lines: string[] = [];
  let currentLine = '';

  for (const token of tokenizeMoveText(text)) {
    if (currentLine.length > 0 && currentLine.length + 1 + token.length > maxLength) {
      lines.push(currentLine);
      currentLine = token;
    } else {
      currentLine = currentLine.length > 0 ? `${currentLine} ${token}` : token;
    }
  }

  if (currentLine.length > 0) {
    lines.push(currentLine);
  }

  return lines.join('\n');
}

/**
 * Tokenize move text keeping comments and variations as single tokens
 */
function tokenizeMoveText(text: string): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);

    if (char === ' ') {
      i++;
    } else if (char === '{' || char === '(') {
      const end = findClosing(text, i, char, char === '{' ? '}' : ')');
      tokens.push(text.slice(i, end + 1));
      i = end + 1;
    } else {
      let j = i;
      while (j < text.length && !' {('.includes(text.charAt(j))) {
        j++;
      }
      tokens.push(text.slice(i, j));
      i = j;
    }
  }

  return tokens;
}

/**
 * Index of the bracket closing the one at `start`, or the last index
 */
function findClosing(text: string, start: number, open: string, close: string): number {
  let depth = 0;

  for (let i = start; i < text.length; i++) {
    const char = text.charAt(i);

    // Escaped characters (\} in comments) never close anything
    if (char === '\\') {
      i++;
      continue;
    }

    if (char === open) {
      depth++;
    } else if (char === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }

  return text.length - 1;
}
