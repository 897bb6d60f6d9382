import type { UciLine } from '../types/uci.js';

/**
 * Parse an `info` line carrying a score.
 *
 * Returns undefined for lines without a score (currmove, string, hashfull
 * reports) and for bound scores from a failed aspiration window, which are
 * superseded by an exact score at the same depth.
 */
export function parseInfoLine(line: string): UciLine | undefined {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== 'info') {
    return undefined;
  }

  let depth = 0;
  let multipv = 1;
  let score: UciLine['score'] | undefined;
  let pv: string[] = [];

  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];
    switch (token) {
      case 'string':
        return undefined;
      case 'depth':
        depth = parseInteger(tokens[++i]) ?? depth;
        break;
      case 'multipv':
        multipv = parseInteger(tokens[++i]) ?? multipv;
        break;
      case 'score': {
        const type = tokens[i + 1];
        const value = parseInteger(tokens[i + 2]);
        if ((type !== 'cp' && type !== 'mate') || value === undefined) {
          return undefined;
        }
        score = { type, value };
        i += 2;
        break;
      }
      case 'lowerbound':
      case 'upperbound':
        return undefined;
      case 'pv':
        pv = tokens.slice(i + 1);
        i = tokens.length;
        break;
      default:
        break;
    }
  }

  if (!score) {
    return undefined;
  }
  return { multipv, depth, score, pv };
}

/**
 * The move of a `bestmove` line, `(none)` for terminal positions
 */
export function parseBestMove(line: string): string | undefined {
  const match = /^bestmove\s+(\S+)/.exec(line.trim());
  return match?.[1];
}

/**
 * Engine name from the `id name` handshake line
 */
export function parseEngineName(line: string): string | undefined {
  const match = /^id\s+name\s+(.+)$/.exec(line.trim());
  return match?.[1];
}

function parseInteger(token: string | undefined): number | undefined {
  if (token === undefined || !/^-?\d+$/.test(token)) {
    return undefined;
  }
  return parseInt(token, 10);
}
