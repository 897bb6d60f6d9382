import { describe, it, expect } from 'vitest';

import { parseInfoLine, parseBestMove, parseEngineName } from '../uci/parser.js';

describe('parseInfoLine', () => {
  it('parses a centipawn line with MultiPV index and PV', () => {
    const line =
      'info depth 12 seldepth 18 multipv 2 score cp -35 nodes 120000 nps 900000 time 130 pv e7e5 g1f3 b8c6';

    expect(parseInfoLine(line)).toEqual({
      multipv: 2,
      depth: 12,
      score: { type: 'cp', value: -35 },
      pv: ['e7e5', 'g1f3', 'b8c6'],
    });
  });

  it('parses mate scores', () => {
    expect(parseInfoLine('info depth 5 multipv 1 score mate -2 pv h7h8 g6g7')?.score).toEqual({
      type: 'mate',
      value: -2,
    });
  });

  it('defaults the MultiPV index to 1', () => {
    expect(parseInfoLine('info depth 3 score cp 10 pv e2e4')?.multipv).toBe(1);
  });

  it('accepts a terminal position report without PV', () => {
    expect(parseInfoLine('info depth 0 score mate 0')).toEqual({
      multipv: 1,
      depth: 0,
      score: { type: 'mate', value: 0 },
      pv: [],
    });
  });

  it('ignores bound scores', () => {
    expect(parseInfoLine('info depth 20 multipv 1 score cp 80 lowerbound pv e2e4')).toBeUndefined();
    expect(parseInfoLine('info depth 20 multipv 1 score cp 80 upperbound pv e2e4')).toBeUndefined();
  });

  it('ignores lines without a score', () => {
    expect(parseInfoLine('info depth 10 currmove e2e4 currmovenumber 1')).toBeUndefined();
    expect(parseInfoLine('info string NNUE evaluation using nn.nnue score cp 5')).toBeUndefined();
    expect(parseInfoLine('readyok')).toBeUndefined();
  });
});

describe('parseBestMove', () => {
  it('extracts the move', () => {
    expect(parseBestMove('bestmove e2e4 ponder e7e5')).toBe('e2e4');
    expect(parseBestMove('bestmove (none)')).toBe('(none)');
    expect(parseBestMove('info depth 1')).toBeUndefined();
  });
});

describe('parseEngineName', () => {
  it('extracts the name from the id line', () => {
    expect(parseEngineName('id name Stockfish 16.1')).toBe('Stockfish 16.1');
    expect(parseEngineName('id author the authors')).toBeUndefined();
  });
});
