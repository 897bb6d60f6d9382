/**
 * Default configuration values and profile presets
 */

import { DEFAULT_EXTRACTION_CONFIG, DEFAULT_THRESHOLDS } from '@tacticforge/core';

import type { AnalysisProfile, TacticForgeConfig } from './schema.js';

/**
 * Base search depth of each analysis profile
 */
export const ANALYSIS_PROFILES: Record<AnalysisProfile, { depth: number }> = {
  quick: { depth: 8 },
  standard: { depth: 12 },
  deep: { depth: 18 },
};

/**
 * Complete default configuration (standard profile)
 */
export const DEFAULT_CONFIG: TacticForgeConfig = {
  engine: {
    path: 'stockfish',
    threads: 1,
    hashMb: 64,
    timeoutMs: 60000,
  },
  analysis: {
    profile: 'standard',
    depth: ANALYSIS_PROFILES.standard.depth,
    maxVariants: DEFAULT_EXTRACTION_CONFIG.solution.maxVariants,
    workers: 1,
  },
  thresholds: {
    blunder: DEFAULT_THRESHOLDS.blunder,
    alternative: DEFAULT_THRESHOLDS.alternative,
    unicity: DEFAULT_THRESHOLDS.unicity,
    winningAdvantage: DEFAULT_THRESHOLDS.winningAdvantage,
    drawingRange: DEFAULT_THRESHOLDS.drawingRange,
    hangingGap: DEFAULT_THRESHOLDS.hangingGap,
  },
  filters: {
    maxForcedPlies: DEFAULT_EXTRACTION_CONFIG.filters.maxForcedPlies,
    maxCapturePlies: DEFAULT_EXTRACTION_CONFIG.filters.maxCapturePlies,
    rejectNonInstructiveGain: DEFAULT_EXTRACTION_CONFIG.filters.rejectNonInstructiveGain,
    nonInstructiveThreshold: DEFAULT_THRESHOLDS.nonInstructiveGain,
  },
  solution: {
    minSolverMoves: DEFAULT_EXTRACTION_CONFIG.solution.minSolverMoves,
    maxPlies: DEFAULT_EXTRACTION_CONFIG.solution.maxPlies,
  },
  output: {
    path: 'puzzles.pgn',
    resume: true,
    verbosity: 'normal',
  },
};

/**
 * Apply a profile preset to the configuration
 */
export function applyProfile(config: TacticForgeConfig, profile: AnalysisProfile): TacticForgeConfig {
  return {
    ...config,
    analysis: { ...config.analysis, ...ANALYSIS_PROFILES[profile], profile },
  };
}
