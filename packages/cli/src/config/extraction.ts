/**
 * Translation of the CLI configuration into library settings
 */

import type { ExtractionConfig } from '@tacticforge/core';
import type { UciEngineConfig } from '@tacticforge/engine';

import type { TacticForgeConfig } from './schema.js';

/**
 * Settings for the puzzle extractor
 */
export function toExtractionConfig(config: TacticForgeConfig): ExtractionConfig {
  const { thresholds, filters, solution, analysis } = config;
  return {
    depth: analysis.depth,
    thresholds: { ...thresholds, nonInstructiveGain: filters.nonInstructiveThreshold },
    filters: {
      maxForcedPlies: filters.maxForcedPlies,
      maxCapturePlies: filters.maxCapturePlies,
      rejectNonInstructiveGain: filters.rejectNonInstructiveGain,
    },
    solution: {
      maxVariants: analysis.maxVariants,
      minSolverMoves: solution.minSolverMoves,
      maxPlies: solution.maxPlies,
    },
  };
}

/**
 * Settings for one engine process
 */
export function toEngineConfig(config: TacticForgeConfig): UciEngineConfig {
  return {
    path: config.engine.path,
    threads: config.engine.threads,
    hashMb: config.engine.hashMb,
    timeoutMs: config.engine.timeoutMs,
  };
}
