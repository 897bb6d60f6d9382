import type { AnalysisContext } from '../engine/analysis.js';
import type { ExtractionConfig } from '../pipeline/config.js';
import type { Candidate, FilterResult } from '../types/puzzle.js';

export interface FilterContext {
  analysis: AnalysisContext;
  config: ExtractionConfig;
}

/**
 * One step of the candidate filter chain
 *
 * A stage either rejects the candidate or passes it on, possibly with a
 * new adjusted position.
 */
export type FilterStage = (candidate: Candidate, context: FilterContext) => Promise<FilterResult>;
