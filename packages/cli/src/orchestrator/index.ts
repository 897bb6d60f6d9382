/**
 * Orchestrator module exports
 */

export type { EngineFactory, EnginePool } from './engines.js';
export { closeEngines, createEngineService, startEngines } from './engines.js';

export type {
  ExtractionRunOptions,
  ExtractionSummary,
  InputGames,
  InputPlan,
  InputResult,
} from './orchestrator.js';
export { orchestrateExtraction, readInputGames } from './orchestrator.js';
