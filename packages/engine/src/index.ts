/**
 * @tacticforge/engine - UCI chess engine client
 *
 * Runs an engine binary (Stockfish or any UCI engine) as a child process
 * and exposes depth-limited MultiPV analysis.
 */

export const VERSION = '0.1.0';

export {
  UciEngine,
  DEFAULT_UCI_ENGINE_CONFIG,
  type UciEngineConfig,
  type EngineProcess,
  type SpawnEngine,
} from './clients/index.js';

export type { UciScore, UciLine, AnalyseOptions } from './types/index.js';

export { parseInfoLine, parseBestMove, parseEngineName } from './uci/index.js';

export {
  EngineClientError,
  EngineStartError,
  EngineTimeoutError,
  EngineClosedError,
  EngineProtocolError,
} from './errors.js';
