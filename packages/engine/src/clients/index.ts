/**
 * Engine client exports
 */

export {
  UciEngine,
  DEFAULT_UCI_ENGINE_CONFIG,
  type UciEngineConfig,
  type EngineProcess,
  type SpawnEngine,
} from './uci-engine.js';
