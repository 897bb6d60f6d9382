/**
 * Configuration module exports
 */

// Schema types
export type {
  AnalysisProfile,
  OutputVerbosity,
  EngineConfigSchema,
  AnalysisConfigSchema,
  ThresholdsConfigSchema,
  FiltersConfigSchema,
  SolutionConfigSchema,
  OutputConfigSchema,
  TacticForgeConfig,
  CliOptions,
} from './schema.js';

// Defaults and profiles
export { ANALYSIS_PROFILES, DEFAULT_CONFIG, applyProfile } from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  analysisProfileSchema,
  outputVerbositySchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  type PartialConfig,
} from './validation.js';

// Loader
export {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  mapCliToConfig,
  formatConfig,
} from './loader.js';

// Extraction settings
export { toExtractionConfig, toEngineConfig } from './extraction.js';
