/**
 * Configuration schema types for the tacticforge CLI
 */

/**
 * Analysis profile presets
 */
export type AnalysisProfile = 'quick' | 'standard' | 'deep';

/**
 * Console output level
 */
export type OutputVerbosity = 'silent' | 'normal' | 'verbose';

/**
 * Engine process configuration
 */
export interface EngineConfigSchema {
  /** Path to a UCI engine binary */
  path: string;
  /** Threads per engine process */
  threads: number;
  /** Hash table size per engine process, in MB */
  hashMb: number;
  /** Timeout for a single analysis request */
  timeoutMs: number;
}

/**
 * Analysis configuration
 */
export interface AnalysisConfigSchema {
  /** Analysis profile preset */
  profile: AnalysisProfile;
  /** Base search depth; scan, solve and quick depths derive from it */
  depth: number;
  /** Alternatives allowed beside the main move at a solver ply */
  maxVariants: number;
  /** Engine processes analysing games in parallel */
  workers: number;
}

/**
 * Evaluation thresholds in centipawns
 */
export interface ThresholdsConfigSchema {
  blunder: number;
  alternative: number;
  unicity: number;
  winningAdvantage: number;
  drawingRange: number;
  hangingGap: number;
}

/**
 * Candidate filter configuration
 */
export interface FiltersConfigSchema {
  maxForcedPlies: number;
  maxCapturePlies: number;
  rejectNonInstructiveGain: boolean;
  nonInstructiveThreshold: number;
}

/**
 * Solution line configuration
 */
export interface SolutionConfigSchema {
  minSolverMoves: number;
  maxPlies: number;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** PGN file puzzles are written to */
  path: string;
  /** Continue from the checkpoint of an interrupted run */
  resume: boolean;
  verbosity: OutputVerbosity;
}

/**
 * Complete tacticforge configuration
 */
export interface TacticForgeConfig {
  engine: EngineConfigSchema;
  analysis: AnalysisConfigSchema;
  thresholds: ThresholdsConfigSchema;
  filters: FiltersConfigSchema;
  solution: SolutionConfigSchema;
  output: OutputConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Input PGN files */
  input?: string[];
  /** Output PGN file */
  output?: string;
  /** Path to config file */
  config?: string;
  profile?: AnalysisProfile;
  depth?: number;
  maxVariants?: number;
  minSolverMoves?: number;
  /** Engine binary path */
  engine?: string;
  threads?: number;
  /** Hash size in MB */
  hash?: number;
  workers?: number;
  /** False when --no-resume is given */
  resume?: boolean;
  rejectNonInstructive?: boolean;
  verbose?: boolean;
  silent?: boolean;
  /** Disable colored output */
  noColor?: boolean;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Validate configuration and inputs without starting the engine */
  dryRun?: boolean;
}
