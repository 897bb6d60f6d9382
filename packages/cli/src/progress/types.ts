/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output except errors */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Report every puzzle and rejected candidate (default: false) */
  verbose?: boolean;
  /** Where lines are written (default: console.log) */
  write?: (line: string) => void;
  /** Show a spinner while games are analysed (default: true) */
  spinner?: boolean;
}

/**
 * Facts about an input file shown before it is processed
 */
export interface InputSummary {
  path: string;
  sizeBytes: number;
  totalGames: number;
  /** Games skipped because an earlier run completed them */
  resumedGames: number;
}
