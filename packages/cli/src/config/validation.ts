/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { TacticForgeConfig } from './schema.js';

/**
 * Engine depth schema (1-99)
 */
const depthSchema = z.number().int().min(1).max(99);

/**
 * Centipawn threshold schema
 */
const centipawnSchema = z.number().int().min(0).max(10000);

/**
 * Ply count schema
 */
const pliesSchema = z.number().int().min(1).max(50);

export const analysisProfileSchema = z.enum(['quick', 'standard', 'deep']);

export const outputVerbositySchema = z.enum(['silent', 'normal', 'verbose']);

export const engineConfigSchema = z.object({
  path: z.string().min(1),
  threads: z.number().int().min(1).max(512),
  hashMb: z.number().int().min(1).max(65536),
  timeoutMs: z.number().int().min(1000),
});

export const analysisConfigSchema = z.object({
  profile: analysisProfileSchema,
  depth: depthSchema,
  maxVariants: z.number().int().min(0).max(10),
  workers: z.number().int().min(1).max(64),
});

export const thresholdsConfigSchema = z.object({
  blunder: centipawnSchema,
  alternative: centipawnSchema,
  unicity: centipawnSchema,
  winningAdvantage: centipawnSchema,
  drawingRange: centipawnSchema,
  hangingGap: centipawnSchema,
});

export const filtersConfigSchema = z.object({
  maxForcedPlies: pliesSchema,
  maxCapturePlies: pliesSchema,
  rejectNonInstructiveGain: z.boolean(),
  nonInstructiveThreshold: centipawnSchema,
});

const baseSolutionConfigSchema = z.object({
  minSolverMoves: z.number().int().min(1).max(25),
  maxPlies: pliesSchema,
});

export const solutionConfigSchema = baseSolutionConfigSchema.refine(
  (data) => data.maxPlies >= data.minSolverMoves * 2 - 1,
  {
    message: 'maxPlies is too small to hold minSolverMoves solver moves',
    path: ['maxPlies'],
  },
);

export const outputConfigSchema = z.object({
  path: z.string().min(1),
  resume: z.boolean(),
  verbosity: outputVerbositySchema,
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  engine: engineConfigSchema,
  analysis: analysisConfigSchema,
  thresholds: thresholdsConfigSchema,
  filters: filtersConfigSchema,
  solution: solutionConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment variables)
 */
export const partialConfigSchema = z.object({
  engine: engineConfigSchema.partial().optional(),
  analysis: analysisConfigSchema.partial().optional(),
  thresholds: thresholdsConfigSchema.partial().optional(),
  filters: filtersConfigSchema.partial().optional(),
  solution: baseSolutionConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
});

export type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    public readonly source?: string,
  ) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed${source ? ` (${source})` : ''}:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      `Configuration validation failed${this.source ? ` (${this.source})` : ''}:`,
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError, source?: string): ConfigValidationError {
  const errors = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  return new ConfigValidationError(errors, source);
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): TacticForgeConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration
 * @param source - Where the values came from, shown in the error
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown, source?: string): PartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error, source);
  }
  return result.data;
}
