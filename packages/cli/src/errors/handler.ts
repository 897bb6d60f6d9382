/**
 * Error handling utilities
 */

import { EngineClientError, EngineStartError } from '@tacticforge/engine';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, EngineError } from './cli-errors.js';

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  let exitCode = 1;
  if (error instanceof CliError) {
    exitCode = error.exitCode;
  }

  process.exit(exitCode);
}

/**
 * Create an engine error with helpful suggestion
 */
export function createEngineError(enginePath: string, error: unknown): EngineError {
  if (error instanceof EngineStartError) {
    return new EngineError(
      enginePath,
      error.details ?? 'the engine did not complete the UCI handshake',
      'Install Stockfish or point --engine (or TACTICFORGE_ENGINE_PATH) at a UCI engine binary',
    );
  }
  if (error instanceof EngineClientError) {
    return new EngineError(enginePath, error.message);
  }
  return new EngineError(enginePath, error instanceof Error ? error.message : String(error));
}
