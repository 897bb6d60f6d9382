/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Exit code of a run stopped by SIGINT
 */
export const INTERRUPTED_EXIT_CODE = 130;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Input file error
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * Output file error
 */
export class OutputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'OutputError';
  }
}

/**
 * Engine start-up or communication error
 */
export class EngineError extends CliError {
  constructor(
    public readonly enginePath: string,
    message: string,
    suggestion?: string,
  ) {
    super(message, suggestion);
    this.name = 'EngineError';
  }

  override format(): string {
    const lines = [`Error [engine ${this.enginePath}]: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * PGN parse error wrapper
 */
export class PgnError extends CliError {
  constructor(
    message: string,
    public readonly file?: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(message, 'Check that the file contains valid PGN');
    this.name = 'PgnError';
  }

  override format(): string {
    const position =
      this.line !== undefined
        ? `line ${this.line}${this.column !== undefined ? `, column ${this.column}` : ''}`
        : undefined;
    const location = [this.file, position].filter((part) => part !== undefined).join(', ');
    return `PGN Parse Error${location ? ` (${location})` : ''}: ${this.message}`;
  }
}
