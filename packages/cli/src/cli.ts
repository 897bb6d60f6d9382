/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { AnalysisProfile, CliOptions } from './config/schema.js';
import { ConfigError } from './errors/cli-errors.js';

export const VERSION = '0.1.0';

const PROFILES: readonly AnalysisProfile[] = ['quick', 'standard', 'deep'];

/**
 * Profile descriptions for help text
 */
const PROFILE_HELP = `Analysis profile:
    quick    - Shallow search (depth 8)
    standard - Balanced search (depth 12) [default]
    deep     - Thorough search (depth 18)`;

const DEPTH_HELP = `Base search depth; the scan runs at half of it
    and solutions at one and a half times it`;

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function isProfile(value: string): value is AnalysisProfile {
  return PROFILES.some((profile) => profile === value);
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('tacticforge')
    .description('Extract tactical puzzles from PGN games using a UCI engine')
    .version(VERSION);

  program
    .command('extract')
    .description('Scan PGN files for blunders and write the puzzles they create')
    .requiredOption('-i, --input <files...>', 'Input PGN files')
    .option('-o, --output <file>', 'Output PGN file (default: puzzles.pgn)')
    .option('-c, --config <file>', 'Path to config file')
    .option('-p, --profile <profile>', PROFILE_HELP)
    .option('-d, --depth <plies>', DEPTH_HELP, parseInteger)
    .option('--max-variants <count>', 'Alternative solver moves kept per puzzle', parseInteger)
    .option('--min-solver-moves <count>', 'Shortest solution accepted, in solver moves', parseInteger)
    .option('--engine <path>', 'UCI engine binary (default: stockfish)')
    .option('--threads <count>', 'Engine threads per worker', parseInteger)
    .option('--hash <mb>', 'Engine hash size per worker in MB', parseInteger)
    .option('-w, --workers <count>', 'Games analysed in parallel, one engine each', parseInteger)
    .option('--no-resume', 'Ignore checkpoints and start every input from the first game')
    .option('--reject-non-instructive', 'Reject puzzles that only win material already won')
    .option('--verbose', 'Report every accepted and rejected candidate')
    .option('--silent', 'Print nothing but errors')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--dry-run', 'Validate configuration and inputs without starting the engine')
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { extractCommand } = await import('./commands/extract.js');
      await extractCommand(options);
    });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function numberOption(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  return typeof value === 'number' ? value : undefined;
}

function flagOption(options: Record<string, unknown>, key: string): boolean {
  return options[key] === true;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const input = options['input'];
  if (typeof input === 'string') {
    result.input = [input];
  } else if (Array.isArray(input)) {
    result.input = input.filter((item): item is string => typeof item === 'string');
  }

  const output = stringOption(options, 'output');
  if (output !== undefined) result.output = output;
  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;

  const profile = stringOption(options, 'profile');
  if (profile !== undefined) {
    if (!isProfile(profile)) {
      throw new ConfigError(
        `Unknown profile "${profile}"`,
        `Use one of: ${PROFILES.join(', ')}`,
      );
    }
    result.profile = profile;
  }

  const depth = numberOption(options, 'depth');
  if (depth !== undefined) result.depth = depth;
  const maxVariants = numberOption(options, 'maxVariants');
  if (maxVariants !== undefined) result.maxVariants = maxVariants;
  const minSolverMoves = numberOption(options, 'minSolverMoves');
  if (minSolverMoves !== undefined) result.minSolverMoves = minSolverMoves;
  const engine = stringOption(options, 'engine');
  if (engine !== undefined) result.engine = engine;
  const threads = numberOption(options, 'threads');
  if (threads !== undefined) result.threads = threads;
  const hash = numberOption(options, 'hash');
  if (hash !== undefined) result.hash = hash;
  const workers = numberOption(options, 'workers');
  if (workers !== undefined) result.workers = workers;

  // Commander sets negated flags to true when absent; only the explicit form counts
  if (options['resume'] === false) result.resume = false;
  if (options['color'] === false) result.noColor = true;

  if (flagOption(options, 'rejectNonInstructive')) result.rejectNonInstructive = true;
  if (flagOption(options, 'verbose')) result.verbose = true;
  if (flagOption(options, 'silent')) result.silent = true;
  if (flagOption(options, 'showConfig')) result.showConfig = true;
  if (flagOption(options, 'dryRun')) result.dryRun = true;

  return result;
}
