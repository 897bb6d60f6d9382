/**
 * Extract command implementation
 */

import { parseCliOptions, VERSION } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import { toEngineConfig } from '../config/extraction.js';
import type { TacticForgeConfig } from '../config/schema.js';
import { INTERRUPTED_EXIT_CODE, InputError, resolveAbsolutePath } from '../errors/index.js';
import { closeEngines, startEngines, type EngineFactory } from '../orchestrator/engines.js';
import { orchestrateExtraction, readInputGames } from '../orchestrator/orchestrator.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter, type ProgressReporterOptions } from '../progress/reporter.js';
import { checkpointPath, loadCheckpoint } from '../resume/checkpoint.js';

export interface ExtractCommandDeps {
  env?: NodeJS.ProcessEnv;
  engineFactory?: EngineFactory;
  write?: (line: string) => void;
}

/**
 * Check inputs and configuration without starting the engine
 */
async function dryRun(
  inputs: readonly string[],
  config: TacticForgeConfig,
  reporter: ProgressReporter,
): Promise<void> {
  reporter.printMessage('Dry-run mode: validating inputs...');
  reporter.printMessage('');

  for (const inputPath of inputs) {
    const { games, skipped } = await readInputGames(inputPath, reporter);
    const detail = skipped > 0 ? ` (${skipped} skipped)` : '';
    reporter.printSuccess(`${inputPath}: ${games.length} game(s)${detail}`);

    if (config.output.resume) {
      const load = await loadCheckpoint(checkpointPath(config.output.path, inputPath), inputPath);
      if (load.status === 'loaded') {
        reporter.printMessage(`  Would resume after game ${load.checkpoint.gamesProcessed}`);
      }
    }
  }

  reporter.printMessage('');
  reporter.printMessage(`Output: ${resolveAbsolutePath(config.output.path)}`);
  reporter.printMessage('Dry-run complete. No analysis was performed.');
}

/**
 * Main extract command handler
 *
 * Errors propagate to the caller; a run stopped by SIGINT sets the exit
 * code to 130 after printing where progress was saved.
 */
export async function extractCommand(
  rawOptions: Record<string, unknown>,
  deps: ExtractCommandDeps = {},
): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const inputs = options.input ?? [];
  if (inputs.length === 0) {
    throw new InputError('No input files given', 'Pass one or more PGN files with --input');
  }

  const config = await loadConfig(options, deps.env);

  if (options.showConfig) {
    const write = deps.write ?? ((line: string) => console.log(line));
    write(formatConfigDisplay(config));
    write('');
    write('Raw configuration:');
    write(formatConfig(config));
    return;
  }

  const reporterOptions: ProgressReporterOptions = {
    color: !options.noColor,
    silent: config.output.verbosity === 'silent',
    verbose: config.output.verbosity === 'verbose',
  };
  if (deps.write) reporterOptions.write = deps.write;
  const reporter = new ProgressReporter(reporterOptions);

  reporter.printHeader(VERSION);

  if (options.dryRun) {
    await dryRun(inputs, config, reporter);
    return;
  }

  const pool = await startEngines(
    toEngineConfig(config),
    config.analysis.workers,
    deps.engineFactory,
  );

  const controller = new AbortController();
  const onSigint = (): void => {
    reporter.warn('Interrupt received, finishing the current write...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const summary = await orchestrateExtraction({
      inputs,
      config,
      engines: pool.services,
      reporter,
      signal: controller.signal,
    });

    if (summary.interrupted) {
      reporter.printInterrupted(summary.statistics, summary.checkpointFile);
      process.exitCode = INTERRUPTED_EXIT_CODE;
    } else {
      reporter.printSummary(summary.statistics, summary.outputPath);
    }
  } finally {
    process.off('SIGINT', onSigint);
    reporter.stop();
    await closeEngines(pool.engines);
  }
}
