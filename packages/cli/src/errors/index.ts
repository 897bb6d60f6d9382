/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  OutputError,
  EngineError,
  PgnError,
  INTERRUPTED_EXIT_CODE,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError, createEngineError } from './handler.js';
