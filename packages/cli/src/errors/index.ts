/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  FEN_SUGGESTION,
  INTERNAL_ERROR_EXIT_CODE,
  resolveAbsolutePath,
} from './cli-errors.js';

export { toCliError, formatError, handleError, withErrorHandling } from './handler.js';
