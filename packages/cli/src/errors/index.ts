/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  OutputError,
  ResourceNotFoundError,
  NOT_FOUND_EXIT_CODE,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError } from './handler.js';
