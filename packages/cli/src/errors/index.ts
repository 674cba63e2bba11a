/**
 * Error module exports
 */

export { CliError, ConfigError, InputError } from './cli-errors.js';

export {
  formatError,
  handleError,
  exitCodeFor,
  EXIT_INPUT_ERROR,
  EXIT_UNEXPECTED_ERROR,
} from './handler.js';
