export {
  CliError,
  ConfigError,
  InputError,
  BoardFileError,
  EXIT_CODES,
  type ExitCode,
} from './cli-errors.js';

export { describeError, formatError, handleError, toCliError, type ErrorReport } from './handler.js';
