/**
 * Errors surfaced to the player by the checkless command
 */

/**
 * Process exit codes, following the BSD sysexits values where one fits
 */
export const EXIT_CODES = {
  failure: 1,
  usage: 64,
  data: 65,
  noInput: 66,
  internal: 70,
  config: 78,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * An error with a short label, an optional hint and the exit code to leave with
 */
export class CliError extends Error {
  /** Shown in front of the message */
  readonly label: string = 'Error';

  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: ExitCode = EXIT_CODES.failure,
  ) {
    super(message);
    this.name = 'CliError';
  }

  format(): string {
    const head = `${this.label}: ${this.message}`;
    return this.suggestion ? `${head}\n  hint: ${this.suggestion}` : head;
  }
}

/**
 * The config file could not be found or read
 */
export class ConfigError extends CliError {
  override readonly label = 'Config error';

  constructor(message: string, suggestion?: string) {
    super(message, suggestion, EXIT_CODES.config);
    this.name = 'ConfigError';
  }
}

/**
 * The board file could not be read
 */
export class InputError extends CliError {
  override readonly label = 'Input error';

  constructor(message: string, suggestion?: string) {
    super(message, suggestion, EXIT_CODES.noInput);
    this.name = 'InputError';
  }
}

const BOARD_HINT = 'Boards are 8 rows of . P R B Q K p r b q k followed by W or B';

/**
 * The board file was read but does not hold a valid board
 */
export class BoardFileError extends CliError {
  override readonly label = 'Board file error';

  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(message, BOARD_HINT, EXIT_CODES.data);
    this.name = 'BoardFileError';
  }

  /** `file:line:column`, as far as it is known */
  get location(): string {
    if (this.line === undefined) return this.filePath;
    return this.column === undefined
      ? `${this.filePath}:${this.line}`
      : `${this.filePath}:${this.line}:${this.column}`;
  }

  override format(): string {
    return `${this.label} at ${this.location}: ${this.message}\n  hint: ${BOARD_HINT}`;
  }
}
