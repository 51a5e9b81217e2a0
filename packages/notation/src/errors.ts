/**
 * Error thrown when a square or move is not in coordinate notation
 */
export class InvalidNotationError extends Error {
  constructor(public readonly text: string) {
    super(`Invalid notation: "${text}"`);
    this.name = 'InvalidNotationError';
  }
}

/**
 * Error thrown when board file parsing fails
 */
export class BoardParseError extends Error {
  constructor(
    message: string,
    public line?: number,
    public column?: number,
  ) {
    super(message);
    this.name = 'BoardParseError';
  }
}
