/**
 * CliError
 *
 * Base error class for command-line failures. Every CliError ends the
 * process with exit code 1.
 */
export class CliError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CliError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create CliError from unknown error with context
   */
  static fromError(context: string, error: unknown): CliError {
    return new CliError(`${context}: ${CliError.getErrorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Invalid or conflicting command-line arguments
 */
export class UsageError extends CliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UsageError';
  }
}

/**
 * Refusal to write over an existing file (or the input) without --replace.
 * Raised before anything is written.
 */
export class OutputPathCollisionError extends CliError {
  constructor(
    public readonly outputPath: string,
    reason: 'exists' | 'input',
  ) {
    super(
      reason === 'input'
        ? `Output path is the input file: ${outputPath} (use --replace to overwrite it)`
        : `Output file already exists: ${outputPath} (remove it or choose another path with -o)`,
    );
    this.name = 'OutputPathCollisionError';
  }
}

/**
 * The external editor could not be started or did not exit cleanly
 */
export class EditorError extends CliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EditorError';
  }
}
