/**
 * PdfError
 *
 * Base error class for reading and writing PDF documents.
 */
export class PdfError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PdfError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create PdfError from unknown error with context
   */
  static fromError(context: string, error: unknown): PdfError {
    return new PdfError(`${context}: ${PdfError.getErrorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * PdfReadError
 *
 * The source document could not be opened or its content could not be read.
 * Fatal: nothing downstream can run without the document.
 */
export class PdfReadError extends PdfError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PdfReadError';
  }

  static fromError(context: string, error: unknown): PdfReadError {
    return new PdfReadError(
      `${context}: ${PdfError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * PdfWriteError
 *
 * The outline could not be written, e.g. a bookmark points outside the
 * document.
 */
export class PdfWriteError extends PdfError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PdfWriteError';
  }

  static fromError(context: string, error: unknown): PdfWriteError {
    return new PdfWriteError(
      `${context}: ${PdfError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
