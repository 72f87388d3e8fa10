import type { TocEntry } from '@pdftoc/model';

/**
 * Single validation issue detected during TOC validation
 */
export interface TocValidationIssue {
  /**
   * Issue code (V001, V002, etc.)
   */
  code: string;

  /**
   * Human-readable error message
   */
  message: string;

  /**
   * Path to the problematic entry (e.g., "[0].children[2]")
   */
  path: string;

  /**
   * The problematic entry
   */
  entry: TocEntry;
}

/**
 * Result of TOC validation
 */
export interface TocValidationResult {
  valid: boolean;
  issues: TocValidationIssue[];
  errorCount: number;
}

/**
 * TocError
 *
 * Base error class for TOC detection, parsing and validation failures.
 */
export class TocError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TocError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create TocError from unknown error with context
   */
  static fromError(context: string, error: unknown): TocError {
    return new TocError(`${context}: ${TocError.getErrorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * TocParseError
 *
 * Thrown when a line of TOC text does not match the line grammar.
 * The whole import is rejected; nothing is partially applied.
 */
export class TocParseError extends TocError {
  /**
   * 1-based line number of the offending line
   */
  readonly lineNo: number;

  /**
   * The offending line, as read
   */
  readonly line: string;

  constructor(reason: string, lineNo: number, line: string) {
    super(`Malformed TOC line ${lineNo}: ${reason}: ${JSON.stringify(line)}`);
    this.name = 'TocParseError';
    this.lineNo = lineNo;
    this.line = line;
  }
}

/**
 * TocValidationError
 *
 * Thrown when a TOC violates the outline invariants or the document's page range.
 */
export class TocValidationError extends TocError {
  readonly validationResult: TocValidationResult;

  constructor(message: string, validationResult: TocValidationResult) {
    super(message);
    this.name = 'TocValidationError';
    this.validationResult = validationResult;
  }

  /**
   * Get formatted error summary
   */
  getSummary(): string {
    const { errorCount, issues } = this.validationResult;
    const lines = [
      `TOC validation failed: ${errorCount} error(s)`,
      '',
      'Issues:',
    ];

    for (const issue of issues) {
      lines.push(`  [${issue.code}] ${issue.message}`);
      lines.push(`    Path: ${issue.path}`);
      lines.push(
        `    Entry: "${issue.entry.title}" (page ${issue.entry.pageNo})`,
      );
    }

    return lines.join('\n');
  }
}
