import type { TocEntry } from '@pdftoc/model';

import type { TocValidationIssue, TocValidationResult } from '../errors';

import { TocValidationError } from '../errors';

/**
 * Validation options for TocValidator
 */
export interface TocValidationOptions {
  /**
   * Total page count of the document (for range validation)
   * If not provided, page range upper bound validation is skipped
   */
  totalPages?: number;
}

/**
 * Default validation options
 */
const DEFAULT_OPTIONS: Required<TocValidationOptions> = {
  totalPages: Infinity,
};

/**
 * TocValidator
 *
 * Checks a TOC forest against the outline invariants and the document's page
 * range before it is written:
 * - V001: sibling page numbers never decrease
 * - V002: page numbers lie within 1..totalPages
 * - V003: titles are not blank
 * - V007: levels start at 1 and grow by exactly one per nesting step
 */
export class TocValidator {
  private readonly options: Required<TocValidationOptions>;

  constructor(options?: TocValidationOptions) {
    this.options = {
      ...DEFAULT_OPTIONS,
      ...options,
    };
  }

  /**
   * Validate TocEntry array
   *
   * @param entries - TOC entries to validate
   * @returns Validation result
   */
  validate(entries: readonly TocEntry[]): TocValidationResult {
    const issues: TocValidationIssue[] = [];

    this.validateEntries(entries, '', null, issues);

    return {
      valid: issues.length === 0,
      issues,
      errorCount: issues.length,
    };
  }

  /**
   * Validate and throw if invalid
   *
   * @param entries - TOC entries to validate
   * @throws {TocValidationError} When validation fails
   */
  validateOrThrow(entries: readonly TocEntry[]): void {
    const result = this.validate(entries);

    if (!result.valid) {
      throw new TocValidationError(
        `TOC validation failed with ${result.errorCount} error(s)`,
        result,
      );
    }
  }

  /**
   * Recursively validate entries
   */
  private validateEntries(
    entries: readonly TocEntry[],
    parentPath: string,
    parent: TocEntry | null,
    issues: TocValidationIssue[],
  ): void {
    let prevPageNo: number | null = null;

    entries.forEach((entry, i) => {
      const path = parentPath ? `${parentPath}.children[${i}]` : `[${i}]`;

      // V003: Empty title
      if (entry.title.trim() === '') {
        issues.push({
          code: 'V003',
          message: 'Title is empty or contains only whitespace',
          path,
          entry,
        });
      }

      // V002: Page range
      if (entry.pageNo < 1) {
        issues.push({
          code: 'V002',
          message: `Page number must be >= 1, got ${entry.pageNo}`,
          path,
          entry,
        });
      } else if (entry.pageNo > this.options.totalPages) {
        issues.push({
          code: 'V002',
          message: `Page number ${entry.pageNo} exceeds document total pages (${this.options.totalPages})`,
          path,
          entry,
        });
      }

      // V001: Page order (within same level)
      if (prevPageNo !== null && entry.pageNo < prevPageNo) {
        issues.push({
          code: 'V001',
          message: `Page number decreased from ${prevPageNo} to ${entry.pageNo}`,
          path,
          entry,
        });
      }
      prevPageNo = entry.pageNo;

      // V007: Level continuity
      const expectedLevel = parent ? parent.level + 1 : 1;
      if (entry.level !== expectedLevel) {
        issues.push({
          code: 'V007',
          message: `Level ${entry.level} does not follow ${parent ? `parent level ${parent.level}` : 'the top level'} (expected ${expectedLevel})`,
          path,
          entry,
        });
      }

      if (entry.children.length > 0) {
        this.validateEntries(entry.children, path, entry, issues);
      }
    });
  }
}
