/**
 * Character volume accumulated for one (rounded) font size
 *
 * @interface SizeHistogramEntry
 */
export interface SizeHistogramEntry {
  readonly size: number;
  readonly charCount: number;
}

/**
 * Run-scoped document statistics
 *
 * Computed once per document from the unfiltered spans and passed
 * explicitly to the classification stages.
 *
 * @interface DocumentStatistics
 */
export interface DocumentStatistics {
  /**
   * Font size carrying the largest character volume
   * @type {number}
   */
  readonly bodySize: number;

  /**
   * Rounding step applied to every font size before comparison (e.g. 0.1)
   * @type {number}
   */
  readonly tolerance: number;

  /**
   * Non-whitespace characters across all spans
   * @type {number}
   */
  readonly totalCharacters: number;

  /**
   * Histogram sorted by size, largest first
   * @type {SizeHistogramEntry[]}
   */
  readonly histogram: readonly SizeHistogramEntry[];
}
