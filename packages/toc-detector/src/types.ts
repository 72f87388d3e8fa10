import type { DocumentStatistics, TocEntry } from '@pdftoc/model';

/**
 * HistogramBuilder options
 */
export interface HistogramBuilderOptions {
  /**
   * Rounding step for font sizes (default: 0.1)
   */
  tolerance?: number;

  /**
   * Minimum non-whitespace characters for a body size to exist (default: 20)
   */
  minDocumentCharacters?: number;
}

/**
 * NoiseFilter options
 */
export interface NoiseFilterOptions {
  /**
   * Fraction of page height forming the header and footer bands (default: 0.1)
   */
  bandFraction?: number;

  /**
   * Band text recurring on more than this fraction of pages is dropped (default: 0.5)
   */
  boilerplatePageFraction?: number;

  /**
   * Minimum page count for boilerplate detection (default: 3)
   */
  minBoilerplatePages?: number;

  /**
   * Same-line distance in points (default: 2)
   */
  lineTolerance?: number;

  /**
   * Caption keywords added to the built-in list
   */
  additionalCaptionKeywords?: string[];
}

/**
 * HeadingClassifier options
 */
export interface HeadingClassifierOptions {
  /**
   * Same-line distance in points used when merging runs (default: 2)
   */
  lineTolerance?: number;

  /**
   * Shorter merged headings are dropped unless they start with a digit (default: 2)
   */
  minHeadingLength?: number;
}

/**
 * LevelClusterer options
 */
export interface LevelClustererOptions {
  /**
   * Deepest level produced. Unlimited when omitted.
   */
  maxLevel?: number;
}

/**
 * TocDetector options
 */
export interface TocDetectorOptions
  extends HistogramBuilderOptions,
    NoiseFilterOptions,
    HeadingClassifierOptions,
    LevelClustererOptions {}

/**
 * Flat outline item awaiting nesting.
 * `pageNo: null` means the page is inherited during nesting.
 */
export interface OutlineItem {
  title: string;
  rawLevel: number;
  pageNo: number | null;
}

/**
 * Result of one detection run
 */
export interface TocDetectionResult {
  /**
   * Detected forest; empty when no headings were found
   */
  entries: TocEntry[];

  /**
   * Statistics of the run, or null when the body size is undefined
   */
  statistics: DocumentStatistics | null;

  /**
   * Heading candidates that went into tree building
   */
  candidateCount: number;
}

/**
 * Outcome of parsing TOC text. A blank input is an explicit abort,
 * distinct from a parsed forest.
 */
export type TocParseResult =
  | { kind: 'aborted' }
  | { kind: 'toc'; entries: TocEntry[] };
