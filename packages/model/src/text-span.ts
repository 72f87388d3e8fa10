/**
 * Positioned, styled text fragment
 *
 * One span per text run the extractor finds on a page. Spans are immutable
 * and live only for the duration of one pipeline run.
 *
 * @interface TextSpan
 */
export interface TextSpan {
  /**
   * Text content as extracted (not normalized)
   * @type {string}
   */
  readonly text: string;

  /**
   * Font size in PDF points
   * @type {number}
   */
  readonly fontSize: number;

  /**
   * Whether the span is set in a bold face
   * @type {boolean}
   */
  readonly bold: boolean;

  /**
   * 1-based page number
   * @type {number}
   */
  readonly pageNo: number;

  /**
   * Top edge of the span, measured from the top of the page in points
   * @type {number}
   */
  readonly y: number;
}

/**
 * All spans of one document plus the page geometry needed to locate
 * header and footer bands.
 *
 * @interface SpanDocument
 */
export interface SpanDocument {
  /**
   * Total number of pages, including pages without any text
   * @type {number}
   */
  readonly pageCount: number;

  /**
   * Page heights in points; index 0 is page 1
   * @type {number[]}
   */
  readonly pageHeights: readonly number[];

  /**
   * Spans ordered by page, then top-to-bottom within a page
   * @type {TextSpan[]}
   */
  readonly spans: readonly TextSpan[];
}
