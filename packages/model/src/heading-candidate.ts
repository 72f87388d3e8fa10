/**
 * Span classified as a heading, with its prominence level before tree repair
 *
 * @interface HeadingCandidate
 */
export interface HeadingCandidate {
  /**
   * Normalized heading text (merged across same-line runs)
   * @type {string}
   */
  readonly text: string;

  readonly fontSize: number;
  readonly bold: boolean;

  /**
   * Page of the first span of the heading (1-based)
   * @type {number}
   */
  readonly pageNo: number;

  readonly y: number;

  /**
   * Prominence rank from clustering (1 = most prominent).
   * Not guaranteed to be contiguous along document order.
   * @type {number}
   */
  readonly rawLevel: number;
}
