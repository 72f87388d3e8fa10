import type { LoggerMethods } from '@pdftoc/logger';
import type { DocumentStatistics, TextSpan } from '@pdftoc/model';

import type { HeadingClassifierOptions } from '../types';

import { TOC_DETECTOR } from '../config/constants';
import { TextCleaner, roundToTolerance } from '../utils';

/**
 * HeadingClassifier
 *
 * Flags spans set larger than the body size, or at body size in bold, and
 * merges heading runs that a PDF producer split across one visual line.
 */
export class HeadingClassifier {
  private readonly lineTolerance: number;
  private readonly minHeadingLength: number;

  constructor(
    private readonly logger: LoggerMethods,
    options?: HeadingClassifierOptions,
  ) {
    this.lineTolerance = options?.lineTolerance ?? TOC_DETECTOR.LINE_TOLERANCE;
    this.minHeadingLength =
      options?.minHeadingLength ?? TOC_DETECTOR.MIN_HEADING_LENGTH;
  }

  /**
   * Return heading spans with normalized, merged text
   *
   * @param spans - Spans that survived noise filtering, in document order
   * @param statistics - Statistics of the current run
   */
  classify(
    spans: readonly TextSpan[],
    statistics: DocumentStatistics,
  ): TextSpan[] {
    const merged: TextSpan[] = [];
    // Last heading of the current run; a body span ends the run
    let previous: TextSpan | null = null;

    for (const span of spans) {
      if (!this.isHeading(span, statistics)) {
        previous = null;
        continue;
      }

      if (previous && this.isSameRun(previous, span, statistics.tolerance)) {
        const last = merged[merged.length - 1];
        merged[merged.length - 1] = {
          ...last,
          text: TextCleaner.normalize(`${last.text} ${span.text}`),
        };
      } else {
        merged.push({ ...span, text: TextCleaner.normalize(span.text) });
      }
      previous = span;
    }

    const headings = merged.filter((span) => this.isMeaningful(span.text));

    this.logger.info(
      `[HeadingClassifier] ${headings.length} heading(s) from ${spans.length} spans (body ${statistics.bodySize}pt)`,
    );

    return headings;
  }

  isHeading(span: TextSpan, statistics: DocumentStatistics): boolean {
    const size = roundToTolerance(span.fontSize, statistics.tolerance);
    return (
      size > statistics.bodySize || (size === statistics.bodySize && span.bold)
    );
  }

  private isSameRun(a: TextSpan, b: TextSpan, tolerance: number): boolean {
    return (
      a.pageNo === b.pageNo &&
      Math.abs(a.y - b.y) <= this.lineTolerance &&
      a.bold === b.bold &&
      roundToTolerance(a.fontSize, tolerance) ===
        roundToTolerance(b.fontSize, tolerance)
    );
  }

  /**
   * Stray bullets and drop caps are too short to be headings; numbered
   * headings such as "1" are kept.
   */
  private isMeaningful(text: string): boolean {
    if (text === '') {
      return false;
    }
    return text.length >= this.minHeadingLength || /^\d/.test(text);
  }
}
