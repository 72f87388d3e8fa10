import type { LoggerMethods } from '@pdftoc/logger';
import type {
  DocumentStatistics,
  SizeHistogramEntry,
  TextSpan,
} from '@pdftoc/model';

import type { HistogramBuilderOptions } from '../types';

import { TOC_DETECTOR } from '../config/constants';
import { TextCleaner, roundToTolerance } from '../utils';

/**
 * HistogramBuilder
 *
 * Aggregates spans into a size → character-count distribution and picks the
 * body size: the size carrying the most characters. Weighting by characters
 * keeps a large, sparse title page from being taken for body text.
 */
export class HistogramBuilder {
  private readonly tolerance: number;
  private readonly minDocumentCharacters: number;

  constructor(
    private readonly logger: LoggerMethods,
    options?: HistogramBuilderOptions,
  ) {
    this.tolerance = options?.tolerance ?? TOC_DETECTOR.SIZE_TOLERANCE;
    this.minDocumentCharacters =
      options?.minDocumentCharacters ?? TOC_DETECTOR.MIN_DOCUMENT_CHARACTERS;
  }

  /**
   * Build document statistics from the unfiltered span set
   *
   * @returns Statistics, or null when the document has too little text to
   * have a body size
   */
  build(spans: readonly TextSpan[]): DocumentStatistics | null {
    const counts = new Map<number, number>();
    let totalCharacters = 0;

    for (const span of spans) {
      const chars = TextCleaner.countCharacters(span.text);
      if (chars === 0) {
        continue;
      }
      const size = roundToTolerance(span.fontSize, this.tolerance);
      counts.set(size, (counts.get(size) ?? 0) + chars);
      totalCharacters += chars;
    }

    if (
      totalCharacters === 0 ||
      totalCharacters < this.minDocumentCharacters
    ) {
      this.logger.info(
        `[HistogramBuilder] Only ${totalCharacters} characters found (minimum ${this.minDocumentCharacters}); body size undefined`,
      );
      return null;
    }

    const histogram: SizeHistogramEntry[] = [...counts.entries()]
      .map(([size, charCount]) => ({ size, charCount }))
      .sort((a, b) => b.size - a.size);

    // Ascending scan with strict comparison: ties go to the smaller size
    let body = histogram[histogram.length - 1];
    for (let i = histogram.length - 2; i >= 0; i--) {
      if (histogram[i].charCount > body.charCount) {
        body = histogram[i];
      }
    }

    this.logHistogram(histogram, body.size);

    return {
      bodySize: body.size,
      tolerance: this.tolerance,
      totalCharacters,
      histogram,
    };
  }

  private logHistogram(
    histogram: readonly SizeHistogramEntry[],
    bodySize: number,
  ): void {
    this.logger.debug('[HistogramBuilder] Font histogram (chars per size):');
    for (const { size, charCount } of histogram) {
      const marker = size === bodySize ? ' <-- body' : '';
      this.logger.debug(
        `  ${size.toFixed(1).padStart(6)}pt: ${String(charCount).padStart(6)} chars${marker}`,
      );
    }
    this.logger.info(`[HistogramBuilder] Body size: ${bodySize}pt`);
  }
}
