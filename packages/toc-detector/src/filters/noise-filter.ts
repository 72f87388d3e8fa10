import type { LoggerMethods } from '@pdftoc/logger';
import type { SpanDocument, TextSpan } from '@pdftoc/model';

import type { NoiseFilterOptions } from '../types';

import { escapeRegExp, groupBy } from 'es-toolkit';

import { CAPTION_KEYWORDS, TOC_DETECTOR } from '../config/constants';
import { TextCleaner } from '../utils';

const ROMAN_NUMERAL =
  '(?=[ivxlcdm])m{0,4}(?:cm|cd|d?c{0,3})(?:xc|xl|l?x{0,3})(?:ix|iv|v?i{0,3})';

/**
 * Page number tokens: "12", "xiv", "Page 3", "p. 7", "Page 3 of 10", "- 4 -"
 */
export const PAGE_NUMBER_PATTERNS: readonly RegExp[] = [
  /^\d+$/,
  new RegExp(`^${ROMAN_NUMERAL}$`, 'i'),
  /^(?:page|p\.)\s*\d+(?:\s*(?:of|\/)\s*\d+)?$/i,
  /^[-–—]\s*\d+\s*[-–—]$/,
];

type Band = 'top' | 'bottom';

/**
 * NoiseFilter
 *
 * Removes spans that are structurally not headings before classification:
 * 1. Repeating boilerplate (running headers/footers)
 * 2. Page-number tokens alone on their line
 * 3. Figure/table caption prefixes
 *
 * Works on a copy; the input document is never mutated. Filtering an already
 * filtered span set removes nothing further.
 */
export class NoiseFilter {
  private readonly bandFraction: number;
  private readonly boilerplatePageFraction: number;
  private readonly minBoilerplatePages: number;
  private readonly lineTolerance: number;
  private readonly captionPattern: RegExp;

  constructor(
    private readonly logger: LoggerMethods,
    options?: NoiseFilterOptions,
  ) {
    this.bandFraction = options?.bandFraction ?? TOC_DETECTOR.BAND_FRACTION;
    this.boilerplatePageFraction =
      options?.boilerplatePageFraction ??
      TOC_DETECTOR.BOILERPLATE_PAGE_FRACTION;
    this.minBoilerplatePages =
      options?.minBoilerplatePages ?? TOC_DETECTOR.MIN_BOILERPLATE_PAGES;
    this.lineTolerance = options?.lineTolerance ?? TOC_DETECTOR.LINE_TOLERANCE;

    const keywords = [
      ...CAPTION_KEYWORDS,
      ...(options?.additionalCaptionKeywords ?? []),
    ].map(escapeRegExp);
    this.captionPattern = new RegExp(
      `^(?:${keywords.join('|')})\\s*(?:\\d|[ivx]+\\b|[.:\\-–—])`,
      'i',
    );
  }

  /**
   * Return the spans that may still be headings, in input order
   */
  filter(document: SpanDocument): TextSpan[] {
    const boilerplate = this.findBoilerplate(document);

    const kept = document.spans.filter((span) => {
      const text = TextCleaner.normalize(span.text);
      return !boilerplate.has(text) && !this.isCaption(text);
    });

    const linesByPage = groupBy(kept, (span) => span.pageNo);
    const result = kept.filter(
      (span) =>
        !this.isPageNumber(TextCleaner.normalize(span.text)) ||
        !this.isAloneOnLine(span, linesByPage[span.pageNo] ?? []),
    );

    this.logger.info(
      `[NoiseFilter] Kept ${result.length} of ${document.spans.length} spans`,
    );

    return result;
  }

  /**
   * Texts recurring in the header or footer band on more than the configured
   * fraction of pages
   */
  findBoilerplate(document: SpanDocument): Set<string> {
    const boilerplate = new Set<string>();
    if (document.pageCount < this.minBoilerplatePages) {
      return boilerplate;
    }

    const pagesByBandText = new Map<string, Set<number>>();
    for (const span of document.spans) {
      const band = this.bandOf(span, document.pageHeights);
      const text = TextCleaner.normalize(span.text);
      if (band === null || text === '') {
        continue;
      }

      const key = `${band}\u0000${text}`;
      const pages = pagesByBandText.get(key) ?? new Set<number>();
      pages.add(span.pageNo);
      pagesByBandText.set(key, pages);
    }

    const minPages = document.pageCount * this.boilerplatePageFraction;
    for (const [key, pages] of pagesByBandText) {
      if (pages.size > minPages) {
        boilerplate.add(key.slice(key.indexOf('\u0000') + 1));
      }
    }

    if (boilerplate.size > 0) {
      this.logger.debug(
        `[NoiseFilter] Filtered recurring text (${boilerplate.size}):`,
      );
      for (const text of [...boilerplate].sort()) {
        this.logger.debug(`  "${text}"`);
      }
    }

    return boilerplate;
  }

  isCaption(text: string): boolean {
    return this.captionPattern.test(text);
  }

  isPageNumber(text: string): boolean {
    return PAGE_NUMBER_PATTERNS.some((pattern) => pattern.test(text));
  }

  private isAloneOnLine(span: TextSpan, pageSpans: TextSpan[]): boolean {
    return !pageSpans.some(
      (other) =>
        other !== span && Math.abs(other.y - span.y) <= this.lineTolerance,
    );
  }

  private bandOf(span: TextSpan, pageHeights: readonly number[]): Band | null {
    const height =
      pageHeights[span.pageNo - 1] ?? TOC_DETECTOR.DEFAULT_PAGE_HEIGHT;
    if (span.y < height * this.bandFraction) {
      return 'top';
    }
    if (span.y > height * (1 - this.bandFraction)) {
      return 'bottom';
    }
    return null;
  }
}
