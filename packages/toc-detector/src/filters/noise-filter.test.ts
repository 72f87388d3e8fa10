import type { LoggerMethods } from '@pdftoc/logger';
import type { SpanDocument, TextSpan } from '@pdftoc/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { NoiseFilter, PAGE_NUMBER_PATTERNS } from './noise-filter';

describe('NoiseFilter', () => {
  let mockLogger: LoggerMethods;
  let filter: NoiseFilter;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    filter = new NoiseFilter(mockLogger);
  });

  const createSpan = (
    text: string,
    pageNo: number,
    y: number,
    options?: Partial<TextSpan>,
  ): TextSpan => ({
    text,
    fontSize: 11,
    bold: false,
    pageNo,
    y,
    ...options,
  });

  // Pages are 800pt high: header band y < 80, footer band y > 720
  const createDocument = (
    spans: TextSpan[],
    pageCount: number,
  ): SpanDocument => ({
    pageCount,
    pageHeights: Array.from({ length: pageCount }, () => 800),
    spans,
  });

  const texts = (spans: TextSpan[]) => spans.map((span) => span.text);

  describe('repeating boilerplate', () => {
    test('drops header text recurring on most pages, document-wide', () => {
      const spans = [
        createSpan('Annual  Report 2024', 1, 30),
        createSpan('Introduction', 1, 120, { fontSize: 18, bold: true }),
        createSpan('Annual Report 2024', 2, 31),
        createSpan('Annual Report 2024', 2, 400, { fontSize: 18 }),
        createSpan('Annual Report 2024', 3, 30),
        createSpan('Methods', 3, 120, { fontSize: 18, bold: true }),
        createSpan('Annual Report 2024', 4, 29),
      ];

      const result = filter.filter(createDocument(spans, 4));

      expect(texts(result)).toEqual(['Introduction', 'Methods']);
    });

    test('treats header and footer bands separately', () => {
      const spans = [
        createSpan('Confidential', 1, 780),
        createSpan('Confidential', 2, 20),
        createSpan('Confidential', 3, 781),
        createSpan('Confidential', 4, 21),
      ];

      // Two pages per band out of four is not more than half
      const result = filter.filter(createDocument(spans, 4));

      expect(result).toHaveLength(4);
    });

    test('keeps text that repeats in the middle of pages', () => {
      const spans = [1, 2, 3, 4].map((pageNo) =>
        createSpan('Summary', pageNo, 400, { fontSize: 16, bold: true }),
      );

      const result = filter.filter(createDocument(spans, 4));

      expect(result).toHaveLength(4);
    });

    test('detects no boilerplate in documents shorter than the minimum', () => {
      const spans = [createSpan('Draft', 1, 20), createSpan('Draft', 2, 20)];

      expect(filter.findBoilerplate(createDocument(spans, 2)).size).toBe(0);
    });

    test('uses the A4 height when a page height is missing', () => {
      const spans = [1, 2, 3].map((pageNo) =>
        createSpan('Running title', pageNo, 50),
      );
      const document: SpanDocument = { pageCount: 3, pageHeights: [], spans };

      expect([...filter.findBoilerplate(document)]).toEqual(['Running title']);
    });

    test('classification is monotonic in the number of repeating pages', () => {
      const classify = (fraction: number) =>
        [1, 2, 3, 4, 5, 6].map((repeats) => {
          const spans = Array.from({ length: repeats }, (_, i) =>
            createSpan('Header', i + 1, 40),
          );
          return new NoiseFilter(mockLogger, {
            boilerplatePageFraction: fraction,
          })
            .findBoilerplate(createDocument(spans, 6))
            .has('Header');
        });

      expect(classify(0.5)).toEqual([false, false, false, true, true, true]);
      expect(classify(0.25)).toEqual([false, true, true, true, true, true]);
    });

    test('logs the recurring texts at debug level', () => {
      const spans = [1, 2, 3].map((pageNo) =>
        createSpan('Journal of Tests', pageNo, 790),
      );

      filter.filter(createDocument(spans, 3));

      expect(mockLogger.debug).toHaveBeenCalledWith(
        '[NoiseFilter] Filtered recurring text (1):',
      );
      expect(mockLogger.debug).toHaveBeenCalledWith('  "Journal of Tests"');
    });
  });

  describe('page-number tokens', () => {
    test('drops page numbers alone on their line', () => {
      const spans = [
        createSpan('Chapter', 1, 100, { fontSize: 20 }),
        createSpan('12', 1, 780),
        createSpan('xiv', 1, 300),
        createSpan('Page 3 of 10', 1, 500),
        createSpan('- 4 -', 1, 600),
      ];

      const result = filter.filter(createDocument(spans, 1));

      expect(texts(result)).toEqual(['Chapter']);
    });

    test('keeps numerals that share a line with other text', () => {
      const spans = [
        createSpan('Chapter', 1, 100, { fontSize: 20 }),
        createSpan('3', 1, 101.5, { fontSize: 20 }),
      ];

      const result = filter.filter(createDocument(spans, 1));

      expect(texts(result)).toEqual(['Chapter', '3']);
    });

    test('does not compare lines across pages', () => {
      const spans = [
        createSpan('Results', 1, 100, { fontSize: 20 }),
        createSpan('7', 2, 100),
      ];

      const result = filter.filter(createDocument(spans, 2));

      expect(texts(result)).toEqual(['Results']);
    });

    test('recognizes page number patterns', () => {
      const matches = (text: string) =>
        PAGE_NUMBER_PATTERNS.some((pattern) => pattern.test(text));

      expect(matches('42')).toBe(true);
      expect(matches('XIV')).toBe(true);
      expect(matches('p. 7')).toBe(true);
      expect(matches('Page 3/10')).toBe(true);
      expect(matches('3.2')).toBe(false);
      expect(matches('Civil')).toBe(false);
      expect(matches('Dive')).toBe(false);
      expect(matches('Pages')).toBe(false);
    });
  });

  describe('caption prefixes', () => {
    test('drops figure and table captions', () => {
      const spans = [
        createSpan('Figure 3: Site plan', 1, 100, { bold: true }),
        createSpan('Fig. 2 Detail', 1, 200, { bold: true }),
        createSpan('TABLE IV Results', 1, 300, { bold: true }),
        createSpan('Listing 1.', 1, 400, { bold: true }),
        createSpan('Table of Contents', 1, 500, { fontSize: 20 }),
        createSpan('Tables and Figures', 1, 600, { fontSize: 20 }),
        createSpan('Table management', 1, 650, { fontSize: 20 }),
      ];

      const result = filter.filter(createDocument(spans, 1));

      expect(texts(result)).toEqual([
        'Table of Contents',
        'Tables and Figures',
        'Table management',
      ]);
    });

    test('accepts additional caption keywords', () => {
      const custom = new NoiseFilter(mockLogger, {
        additionalCaptionKeywords: ['Abbildung'],
      });

      expect(custom.isCaption('Abbildung 4 Grundriss')).toBe(true);
      expect(filter.isCaption('Abbildung 4 Grundriss')).toBe(false);
    });
  });

  test('filtering is idempotent', () => {
    const spans = [
      createSpan('Running head', 1, 20),
      createSpan('1', 1, 20),
      createSpan('Part One', 1, 120, { fontSize: 24, bold: true }),
      createSpan('Figure 1. Map', 1, 300, { bold: true }),
      createSpan('Running head', 2, 20),
      createSpan('2', 2, 20),
      createSpan('Body text on page two', 2, 200),
      createSpan('Running head', 3, 20),
      createSpan('Section', 3, 100, { fontSize: 16 }),
      createSpan('2', 3, 100, { fontSize: 16 }),
    ];
    const document = createDocument(spans, 3);

    const once = filter.filter(document);
    const twice = filter.filter({ ...document, spans: once });

    expect(texts(once)).toEqual([
      'Part One',
      'Body text on page two',
      'Section',
      '2',
    ]);
    expect(twice).toEqual(once);
  });

  test('does not mutate the input spans', () => {
    const spans = Object.freeze([
      createSpan('12', 1, 780),
      createSpan('Heading', 1, 100, { fontSize: 20 }),
    ]);
    const document: SpanDocument = {
      pageCount: 1,
      pageHeights: [800],
      spans,
    };

    const result = filter.filter(document);

    expect(texts(result)).toEqual(['Heading']);
    expect(document.spans).toHaveLength(2);
  });
});
