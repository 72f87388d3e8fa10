import type { LoggerMethods } from '@pdftoc/logger';
import type { SpanDocument, TextSpan } from '@pdftoc/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { TocTextCodec } from './codecs';
import { TocDetector } from './toc-detector';

describe('TocDetector', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  const createSpan = (
    text: string,
    fontSize: number,
    bold: boolean,
    pageNo: number,
    y: number,
  ): TextSpan => ({ text, fontSize, bold, pageNo, y });

  const createDocument = (
    spans: TextSpan[],
    pageCount: number,
  ): SpanDocument => ({
    pageCount,
    pageHeights: Array.from({ length: pageCount }, () => 842),
    spans,
  });

  const BODY = 'The quick survey covered every site in the district.';

  test('detects a chapter with a section on a later page', () => {
    const document = createDocument(
      [
        createSpan('Chapter 1', 24, true, 1, 100),
        createSpan(BODY, 11, false, 1, 200),
        createSpan('Section 1.1', 16, true, 3, 100),
      ],
      3,
    );

    const result = new TocDetector(mockLogger).detect(document);

    expect(TocTextCodec.serialize(result.entries)).toBe(
      'Chapter 1  (p. 1)\n  Section 1.1  (p. 3)\n',
    );
    expect(result.statistics?.bodySize).toBe(11);
    expect(result.candidateCount).toBe(2);
  });

  test('caps the depth with maxLevel without losing headings', () => {
    const document = createDocument(
      [
        createSpan('Chapter 1', 24, true, 1, 100),
        createSpan('Section 1.1', 16, true, 1, 200),
        createSpan('Subsection 1.1.1', 13, true, 1, 300),
        createSpan(BODY, 11, false, 1, 400),
        createSpan(BODY, 11, false, 2, 100),
      ],
      2,
    );

    const result = new TocDetector(mockLogger, { maxLevel: 2 }).detect(
      document,
    );

    expect(TocTextCodec.serialize(result.entries)).toBe(
      [
        'Chapter 1  (p. 1)',
        '  Section 1.1  (p. 1)',
        '  Subsection 1.1.1  (p. 1)',
        '',
      ].join('\n'),
    );
  });

  test('ignores running headers, page numbers and captions', () => {
    const spans = [1, 2, 3, 4].flatMap((pageNo) => [
      createSpan('Site Survey Report', 14, true, pageNo, 30),
      createSpan(String(pageNo), 14, true, pageNo, 810),
      createSpan(BODY, 11, false, pageNo, 300),
    ]);
    spans.push(
      createSpan('Introduction', 18, true, 1, 120),
      createSpan('Figure 2. Trench plan', 11, true, 2, 500),
      createSpan('Findings', 18, true, 3, 120),
    );

    const result = new TocDetector(mockLogger).detect(
      createDocument(spans, 4),
    );

    expect(TocTextCodec.serialize(result.entries)).toBe(
      'Introduction  (p. 1)\nFindings  (p. 3)\n',
    );
  });

  test('returns no entries when the body size is undefined', () => {
    const result = new TocDetector(mockLogger).detect(
      createDocument([createSpan('Cover', 40, true, 1, 300)], 1),
    );

    expect(result).toEqual({ entries: [], statistics: null, candidateCount: 0 });
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[TocDetector] Body size undefined, no headings',
    );
  });

  test('returns no entries for uniform body text', () => {
    const result = new TocDetector(mockLogger).detect(
      createDocument(
        [createSpan(BODY, 11, false, 1, 100), createSpan(BODY, 11, false, 2, 100)],
        2,
      ),
    );

    expect(result.entries).toEqual([]);
    expect(result.statistics?.bodySize).toBe(11);
  });

  test('keeps no state between documents', () => {
    const detector = new TocDetector(mockLogger);
    const first = createDocument(
      [createSpan('Alpha', 20, true, 1, 100), createSpan(BODY, 10, false, 1, 200)],
      1,
    );
    const second = createDocument(
      [createSpan('Beta', 16, false, 1, 100), createSpan(BODY, 12, false, 1, 200)],
      1,
    );

    detector.detect(first);
    const result = detector.detect(second);

    expect(result.entries).toEqual([
      { title: 'Beta', level: 1, pageNo: 1, children: [] },
    ]);
    expect(result.statistics?.bodySize).toBe(12);
  });
});
