import type { LoggerMethods } from '@pdftoc/logger';
import type { TextSpan } from '@pdftoc/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { HistogramBuilder } from './histogram-builder';

describe('HistogramBuilder', () => {
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
    options?: Partial<TextSpan>,
  ): TextSpan => ({
    text,
    fontSize,
    bold: false,
    pageNo: 1,
    y: 100,
    ...options,
  });

  test('weights by character volume, not span count', () => {
    // 5,000 characters at 10pt in 50 spans, 200 characters at 18pt in 100 spans
    const body = Array.from({ length: 50 }, () =>
      createSpan('x'.repeat(100), 10),
    );
    const headings = Array.from({ length: 100 }, () =>
      createSpan('HH', 18, { bold: true }),
    );

    const stats = new HistogramBuilder(mockLogger).build([
      ...headings,
      ...body,
    ]);

    expect(stats?.bodySize).toBe(10);
    expect(stats?.totalCharacters).toBe(5200);
    expect(stats?.histogram).toEqual([
      { size: 18, charCount: 200 },
      { size: 10, charCount: 5000 },
    ]);
  });

  test('merges near-identical sizes within the tolerance', () => {
    const stats = new HistogramBuilder(mockLogger).build([
      createSpan('aaaaaaaaaa', 10.02),
      createSpan('bbbbbbbbbb', 9.98),
      createSpan('cccccccccccccccc', 14),
    ]);

    expect(stats?.bodySize).toBe(10);
    expect(stats?.histogram).toEqual([
      { size: 14, charCount: 16 },
      { size: 10, charCount: 20 },
    ]);
  });

  test('counts non-whitespace characters only', () => {
    const stats = new HistogramBuilder(mockLogger, {
      minDocumentCharacters: 1,
    }).build([
      createSpan('a          b', 12),
      createSpan('abc', 20),
    ]);

    expect(stats?.bodySize).toBe(20);
    expect(stats?.totalCharacters).toBe(5);
  });

  test('resolves ties to the smaller size', () => {
    const stats = new HistogramBuilder(mockLogger, {
      minDocumentCharacters: 1,
    }).build([
      createSpan('abcdefghij', 14),
      createSpan('abcdefghij', 11),
    ]);

    expect(stats?.bodySize).toBe(11);
  });

  test('returns null for a near-empty document', () => {
    const stats = new HistogramBuilder(mockLogger).build([
      createSpan('Title', 30),
      createSpan('   ', 10),
    ]);

    expect(stats).toBeNull();
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[HistogramBuilder] Only 5 characters found (minimum 20); body size undefined',
    );
  });

  test('returns null for no spans even without a character minimum', () => {
    const stats = new HistogramBuilder(mockLogger, {
      minDocumentCharacters: 0,
    }).build([]);

    expect(stats).toBeNull();
  });

  test('records the configured tolerance', () => {
    const stats = new HistogramBuilder(mockLogger, {
      tolerance: 0.5,
      minDocumentCharacters: 1,
    }).build([createSpan('body', 10.2)]);

    expect(stats?.tolerance).toBe(0.5);
    expect(stats?.bodySize).toBe(10);
  });

  test('logs the histogram at debug level with a body marker', () => {
    new HistogramBuilder(mockLogger).build([
      createSpan('x'.repeat(30), 10),
      createSpan('Heading', 16),
    ]);

    expect(mockLogger.debug).toHaveBeenCalledWith(
      '    10.0pt:     30 chars <-- body',
    );
    expect(mockLogger.debug).toHaveBeenCalledWith(
      '    16.0pt:      7 chars',
    );
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[HistogramBuilder] Body size: 10pt',
    );
  });
});
