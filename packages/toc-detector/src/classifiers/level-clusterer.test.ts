import type { LoggerMethods } from '@pdftoc/logger';
import type { DocumentStatistics, TextSpan } from '@pdftoc/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { LevelClusterer } from './level-clusterer';

describe('LevelClusterer', () => {
  let mockLogger: LoggerMethods;

  const statistics: DocumentStatistics = {
    bodySize: 11,
    tolerance: 0.1,
    totalCharacters: 1000,
    histogram: [],
  };

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
  ): TextSpan => ({ text, fontSize, bold, pageNo: 1, y: 100 });

  // Document order deliberately differs from prominence order
  const headings = [
    createSpan('Term', 11, true),
    createSpan('Section', 16, true),
    createSpan('Chapter', 24, true),
    createSpan('Subsection', 16, false),
  ];

  const levelsOf = (clusterer: LevelClusterer, spans: TextSpan[]) =>
    clusterer
      .cluster(spans, statistics)
      .map((candidate) => [candidate.text, candidate.rawLevel]);

  test('ranks by size, then bold before regular', () => {
    expect(levelsOf(new LevelClusterer(mockLogger), headings)).toEqual([
      ['Term', 4],
      ['Section', 2],
      ['Chapter', 1],
      ['Subsection', 3],
    ]);
  });

  test('caps the number of levels without dropping headings', () => {
    const clusterer = new LevelClusterer(mockLogger, { maxLevel: 2 });

    expect(levelsOf(clusterer, headings)).toEqual([
      ['Term', 2],
      ['Section', 2],
      ['Chapter', 1],
      ['Subsection', 2],
    ]);
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[LevelClusterer] 4 style(s) mapped to 2 level(s)',
    );
  });

  test('groups sizes that round to the same bucket', () => {
    const result = levelsOf(new LevelClusterer(mockLogger), [
      createSpan('A1', 16.02, true),
      createSpan('A2', 15.98, true),
      createSpan('B1', 14, true),
    ]);

    expect(result).toEqual([
      ['A1', 1],
      ['A2', 1],
      ['B1', 2],
    ]);
  });

  test('keeps the span fields of each candidate', () => {
    const [candidate] = new LevelClusterer(mockLogger).cluster(
      [{ text: 'Intro', fontSize: 18.5, bold: false, pageNo: 4, y: 72 }],
      statistics,
    );

    expect(candidate).toEqual({
      text: 'Intro',
      fontSize: 18.5,
      bold: false,
      pageNo: 4,
      y: 72,
      rawLevel: 1,
    });
  });

  test('logs the style to level mapping at debug level', () => {
    new LevelClusterer(mockLogger).cluster(headings, statistics);

    expect(mockLogger.debug).toHaveBeenCalledWith(
      '[LevelClusterer] 24pt bold -> level 1',
    );
    expect(mockLogger.debug).toHaveBeenCalledWith(
      '[LevelClusterer] 16pt -> level 3',
    );
  });

  test('returns no candidates for no headings', () => {
    expect(new LevelClusterer(mockLogger).cluster([], statistics)).toEqual([]);
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[LevelClusterer] 0 style(s) mapped to 0 level(s)',
    );
  });
});
