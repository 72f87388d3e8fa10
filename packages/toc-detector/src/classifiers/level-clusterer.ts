import type { LoggerMethods } from '@pdftoc/logger';
import type {
  DocumentStatistics,
  HeadingCandidate,
  TextSpan,
} from '@pdftoc/model';

import type { LevelClustererOptions } from '../types';

import { orderBy, uniqBy } from 'es-toolkit';

import { roundToTolerance } from '../utils';

interface StyleKey {
  size: number;
  bold: boolean;
}

/**
 * LevelClusterer
 *
 * Ranks the distinct (size, bold) styles of the heading spans by prominence
 * and turns the rank into a raw level. Larger sizes come first; at equal
 * size bold comes first. With `maxLevel`, styles beyond the cap share the
 * deepest retained level, so no heading is dropped.
 */
export class LevelClusterer {
  private readonly maxLevel: number;

  constructor(
    private readonly logger: LoggerMethods,
    options?: LevelClustererOptions,
  ) {
    this.maxLevel = options?.maxLevel ?? Infinity;
  }

  cluster(
    headings: readonly TextSpan[],
    statistics: DocumentStatistics,
  ): HeadingCandidate[] {
    const styleOf = (span: TextSpan): StyleKey => ({
      size: roundToTolerance(span.fontSize, statistics.tolerance),
      bold: span.bold,
    });
    const keyOf = ({ size, bold }: StyleKey) => `${size}:${bold}`;

    const styles = orderBy(
      uniqBy(headings.map(styleOf), keyOf),
      ['size', 'bold'],
      ['desc', 'desc'],
    );

    const levels = new Map<string, number>();
    styles.forEach((style, index) => {
      const level = Math.min(index + 1, this.maxLevel);
      levels.set(keyOf(style), level);
      this.logger.debug(
        `[LevelClusterer] ${style.size}pt${style.bold ? ' bold' : ''} -> level ${level}`,
      );
    });

    this.logger.info(
      `[LevelClusterer] ${styles.length} style(s) mapped to ${Math.min(styles.length, this.maxLevel)} level(s)`,
    );

    return headings.map((span) => ({
      text: span.text,
      fontSize: span.fontSize,
      bold: span.bold,
      pageNo: span.pageNo,
      y: span.y,
      // Every style was ranked above
      rawLevel: levels.get(keyOf(styleOf(span))) ?? 1,
    }));
  }
}
