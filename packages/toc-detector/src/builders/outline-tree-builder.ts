import type { LoggerMethods } from '@pdftoc/logger';
import type { HeadingCandidate, TocEntry } from '@pdftoc/model';

import { orderBy } from 'es-toolkit';

import { nestOutline } from './level-placement';

/**
 * OutlineTreeBuilder
 *
 * Orders heading candidates by reading position (page, then top edge) and
 * nests them into a TOC forest with the level clamp.
 */
export class OutlineTreeBuilder {
  constructor(private readonly logger: LoggerMethods) {}

  build(candidates: readonly HeadingCandidate[]): TocEntry[] {
    const ordered = orderBy(candidates, ['pageNo', 'y'], ['asc', 'asc']);

    const entries = nestOutline(
      ordered.map((candidate) => ({
        title: candidate.text,
        rawLevel: candidate.rawLevel,
        pageNo: candidate.pageNo,
      })),
    );

    this.logger.info(
      `[OutlineTreeBuilder] Built ${entries.length} top-level entries from ${candidates.length} candidates`,
    );
    this.logEntries(entries);

    return entries;
  }

  private logEntries(entries: readonly TocEntry[]): void {
    for (const entry of entries) {
      this.logger.debug(
        `[OutlineTreeBuilder] ${'  '.repeat(entry.level - 1)}L${entry.level} p.${entry.pageNo} ${entry.title}`,
      );
      this.logEntries(entry.children);
    }
  }
}
