import type { TocEntry } from '@pdftoc/model';

import type { OutlineItem, TocParseResult } from '../types';

import { nestOutline } from '../builders';
import { TocParseError } from '../errors';

const INDENT = '  ';

/**
 * Title, two or more spaces, then the page suffix
 */
const PAGE_SUFFIX_PATTERN = /^(.*?)\s{2,}\(p\.\s*(\d+)\)\s*$/;

/**
 * The separator that starts a page suffix. A line containing it must end in a
 * well-formed suffix.
 */
const SUFFIX_SEPARATOR_PATTERN = /\s{2,}\(p\./;

/**
 * TocTextCodec
 *
 * Converts a TOC forest to and from the indented plain-text notation used for
 * manual correction:
 *
 * ```
 * Chapter 1  (p. 1)
 *   Section 1.1  (p. 3)
 * ```
 *
 * Each level indents by two spaces. Titles are not escaped, so a title
 * containing a line break or `"  (p. "` does not survive a round trip.
 */
export class TocTextCodec {
  /**
   * Serialize a forest in pre-order. An empty forest yields an empty string.
   */
  static serialize(entries: readonly TocEntry[]): string {
    const lines: string[] = [];
    const visit = (nodes: readonly TocEntry[]) => {
      for (const entry of nodes) {
        lines.push(
          `${INDENT.repeat(entry.level - 1)}${entry.title}${INDENT}(p. ${entry.pageNo})`,
        );
        visit(entry.children);
      }
    };
    visit(entries);

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  /**
   * Parse TOC text. Text without any non-blank line is an explicit abort.
   *
   * @throws {TocParseError} On the first malformed line; nothing is returned
   * for the other lines
   */
  static parse(text: string): TocParseResult {
    const items: OutlineItem[] = [];

    text.split(/\r?\n/).forEach((line, index) => {
      if (line.trim() === '') {
        return;
      }
      items.push(TocTextCodec.parseLine(line, index + 1));
    });

    if (items.length === 0) {
      return { kind: 'aborted' };
    }

    return { kind: 'toc', entries: nestOutline(items) };
  }

  private static parseLine(line: string, lineNo: number): OutlineItem {
    const spaces = line.length - line.replace(/^ +/, '').length;
    const content = line.slice(spaces);

    if (/^\s/.test(content)) {
      throw new TocParseError(
        'indentation must use spaces only',
        lineNo,
        line,
      );
    }
    if (spaces % 2 !== 0) {
      throw new TocParseError(
        `odd indentation (${spaces} spaces)`,
        lineNo,
        line,
      );
    }

    const rawLevel = spaces / INDENT.length + 1;
    const match = PAGE_SUFFIX_PATTERN.exec(content);

    if (!match) {
      if (SUFFIX_SEPARATOR_PATTERN.test(content)) {
        throw new TocParseError('malformed page suffix', lineNo, line);
      }
      return { title: content.trim(), rawLevel, pageNo: null };
    }

    const [, title, rawPage] = match;
    const pageNo = Number(rawPage);

    if (pageNo < 1) {
      throw new TocParseError('page number must be at least 1', lineNo, line);
    }

    return { title: title.trim(), rawLevel, pageNo };
  }
}
