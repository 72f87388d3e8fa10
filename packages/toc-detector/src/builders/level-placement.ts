import type { TocEntry } from '@pdftoc/model';

import type { OutlineItem } from '../types';

/**
 * Result of placing one raw level against the open ancestors
 */
export interface LevelPlacement {
  /**
   * Raw levels of the ancestors still open after placement, the placed
   * item last
   */
  openRawLevels: number[];

  /**
   * Effective level of the placed item
   */
  level: number;
}

/**
 * Level clamp shared by tree building and TOC text parsing.
 *
 * Ancestors whose raw level is at or below the new item's rank (raw level
 * `>=` L) are closed; the item sits one deeper than what remains open. A jump
 * from level 1 straight to raw level 3 therefore lands on level 2, and an
 * item never ends up deeper than its predecessor + 1.
 */
export function placeLevel(
  openRawLevels: readonly number[],
  rawLevel: number,
): LevelPlacement {
  const open = [...openRawLevels];
  while (open.length > 0 && open[open.length - 1] >= rawLevel) {
    open.pop();
  }

  const level = open.length + 1;
  open.push(rawLevel);

  return { openRawLevels: open, level };
}

/**
 * Nest flat items, in order, into a forest using {@link placeLevel}.
 *
 * An item without a page takes the page of its previous sibling, or page 1
 * when it is the first of its siblings.
 */
export function nestOutline(items: readonly OutlineItem[]): TocEntry[] {
  const roots: TocEntry[] = [];
  let openRawLevels: number[] = [];
  let ancestors: TocEntry[] = [];

  for (const item of items) {
    const placement = placeLevel(openRawLevels, item.rawLevel);
    openRawLevels = placement.openRawLevels;
    ancestors = ancestors.slice(0, placement.level - 1);

    const parent = ancestors.at(-1);
    const siblings = parent ? parent.children : roots;
    const entry: TocEntry = {
      title: item.title,
      level: placement.level,
      pageNo: item.pageNo ?? siblings.at(-1)?.pageNo ?? 1,
      children: [],
    };

    siblings.push(entry);
    ancestors.push(entry);
  }

  return roots;
}
