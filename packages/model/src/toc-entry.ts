/**
 * Table of Contents Entry
 *
 * Tree node of the outline. The tree root is implicit: a forest is an array of
 * level-1 entries.
 *
 * Invariants:
 * - sibling page numbers never decrease in document order
 * - a child's level is exactly its parent's level + 1
 */
export interface TocEntry {
  /**
   * Heading title
   */
  title: string;

  /**
   * Hierarchy depth (1, 2, 3...)
   */
  level: number;

  /**
   * 1-based target page number
   */
  pageNo: number;

  /**
   * Child TOC entries in document order
   */
  children: TocEntry[];
}
