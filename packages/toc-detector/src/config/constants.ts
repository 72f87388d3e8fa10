/**
 * Configuration constants for TocDetector and its stages
 */
export const TOC_DETECTOR = {
  /**
   * Rounding step for font sizes. Sizes closer than this merge into one bucket.
   */
  SIZE_TOLERANCE: 0.1,

  /**
   * Below this many non-whitespace characters the body size is undefined
   */
  MIN_DOCUMENT_CHARACTERS: 20,

  /**
   * Vertical distance (points) within which two spans count as the same line
   */
  LINE_TOLERANCE: 2,

  /**
   * Fraction of the page height at the top and at the bottom treated as
   * header/footer bands
   */
  BAND_FRACTION: 0.1,

  /**
   * A band text is boilerplate when it recurs on more than this fraction of pages
   */
  BOILERPLATE_PAGE_FRACTION: 0.5,

  /**
   * Documents shorter than this have no detectable boilerplate
   */
  MIN_BOILERPLATE_PAGES: 3,

  /**
   * Page height assumed when the extractor reports none (A4 portrait)
   */
  DEFAULT_PAGE_HEIGHT: 842,

  /**
   * Headings shorter than this are dropped unless they start with a digit
   */
  MIN_HEADING_LENGTH: 2,
} as const;

/**
 * Caption keywords. A span starting with one of these followed by a numeral
 * or punctuation is a figure/table caption, not a section heading.
 */
export const CAPTION_KEYWORDS = [
  'Figure',
  'Fig.',
  'Table',
  'Listing',
  'Algorithm',
  'Chart',
  'Exhibit',
  'Plate',
] as const;
