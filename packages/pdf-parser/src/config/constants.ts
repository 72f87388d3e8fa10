/**
 * Configuration constants for SpanExtractor and BookmarkWriter
 */
export const PDF_PARSER = {
  /**
   * Font names matching this pattern are treated as bold faces
   */
  BOLD_FONT_PATTERN: /bold|black|heavy|semibold|demibold/i,

  /**
   * Decimal places kept for extracted font sizes
   */
  FONT_SIZE_PRECISION: 2,

  /**
   * pdfjs verbosity (0 = errors only)
   */
  PDFJS_VERBOSITY: 0,
} as const;
