/**
 * TextCleaner - Text normalization helpers for span text
 */
export class TextCleaner {
  /**
   * Normalizes text
   * - Unicode NFC
   * - Tabs, non-breaking and zero-width spaces become regular spaces
   * - Consecutive whitespace collapses to a single space
   * - Leading and trailing whitespace is trimmed
   */
  static normalize(text: string): string {
    if (!text) return '';

    return text
      .normalize('NFC')
      .replace(/[\t\u00A0\u2000-\u200B]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Number of non-whitespace characters (code points)
   */
  static countCharacters(text: string): number {
    let count = 0;
    for (const char of text) {
      if (!/\s/.test(char)) {
        count++;
      }
    }
    return count;
  }
}

/**
 * Round a font size to the given tolerance step (0.1 → one decimal).
 * Division by an integer factor keeps results such as 10.1 exact.
 */
export function roundToTolerance(size: number, tolerance: number): number {
  const factor = Math.round(1 / tolerance);
  return Math.round(size * factor) / factor;
}
