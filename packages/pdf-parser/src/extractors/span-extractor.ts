import type { LoggerMethods } from '@pdftoc/logger';
import type { SpanDocument, TextSpan } from '@pdftoc/model';

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { PDF_PARSER } from '../config/constants';
import { PdfReadError } from '../errors';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;
type PdfPage = Awaited<ReturnType<PdfDocument['getPage']>>;
type PageViewport = ReturnType<PdfPage['getViewport']>;
type TextContentItem = Awaited<
  ReturnType<PdfPage['getTextContent']>
>['items'][number];
type TextItem = Extract<TextContentItem, { str: string }>;

interface PositionedSpan {
  span: TextSpan;
  x: number;
}

interface FontInfo {
  name?: unknown;
  bold?: unknown;
}

function isTextItem(item: TextContentItem): item is TextItem {
  return 'str' in item;
}

function isFontInfo(value: unknown): value is FontInfo {
  return typeof value === 'object' && value !== null;
}

/**
 * SpanExtractor
 *
 * Reads every page of a PDF with pdfjs-dist and emits one TextSpan per
 * non-blank text item, ordered top-to-bottom then left-to-right within a page.
 */
export class SpanExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @throws {PdfReadError} When the document cannot be opened or read
   */
  async extract(bytes: Uint8Array): Promise<SpanDocument> {
    let pdf: PdfDocument;
    try {
      // pdfjs transfers the buffer to its worker; keep the caller's copy intact
      pdf = await getDocument({
        data: new Uint8Array(bytes),
        isEvalSupported: false,
        verbosity: PDF_PARSER.PDFJS_VERBOSITY,
      }).promise;
    } catch (error) {
      throw PdfReadError.fromError('Failed to open PDF', error);
    }

    try {
      const pageHeights: number[] = [];
      const spans: TextSpan[] = [];

      for (let pageNo = 1; pageNo <= pdf.numPages; pageNo++) {
        const page = await pdf.getPage(pageNo);
        const viewport = page.getViewport({ scale: 1 });
        pageHeights.push(viewport.height);
        spans.push(...(await this.extractPage(page, pageNo, viewport)));
      }

      this.logger.info(
        `[SpanExtractor] Extracted ${spans.length} spans from ${pdf.numPages} pages`,
      );

      return { pageCount: pdf.numPages, pageHeights, spans };
    } catch (error) {
      throw PdfReadError.fromError('Failed to read PDF content', error);
    } finally {
      await pdf.destroy();
    }
  }

  private async extractPage(
    page: PdfPage,
    pageNo: number,
    viewport: PageViewport,
  ): Promise<TextSpan[]> {
    // Fonts are only resolved into commonObjs once the page has been parsed
    await page.getOperatorList();
    const content = await page.getTextContent();
    const boldFonts = new Map<string, boolean>();

    const positioned: PositionedSpan[] = [];
    for (const item of content.items) {
      if (!isTextItem(item) || item.str.trim() === '') {
        continue;
      }

      const [, , c, d, e, f] = item.transform;
      const fontSize = this.roundSize(Math.hypot(c, d));
      const [x, baseline] = this.toViewportPoint(viewport, e, f);

      let bold = boldFonts.get(item.fontName);
      if (bold === undefined) {
        bold = this.isBoldFont(page, item.fontName);
        boldFonts.set(item.fontName, bold);
      }

      positioned.push({
        span: {
          text: item.str,
          fontSize,
          bold,
          pageNo,
          y: baseline - fontSize,
        },
        x,
      });
    }

    this.logger.debug(
      `[SpanExtractor] Page ${pageNo}: ${positioned.length} spans`,
    );

    return positioned
      .sort((a, b) => a.span.y - b.span.y || a.x - b.x)
      .map(({ span }) => span);
  }

  /**
   * Text items carry pdfjs' internal font id; the PostScript name and flags
   * live on the loaded font object.
   */
  private isBoldFont(page: PdfPage, fontName: string): boolean {
    if (!page.commonObjs.has(fontName)) {
      return false;
    }

    const font: unknown = page.commonObjs.get(fontName);
    if (!isFontInfo(font)) {
      return false;
    }
    return (
      font.bold === true ||
      (typeof font.name === 'string' &&
        PDF_PARSER.BOLD_FONT_PATTERN.test(font.name))
    );
  }

  /**
   * Map a user-space point into top-left page coordinates, applying the page
   * rotation and MediaBox origin carried by the viewport transform
   */
  private toViewportPoint(
    viewport: PageViewport,
    x: number,
    y: number,
  ): [number, number] {
    const [a, b, c, d, e, f] = viewport.transform;
    return [a * x + c * y + e, b * x + d * y + f];
  }

  private roundSize(size: number): number {
    const factor = 10 ** PDF_PARSER.FONT_SIZE_PRECISION;
    return Math.round(size * factor) / factor;
  }
}
