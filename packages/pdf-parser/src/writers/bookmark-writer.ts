import type { LoggerMethods } from '@pdftoc/logger';
import type { TocEntry } from '@pdftoc/model';
import type { PDFContext, PDFPage, PDFRef } from 'pdf-lib';

import { PDFDocument, PDFHexString, PDFName, PDFNumber } from 'pdf-lib';

import { PdfReadError, PdfWriteError } from '../errors';

interface OutlineLevel {
  /**
   * First and last item written at this level
   */
  first: PDFRef;
  last: PDFRef;

  /**
   * Items written at this level, descendants included
   */
  count: number;
}

/**
 * BookmarkWriter
 *
 * Writes a TOC forest as the document's native outline (bookmarks), replacing
 * any outline the document already has. Every item opens its target page
 * with a `/Fit` destination; all items start expanded.
 */
export class BookmarkWriter {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @throws {PdfReadError} When the document cannot be loaded
   */
  async getPageCount(bytes: Uint8Array): Promise<number> {
    const pdf = await this.load(bytes);
    return pdf.getPageCount();
  }

  /**
   * Return a copy of the document with the given outline
   *
   * @throws {PdfReadError} When the document cannot be loaded
   * @throws {PdfWriteError} When an entry targets a page outside the document
   * or the document cannot be saved
   */
  async write(
    bytes: Uint8Array,
    entries: readonly TocEntry[],
  ): Promise<Uint8Array> {
    const pdf = await this.load(bytes);
    const pages = pdf.getPages();
    this.assertPagesInRange(entries, pages.length);

    const outlinesRef = pdf.context.nextRef();
    const level = this.writeLevel(pdf.context, entries, outlinesRef, pages);

    if (level) {
      pdf.context.assign(
        outlinesRef,
        pdf.context.obj({
          Type: 'Outlines',
          First: level.first,
          Last: level.last,
          Count: level.count,
        }),
      );
      pdf.catalog.set(PDFName.of('Outlines'), outlinesRef);
      pdf.catalog.set(PDFName.of('PageMode'), PDFName.of('UseOutlines'));
    } else {
      pdf.catalog.delete(PDFName.of('Outlines'));
    }

    this.logger.info(
      `[BookmarkWriter] Wrote ${level?.count ?? 0} bookmarks over ${pages.length} pages`,
    );

    try {
      return await pdf.save();
    } catch (error) {
      throw PdfWriteError.fromError('Failed to save PDF', error);
    }
  }

  private async load(bytes: Uint8Array): Promise<PDFDocument> {
    try {
      return await PDFDocument.load(bytes, { updateMetadata: false });
    } catch (error) {
      throw PdfReadError.fromError('Failed to open PDF', error);
    }
  }

  private assertPagesInRange(
    entries: readonly TocEntry[],
    pageCount: number,
  ): void {
    for (const entry of entries) {
      if (entry.pageNo < 1 || entry.pageNo > pageCount) {
        throw new PdfWriteError(
          `Bookmark "${entry.title}" targets page ${entry.pageNo}, but the document has ${pageCount} pages`,
        );
      }
      this.assertPagesInRange(entry.children, pageCount);
    }
  }

  /**
   * Write one sibling chain under `parentRef`, ancestors before descendants
   *
   * @returns The chain's end points, or null for no entries
   */
  private writeLevel(
    context: PDFContext,
    entries: readonly TocEntry[],
    parentRef: PDFRef,
    pages: readonly PDFPage[],
  ): OutlineLevel | null {
    if (entries.length === 0) {
      return null;
    }

    const refs = entries.map(() => context.nextRef());
    let count = 0;

    entries.forEach((entry, i) => {
      const item = context.obj({
        Title: PDFHexString.fromText(entry.title),
        Parent: parentRef,
        Dest: [pages[entry.pageNo - 1].ref, 'Fit'],
      });

      if (i > 0) {
        item.set(PDFName.of('Prev'), refs[i - 1]);
      }
      if (i < refs.length - 1) {
        item.set(PDFName.of('Next'), refs[i + 1]);
      }

      context.assign(refs[i], item);

      const children = this.writeLevel(context, entry.children, refs[i], pages);
      if (children) {
        item.set(PDFName.of('First'), children.first);
        item.set(PDFName.of('Last'), children.last);
        item.set(PDFName.of('Count'), PDFNumber.of(children.count));
        count += children.count;
      }
      count++;
    });

    return { first: refs[0], last: refs[refs.length - 1], count };
  }
}
