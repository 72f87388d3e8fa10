/**
 * @pdftoc/pdf-parser
 *
 * PDF boundary of the pipeline: span extraction with pdfjs-dist and outline
 * writing with pdf-lib.
 *
 * @packageDocumentation
 */

export { SpanExtractor } from './extractors';
export { BookmarkWriter } from './writers';
export { PdfError, PdfReadError, PdfWriteError } from './errors';
export { PDF_PARSER } from './config/constants';
