export { PdfError, PdfReadError, PdfWriteError } from './pdf-error';
