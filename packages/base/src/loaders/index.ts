export { createPdfLoader } from './pdf.js';
export type { PdfLoaderOptions, PdfTextExtractor } from './pdf.js';
export { structuredLoader, parseStructured } from './structured.js';
export { csvLoader, parseCsv } from './csv.js';
export { imageLoader, audioLoader } from './media.js';
export { createUrlLoader } from './url.js';
export type { UrlLoaderOptions, FetchFunction } from './url.js';
export { pagedTextLoader, plainTextLoader, FORM_FEED } from './text.js';
