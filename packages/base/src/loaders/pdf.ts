/**
 * PDF Loader
 *
 * unpdf가 설치되어 있을 때만 활성화된다.
 */

import { readFile } from 'node:fs/promises';
import { defineLoader, requires, type DisabledPlugin, type Loader, type RequiresOptions } from '@attachkit/core';
import { createPagedDocument, type PagedDocument } from '../types.js';
import { extensionOf, isHttpUrl } from '../utils.js';

/**
 * PDF 바이트 → 페이지별 텍스트
 */
export type PdfTextExtractor = (data: Uint8Array) => Promise<string[]>;

export interface PdfLoaderOptions {
  extract?: PdfTextExtractor;
  gate?: RequiresOptions;
}

async function extractWithUnpdf(data: Uint8Array): Promise<string[]> {
  const { extractText, getDocumentProxy } = await import('unpdf');
  const pdf = await getDocumentProxy(data);
  const { text } = await extractText(pdf, { mergePages: false });
  return text;
}

export function createPdfLoader(options: PdfLoaderOptions = {}): Loader<PagedDocument> | DisabledPlugin {
  const extract = options.extract ?? extractWithUnpdf;

  return requires(
    ['unpdf'],
    defineLoader<PagedDocument>('pdf', {
      match: (locator) => !isHttpUrl(locator) && extensionOf(locator) === '.pdf',
      async load(locator) {
        const data = new Uint8Array(await readFile(locator));
        const pages = await extract(data);
        return createPagedDocument(locator, pages);
      },
    }),
    { resolveFrom: import.meta.url, ...options.gate }
  );
}
