/**
 * 텍스트 Renderer
 */

import { defineRenderer } from '@attachkit/core';
import { isPagedDocument, isStructuredData } from '../types.js';
import { formatPages, formatStructured } from './format.js';

export const pagedTextRenderer = defineRenderer('paged-text', 'text', {
  match: isPagedDocument,
  render: (payload) => (isPagedDocument(payload) ? formatPages(payload) : ''),
});

export const structuredTextRenderer = defineRenderer('structured-text', 'text', {
  match: isStructuredData,
  render: (payload) => (isStructuredData(payload) ? formatStructured(payload) : ''),
});

export const plainTextRenderer = defineRenderer('plain-text', 'text', {
  match: (payload) => typeof payload === 'string',
  render: (payload) => String(payload),
});
