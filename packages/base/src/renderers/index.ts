export { pagedTextRenderer, structuredTextRenderer, plainTextRenderer } from './text.js';
export { tableBriefRenderer, tableFullRenderer, formatTableBrief, BRIEF_ROWS } from './table.js';
export { imageRenderer, audioRenderer } from './media.js';
export { formatPages, formatStructured, formatTable } from './format.js';
