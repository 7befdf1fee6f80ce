export { pagesTransform, linesTransform } from './pages.js';
export { headTransform } from './head.js';
export { selectTransform, formatTransform, selectPath } from './data.js';
export { summaryTransform, summarizeTable, SUMMARY_COLUMNS } from './summary.js';
