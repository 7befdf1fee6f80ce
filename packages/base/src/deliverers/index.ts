export { openaiDeliverer } from './openai.js';
export type { OpenAIContentBlock } from './openai.js';
export { claudeDeliverer } from './claude.js';
export type { ClaudeContentBlock, ClaudeMessage } from './claude.js';
export { combineText } from './text.js';
