/**
 * Anthropic Messages API 입력 형식 (user 메시지 하나)
 */

import { defineDeliverer } from '@attachkit/core';
import { parseDataUrl } from '../utils.js';
import { combineText } from './text.js';

export type ClaudeContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } };

export interface ClaudeMessage {
  role: 'user';
  content: ClaudeContentBlock[];
}

export const claudeDeliverer = defineDeliverer('claude', (text, images, _audio, prompt): ClaudeMessage[] => {
  const content: ClaudeContentBlock[] = [];

  const combined = combineText(prompt, text);
  if (combined) {
    content.push({ type: 'text', text: combined });
  }

  for (const url of images ?? []) {
    const parsed = parseDataUrl(url);
    if (parsed && parsed.mimeType.startsWith('image/')) {
      content.push({ type: 'image', source: { type: 'base64', media_type: parsed.mimeType, data: parsed.data } });
    }
  }

  return [{ role: 'user', content }];
});
