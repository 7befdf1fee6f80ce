/**
 * OpenAI Responses API 입력 형식
 */

import { defineDeliverer } from '@attachkit/core';
import { parseDataUrl } from '../utils.js';
import { combineText } from './text.js';

export type OpenAIContentBlock =
  | { type: 'input_text'; text: string }
  | { type: 'input_image'; image_url: string }
  | { type: 'input_audio'; input_audio: { data: string; format: string } };

const AUDIO_FORMATS: Readonly<Record<string, string>> = {
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
};

function audioFormat(mimeType: string): string {
  return AUDIO_FORMATS[mimeType] ?? mimeType.replace(/^audio\//, '');
}

export const openaiDeliverer = defineDeliverer('openai', (text, images, audio, prompt): OpenAIContentBlock[] => {
  const blocks: OpenAIContentBlock[] = [];

  const combined = combineText(prompt, text);
  if (combined) {
    blocks.push({ type: 'input_text', text: combined });
  }

  for (const url of images ?? []) {
    blocks.push({ type: 'input_image', image_url: url });
  }

  for (const url of audio ?? []) {
    const parsed = parseDataUrl(url);
    if (parsed) {
      blocks.push({ type: 'input_audio', input_audio: { data: parsed.data, format: audioFormat(parsed.mimeType) } });
    }
  }

  return blocks;
});
