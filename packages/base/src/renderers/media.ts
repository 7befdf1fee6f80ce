/**
 * 이미지 / 오디오 Renderer - BinaryAsset → base64 data URL
 */

import { defineRenderer, type ContentType, type Renderer } from '@attachkit/core';
import { isBinaryAsset } from '../types.js';
import { toDataUrl } from '../utils.js';

function dataUrlRenderer(name: string, contentType: Exclude<ContentType, 'text'>): Renderer {
  const prefix = `${contentType}/`;
  return defineRenderer(name, contentType, {
    match: (payload) => isBinaryAsset(payload) && payload.mimeType.startsWith(prefix),
    render: (payload) => (isBinaryAsset(payload) ? [toDataUrl(payload.mimeType, payload.data)] : []),
  });
}

export const imageRenderer = dataUrlRenderer('image-data-url', 'image');

export const audioRenderer = dataUrlRenderer('audio-data-url', 'audio');
