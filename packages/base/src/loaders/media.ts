/**
 * 이미지 / 오디오 Loader
 */

import { readFile } from 'node:fs/promises';
import { defineLoader, type Loader } from '@attachkit/core';
import type { BinaryAsset } from '../types.js';
import { AUDIO_TYPES, IMAGE_TYPES, extensionOf, isHttpUrl } from '../utils.js';

function binaryLoader(name: string, types: Readonly<Record<string, string>>): Loader<BinaryAsset> {
  return defineLoader<BinaryAsset>(name, {
    match: (locator) => !isHttpUrl(locator) && extensionOf(locator) in types,
    async load(locator) {
      const data = await readFile(locator);
      return {
        kind: 'binary',
        source: locator,
        mimeType: types[extensionOf(locator)] ?? 'application/octet-stream',
        data: new Uint8Array(data),
      };
    },
  });
}

export const imageLoader = binaryLoader('image', IMAGE_TYPES);

export const audioLoader = binaryLoader('audio', AUDIO_TYPES);
