/**
 * JSON / YAML Loader
 */

import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { defineLoader } from '@attachkit/core';
import type { StructuredData, StructuredFormat } from '../types.js';
import { extensionOf, isHttpUrl } from '../utils.js';

const FORMATS: Readonly<Record<string, StructuredFormat>> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

export function parseStructured(content: string, format: StructuredFormat): unknown {
  return format === 'json' ? JSON.parse(content) : YAML.parse(content);
}

export const structuredLoader = defineLoader<StructuredData>('structured', {
  match: (locator) => !isHttpUrl(locator) && extensionOf(locator) in FORMATS,
  async load(locator) {
    const format = FORMATS[extensionOf(locator)] ?? 'json';
    const content = await readFile(locator, 'utf8');
    return { kind: 'data', source: locator, format, value: parseStructured(content, format) };
  },
});
