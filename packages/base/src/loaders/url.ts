/**
 * URL Loader - http(s) 리소스 다운로드
 *
 * Content-Type에 따라 payload 종류가 정해진다.
 * - application/json, *yaml → StructuredData
 * - text/csv → Table
 * - text/*, xml, javascript → 문자열
 * - 그 외 (image/*, audio/*, application/pdf, ...) → BinaryAsset
 */

import { defineLoader, type Loader } from '@attachkit/core';
import type { BasePayload } from '../types.js';
import { parseCsv } from './csv.js';
import { parseStructured } from './structured.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_BYTES = 20_000_000;

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

export interface UrlLoaderOptions {
  fetch?: FetchFunction;
  timeoutMs?: number;
  maxBytes?: number;
  headers?: Record<string, string>;
}

function validateUrl(raw: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new Error(`Invalid URL: ${raw}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Unsupported protocol '${parsed.protocol}'. Only http: and https: are allowed.`);
  }

  return parsed;
}

async function readResponseBytes(response: Response, maxBytes: number): Promise<Uint8Array> {
  const contentLength = response.headers.get('content-length');
  if (contentLength !== null) {
    const size = Number.parseInt(contentLength, 10);
    if (!Number.isNaN(size) && size > maxBytes) {
      throw new Error(`Response too large (${size} bytes, limit ${maxBytes})`);
    }
  }

  const buffer = new Uint8Array(await response.arrayBuffer());
  if (buffer.byteLength > maxBytes) {
    throw new Error(`Response too large (${buffer.byteLength} bytes, limit ${maxBytes})`);
  }
  return buffer;
}

const TEXT_APPLICATION_TYPES = new Set(['application/xml', 'application/javascript', 'application/ecmascript']);

function isTextual(mimeType: string): boolean {
  return mimeType.startsWith('text/') || mimeType.endsWith('+xml') || TEXT_APPLICATION_TYPES.has(mimeType);
}

function toPayload(url: string, mimeType: string, body: Uint8Array): BasePayload {
  if (mimeType === 'application/json' || mimeType.endsWith('+json')) {
    return { kind: 'data', source: url, format: 'json', value: parseStructured(new TextDecoder().decode(body), 'json') };
  }
  if (mimeType.endsWith('yaml')) {
    return { kind: 'data', source: url, format: 'yaml', value: parseStructured(new TextDecoder().decode(body), 'yaml') };
  }
  if (mimeType === 'text/csv') {
    return parseCsv(new TextDecoder().decode(body), url);
  }
  if (isTextual(mimeType)) {
    return new TextDecoder().decode(body);
  }
  return { kind: 'binary', source: url, mimeType, data: body };
}

export function createUrlLoader(options: UrlLoaderOptions = {}): Loader<BasePayload> {
  const fetchImpl: FetchFunction = options.fetch ?? ((url, init) => fetch(url, init));
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;

  return defineLoader<BasePayload>('url', {
    match: (locator) => /^https?:\/\//i.test(locator),
    async load(locator, context) {
      const parsed = validateUrl(locator);
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);

      try {
        context.logger.debug?.(`[url] GET ${parsed.toString()}`);
        const response = await fetchImpl(parsed.toString(), {
          method: 'GET',
          headers: options.headers ?? {},
          signal: controller.signal,
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status} ${response.statusText} for ${parsed.toString()}`);
        }

        const mimeType = (response.headers.get('content-type') ?? 'text/plain').split(';', 1)[0]?.trim().toLowerCase() ?? 'text/plain';
        const body = await readResponseBytes(response, maxBytes);
        return toPayload(locator, mimeType, body);
      } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
          throw new Error(`Request timed out after ${timeoutMs}ms: ${locator}`);
        }
        throw error;
      } finally {
        clearTimeout(timer);
      }
    },
  });
}
