import { extname } from 'node:path';
import { Buffer } from 'node:buffer';

/**
 * 확장자 → MIME 타입
 */
export const IMAGE_TYPES: Readonly<Record<string, string>> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
};

export const AUDIO_TYPES: Readonly<Record<string, string>> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.ogg': 'audio/ogg',
  '.m4a': 'audio/mp4',
  '.flac': 'audio/flac',
};

/**
 * locator의 소문자 확장자 (URL query / fragment 제외)
 */
export function extensionOf(locator: string): string {
  const withoutQuery = locator.split(/[?#]/, 1)[0] ?? locator;
  return extname(withoutQuery).toLowerCase();
}

export function isHttpUrl(locator: string): boolean {
  return /^https?:\/\//i.test(locator);
}

export function toDataUrl(mimeType: string, data: Uint8Array): string {
  return `data:${mimeType};base64,${Buffer.from(data).toString('base64')}`;
}

export interface ParsedDataUrl {
  mimeType: string;
  data: string;
}

/**
 * base64 data URL 분해 (형식이 다르면 null)
 */
export function parseDataUrl(url: string): ParsedDataUrl | null {
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(url);
  if (!match) {
    return null;
  }
  return { mimeType: match[1] ?? '', data: match[2] ?? '' };
}

/**
 * 양의 정수 인자 해석 (없으면 기본값)
 */
export function parseCount(argument: string | null, fallback: number, name: string): number {
  if (argument === null || argument.trim() === '') {
    return fallback;
  }
  const value = Number(argument.trim());
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} expects a positive integer, got '${argument}'`);
  }
  return value;
}
