/**
 * Path/DSL Splitter
 *
 * `locator[token1:arg1,token2]` 형태의 식별자를 locator와 명령 블록으로 분리하고,
 * 명령 블록을 토큰 목록 또는 key→value 매핑으로 해석한다.
 */

import { CommandSyntaxError } from '../errors.js';

export interface SplitResult {
  locator: string;
  /** 명령 블록 (없으면 빈 문자열) */
  block: string;
}

/**
 * 명령 토큰
 * argument가 null이면 boolean flag로 취급한다.
 */
export interface CommandToken {
  name: string;
  argument: string | null;
}

export interface CommandParseOptions {
  /** 잘못된 토큰을 무시하지 않고 CommandSyntaxError를 던짐 */
  strict?: boolean;
  logger?: Console;
}

export interface ParsedIdentifier {
  original: string;
  locator: string;
  block: string;
  tokens: CommandToken[];
  commands: Record<string, string>;
}

/**
 * 식별자를 locator와 명령 블록으로 분리
 *
 * - 마지막 `[`를 찾고 문자열이 `]`로 끝나야 한다
 * - `[` 앞 문자가 `=`이면 URL query 값으로 보고 전체를 locator로 취급
 * - 빈 블록 또는 `[`로 시작하는 문자열은 locator만 있는 것으로 취급
 */
export function splitIdentifier(identifier: string): SplitResult {
  const open = identifier.lastIndexOf('[');

  if (open === -1 || !identifier.endsWith(']') || open >= identifier.length - 1) {
    return { locator: identifier, block: '' };
  }

  const locator = identifier.slice(0, open);
  const block = identifier.slice(open + 1, -1);

  if (locator === '' && identifier.startsWith('[')) {
    return { locator: identifier, block: '' };
  }

  if (locator.endsWith('=')) {
    return { locator: identifier, block: '' };
  }

  if (block.trim() === '') {
    return { locator: identifier, block: '' };
  }

  return { locator, block: block.trim() };
}

/**
 * 최상위 쉼표로 블록을 분리 (중첩된 [...] / (...) 안의 쉼표는 유지)
 */
export function splitTopLevel(block: string, separator = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of block) {
    if (char === '[' || char === '(') {
      depth += 1;
    } else if ((char === ']' || char === ')') && depth > 0) {
      depth -= 1;
    }

    if (char === separator && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);

  return parts;
}

/**
 * 명령 블록을 순서가 있는 토큰 목록으로 해석
 * argument는 해석하지 않는다.
 */
export function parseCommandTokens(block: string, options: CommandParseOptions = {}): CommandToken[] {
  const tokens: CommandToken[] = [];

  for (const part of splitTopLevel(block)) {
    const raw = part.trim();
    if (raw === '') {
      continue;
    }

    const colon = raw.indexOf(':');
    const name = (colon === -1 ? raw : raw.slice(0, colon)).trim();
    const argument = colon === -1 ? null : raw.slice(colon + 1).trim();

    if (name === '') {
      if (options.strict) {
        throw new CommandSyntaxError(`Command token '${raw}' has no name`, block, raw);
      }
      options.logger?.warn?.(`Ignoring command token without a name: '${raw}'`);
      continue;
    }

    tokens.push({ name, argument });
  }

  return tokens;
}

/**
 * 명령 블록을 key→value 매핑으로 해석 (directive 스타일)
 * 콜론이 없는 항목은 무시하고, 같은 key는 나중 값이 우선한다.
 */
export function parseCommandMap(block: string): Record<string, string> {
  const commands: Record<string, string> = {};

  for (const part of splitTopLevel(block)) {
    const colon = part.indexOf(':');
    if (colon === -1) {
      continue;
    }
    const key = part.slice(0, colon).trim();
    if (key === '') {
      continue;
    }
    commands[key] = part.slice(colon + 1).trim();
  }

  return commands;
}

/**
 * 식별자 분리와 명령 해석을 한 번에 수행
 */
export function parseIdentifier(identifier: string, options: CommandParseOptions = {}): ParsedIdentifier {
  const { locator, block } = splitIdentifier(identifier);
  const tokens = block ? parseCommandTokens(block, options) : [];
  const commands: Record<string, string> = {};
  for (const token of tokens) {
    if (token.argument !== null) {
      commands[token.name] = token.argument;
    }
  }

  return {
    original: identifier,
    locator,
    block,
    tokens,
    commands,
  };
}
