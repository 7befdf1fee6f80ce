/**
 * 설정 파일 로더
 *
 * 경로 결정 우선순위:
 * 1. 인자로 전달된 path
 * 2. 환경 변수 ATTACHKIT_CONFIG
 * 3. 기본값: ./attachkit.yaml (없으면 기본 설정 사용)
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import { ConfigError } from '../errors.js';
import { isRecord } from '../utils.js';
import {
  CONFIG_ENV,
  CONFIG_FILE_NAME,
  PLUGIN_PATH_ENV,
  STRICT_ENV,
  defaultConfig,
  type AttachkitConfig,
  type LoadedConfig,
} from './types.js';

export interface LoadConfigOptions {
  path?: string;
  cwd?: string;
  env?: Readonly<Record<string, string | undefined>>;
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * YAML에서 읽은 값을 AttachkitConfig로 정규화
 */
export function normalizeConfig(raw: unknown, source?: string): AttachkitConfig {
  const config = defaultConfig();
  if (raw === null || raw === undefined) {
    return config;
  }
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration root must be a mapping', { source });
  }

  const { plugins, priorities, strict, defaultDeliverer } = raw;

  if (plugins !== undefined) {
    if (!Array.isArray(plugins) || !plugins.every((item): item is string => typeof item === 'string')) {
      throw new ConfigError("'plugins' must be a list of module paths", { source });
    }
    config.plugins = [...plugins];
  }

  if (priorities !== undefined) {
    if (!isRecord(priorities)) {
      throw new ConfigError("'priorities' must map plugin names to integers", { source });
    }
    for (const [name, value] of Object.entries(priorities)) {
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new ConfigError(`Priority for '${name}' must be an integer`, { source });
      }
      config.priorities[name] = value;
    }
  }

  if (strict !== undefined) {
    if (typeof strict !== 'boolean') {
      throw new ConfigError("'strict' must be a boolean", { source });
    }
    config.strict = strict;
  }

  if (defaultDeliverer !== undefined) {
    if (typeof defaultDeliverer !== 'string' || defaultDeliverer.trim() === '') {
      throw new ConfigError("'defaultDeliverer' must be a non-empty string", { source });
    }
    config.defaultDeliverer = defaultDeliverer.trim().toLowerCase();
  }

  return config;
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isRecord(error) && error['code'] === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * 환경 변수 재정의 적용
 * ATTACHKIT_PLUGIN_PATH의 항목은 설정 파일의 plugins 뒤에 추가된다.
 */
export function applyEnvOverrides(
  config: AttachkitConfig,
  env: Readonly<Record<string, string | undefined>>
): AttachkitConfig {
  const next: AttachkitConfig = { ...config, plugins: [...config.plugins], priorities: { ...config.priorities } };

  const pluginPath = env[PLUGIN_PATH_ENV];
  if (pluginPath) {
    for (const entry of pluginPath.split(path.delimiter)) {
      const trimmed = entry.trim();
      if (trimmed && !next.plugins.includes(trimmed)) {
        next.plugins.push(trimmed);
      }
    }
  }

  const strict = env[STRICT_ENV];
  if (strict !== undefined && strict !== '') {
    next.strict = parseBoolean(strict);
  }

  return next;
}

/**
 * 설정 로드
 *
 * - 명시적으로 지정한 파일이 없으면 ConfigError
 * - 기본 경로의 파일이 없으면 기본 설정 사용
 * - YAML 파싱 실패 시 ConfigError
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.path ?? env[CONFIG_ENV];
  const filePath = path.resolve(cwd, explicit ?? CONFIG_FILE_NAME);

  let content: string | null;
  try {
    content = await readIfExists(filePath);
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file: ${filePath}`, { cause: error, source: filePath });
  }

  if (content === null) {
    if (explicit) {
      throw new ConfigError(`Configuration file not found: ${filePath}`, {
        source: filePath,
        suggestion: `Create ${CONFIG_FILE_NAME} or pass an existing file.`,
      });
    }
    return { config: applyEnvOverrides(defaultConfig(), env) };
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`YAML parse error (${filePath}): ${reason}`, { cause: error, source: filePath });
  }

  const config = normalizeConfig(raw, filePath);
  const baseDir = path.dirname(filePath);
  config.plugins = config.plugins.map((entry) =>
    entry.startsWith('.') ? path.resolve(baseDir, entry) : entry
  );

  return { config: applyEnvOverrides(config, env), source: filePath };
}
