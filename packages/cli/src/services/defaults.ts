import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { isRecord, type PluginApi } from '@attachkit/core';
import { registerBasePlugins } from '@attachkit/base';
import type { CliDependencies } from '../types.js';

function readCliVersion(): string {
  const packageJson = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');

  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJson, 'utf8'));
    if (isRecord(parsed) && typeof parsed['version'] === 'string') {
      return parsed['version'];
    }
  } catch {
    return '0.0.0';
  }

  return '0.0.0';
}

export function createDefaultDependencies(): CliDependencies {
  return {
    io: {
      out(message: string): void {
        process.stdout.write(`${message}\n`);
      },
      err(message: string): void {
        process.stderr.write(`${message}\n`);
      },
    },
    env: process.env,
    cwd: process.cwd(),
    version: readCliVersion(),
    // 경고와 debug는 stderr로
    logger: new console.Console({ stdout: process.stderr, stderr: process.stderr }),
    registerPlugins(api: PluginApi): void {
      registerBasePlugins(api);
    },
  };
}
