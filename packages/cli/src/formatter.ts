import type { PluginLoadResult } from '@attachkit/core';
import type { CliError } from './errors.js';

export function formatCliError(error: CliError, json: boolean): string {
  if (json) {
    return JSON.stringify(
      {
        code: error.code,
        message: error.message,
        suggestion: error.suggestion,
        exitCode: error.exitCode,
      },
      null,
      2,
    );
  }

  const lines = [`[${error.code}] ${error.message}`];
  if (error.suggestion) {
    lines.push(`suggestion: ${error.suggestion}`);
  }
  return lines.join('\n');
}

export function formatPluginModules(results: readonly PluginLoadResult[]): string {
  if (results.length === 0) {
    return 'Plugin modules: none';
  }

  const lines = ['Plugin modules:'];
  for (const result of results) {
    const mark = result.status === 'loaded' ? '✓' : '✗';
    const reason = result.error ? ` (${result.error.message})` : '';
    lines.push(`  ${mark} ${result.specifier}${reason}`);
  }
  return lines.join('\n');
}
