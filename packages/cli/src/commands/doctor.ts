/**
 * attachkit doctor
 *
 * 등록된 플러그인의 kind, priority, 비활성 사유와 플러그인 모듈 로드 결과를 출력한다.
 */

import { describeRegistry, formatRegistryReport } from '@attachkit/core';
import { formatPluginModules } from '../formatter.js';
import type { DoctorArgs } from '../parser.js';
import type { CliDependencies, ExitCode } from '../types.js';
import { createCommandContext } from './context.js';

export interface DoctorCommandInput {
  cmd: DoctorArgs;
  deps: CliDependencies;
}

export async function handleDoctor({ cmd, deps }: DoctorCommandInput): Promise<ExitCode> {
  const context = await createCommandContext(deps, { configPath: cmd.config });
  const report = describeRegistry(context.registry);
  const failed = context.plugins.filter((result) => result.status === 'failed');

  if (cmd.json) {
    deps.io.out(
      JSON.stringify(
        {
          config: context.configSource ?? null,
          registry: report,
          plugins: context.plugins.map((result) => ({
            specifier: result.specifier,
            status: result.status,
            error: result.error?.message,
          })),
        },
        null,
        2,
      ),
    );
  } else {
    deps.io.out(
      [
        `Config: ${context.configSource ?? '(defaults)'}`,
        formatRegistryReport(report),
        formatPluginModules(context.plugins),
      ].join('\n\n'),
    );
  }

  return failed.length > 0 ? 1 : 0;
}
