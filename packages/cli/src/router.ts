import { CliError, toCliError } from './errors.js';
import { formatCliError } from './formatter.js';
import { formatParseError, parseArgv, type AttachkitArgs } from './parser.js';
import type { CliDependencies, ExitCode } from './types.js';
import { handleDoctor } from './commands/doctor.js';
import { handleRender } from './commands/render.js';

export async function executeCli(argv: readonly string[], deps: CliDependencies): Promise<ExitCode> {
  const result = parseArgv(argv);

  if (!result.success) {
    deps.io.err(formatParseError(result.error));
    return 2;
  }

  return runParsedCommand(result.value, deps);
}

/**
 * 파싱된 명령 실행 (오류는 CliError로 정규화해 출력)
 */
export async function runParsedCommand(cmd: AttachkitArgs, deps: CliDependencies): Promise<ExitCode> {
  const isJson = cmd.json ?? false;

  try {
    return await dispatchCommand(cmd, deps);
  } catch (error) {
    const cliError = normalizeCommandError(error);
    deps.io.err(formatCliError(cliError, isJson));
    return cliError.exitCode;
  }
}

async function dispatchCommand(cmd: AttachkitArgs, deps: CliDependencies): Promise<ExitCode> {
  switch (cmd.action) {
    case 'render':
      return handleRender({ cmd, deps });
    case 'doctor':
      return handleDoctor({ cmd, deps });
  }
}

function normalizeCommandError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  return toCliError(error);
}
