import { executeCli } from './router.js';
import { createDefaultDependencies } from './services/defaults.js';
import type { CliDependencies, ExitCode } from './types.js';

export { parseArgv, attachkitParser } from './parser.js';
export type { AttachkitArgs, RenderArgs, DoctorArgs } from './parser.js';
export { executeCli, runParsedCommand } from './router.js';
export { CliError, toCliError, usageError, configError } from './errors.js';
export type * from './types.js';

export async function runCli(argv: readonly string[], deps?: CliDependencies): Promise<ExitCode> {
  return executeCli(argv, deps ?? createDefaultDependencies());
}
