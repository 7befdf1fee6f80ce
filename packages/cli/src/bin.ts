#!/usr/bin/env node

import { run } from '@optique/run';
import { message } from '@optique/core/message';
import { attachkitParser } from './parser.js';
import { runParsedCommand } from './router.js';
import { createDefaultDependencies } from './services/defaults.js';

async function main(): Promise<void> {
  const deps = createDefaultDependencies();

  // run()이 --help, --version, parse error를 처리하고 process.exit
  const cmd = run(attachkitParser, {
    programName: 'attachkit',
    args: process.argv.slice(2),
    help: 'both',
    version: deps.version,
    brief: message`Load, transform and render attachments for LLM prompts`,
    aboveError: 'usage',
  });

  process.exitCode = await runParsedCommand(cmd, deps);
}

void main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
