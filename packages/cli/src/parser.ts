import { object, or } from '@optique/core/constructs';
import { formatMessage, type Message } from '@optique/core/message';
import { multiple, optional } from '@optique/core/modifiers';
import { parse, type InferValue } from '@optique/core/parser';
import { argument, command, constant, option } from '@optique/core/primitives';
import { string } from '@optique/core/valueparser';

function configOption() {
  return optional(option('-c', '--config', string({ metavar: 'FILE' })));
}

function jsonOption() {
  return optional(option('--json'));
}

const renderParser = command(
  'render',
  object({
    action: constant('render'),
    identifiers: multiple(argument(string({ metavar: 'IDENTIFIER' })), { min: 1 }),
    format: optional(option('-f', '--format', string({ metavar: 'STYLE' }))),
    prompt: optional(option('-p', '--prompt', string({ metavar: 'TEXT' }))),
    describe: optional(option('--describe')),
    debug: optional(option('--debug')),
    raw: optional(option('--raw')),
    strict: optional(option('--strict')),
    config: configOption(),
    json: jsonOption(),
  })
);

const doctorParser = command(
  'doctor',
  object({
    action: constant('doctor'),
    config: configOption(),
    json: jsonOption(),
  })
);

export const attachkitParser = or(renderParser, doctorParser);

export type AttachkitArgs = InferValue<typeof attachkitParser>;
export type RenderArgs = Extract<AttachkitArgs, { action: 'render' }>;
export type DoctorArgs = Extract<AttachkitArgs, { action: 'doctor' }>;

export function parseArgv(argv: readonly string[]) {
  return parse(attachkitParser, argv);
}

export function formatParseError(error: Message): string {
  return `Error: ${formatMessage(error)}\nUsage: attachkit render <identifier...> | attachkit doctor`;
}
