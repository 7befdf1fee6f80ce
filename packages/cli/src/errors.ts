import {
  AttachkitError,
  CommandSyntaxError,
  ConfigError,
  DispatchError,
  MissingCapabilityError,
  NoDelivererError,
  NoLoaderError,
  StageError,
} from '@attachkit/core';
import type { ExitCode } from './types.js';

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError) {
    super(error.message);
    this.name = 'CliError';
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

function errorCode(error: AttachkitError): string {
  if (error instanceof NoLoaderError) return 'NO_LOADER';
  if (error instanceof NoDelivererError) return 'NO_DELIVERER';
  if (error instanceof MissingCapabilityError) return 'MISSING_CAPABILITY';
  if (error instanceof DispatchError) return 'DISPATCH_ERROR';
  if (error instanceof StageError) return 'STAGE_ERROR';
  if (error instanceof CommandSyntaxError) return 'COMMAND_SYNTAX';
  return 'PIPELINE_ERROR';
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof ConfigError) {
    return configError(error.message, error.suggestion);
  }

  if (error instanceof AttachkitError) {
    return new CliError({
      code: errorCode(error),
      message: error.message,
      suggestion: error.suggestion,
      exitCode: 4,
    });
  }

  if (error instanceof Error) {
    return new CliError({
      code: 'INTERNAL_ERROR',
      message: error.message,
      exitCode: 1,
      suggestion: 'Run again with --debug to see the pipeline trace.',
    });
  }

  return new CliError({
    code: 'UNKNOWN_ERROR',
    message: 'An unknown error occurred.',
    exitCode: 1,
  });
}

export function usageError(message: string, suggestion?: string): CliError {
  return new CliError({ code: 'INVALID_ARGUMENT', message, exitCode: 2, suggestion });
}

export function configError(message: string, suggestion?: string): CliError {
  return new CliError({ code: 'CONFIG_ERROR', message, exitCode: 3, suggestion });
}
