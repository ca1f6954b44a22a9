import { ConfigError, isModelFailure, type StructuredResponse } from '@askdb/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_MISSING'
  | 'DB_NOT_FOUND'
  | 'MODEL_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

/** Missing credentials are a usage problem: the user fixes them in .env. */
export function fromConfigError(error: ConfigError): CliError {
  return usageError(error.message, 'CONFIG_MISSING');
}

/** An answer that only reports an unreachable model is a runtime failure. */
export function assertAnswered(response: StructuredResponse): StructuredResponse {
  if (isModelFailure(response)) {
    throw runtimeError(response.answer, 'MODEL_FAILED');
  }
  return response;
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.kind === 'usage' ? EXIT_CODE_USAGE : EXIT_CODE_RUNTIME;
  }
  if (error instanceof ConfigError) return EXIT_CODE_USAGE;
  return EXIT_CODE_RUNTIME;
}
