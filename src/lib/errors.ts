import { ParseWarning } from '../types/structure.js';

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'PROVIDER_ERROR'
  | 'PARSE_FAILURE'
  | 'ENCODING_ERROR'
  | 'IO_ERROR';

export class GenerationError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export class InvalidArgumentError extends GenerationError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export class NotFoundError extends GenerationError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/** The model call failed. The provider's message is kept as-is. */
export class ProviderError extends GenerationError {
  constructor(cause: unknown) {
    super('PROVIDER_ERROR', cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'ProviderError';
  }
}

export class ParseFailure extends GenerationError {
  constructor(
    message: string,
    readonly warnings: readonly ParseWarning[],
  ) {
    super('PARSE_FAILURE', message);
    this.name = 'ParseFailure';
  }
}

export class EncodingError extends GenerationError {
  constructor(message: string) {
    super('ENCODING_ERROR', message);
    this.name = 'EncodingError';
  }
}

export class OutputError extends GenerationError {
  constructor(message: string, cause?: unknown) {
    super('IO_ERROR', message, { cause });
    this.name = 'OutputError';
  }
}

export class AbortError extends Error {
  constructor(message = 'Aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new AbortError(signal.reason ? String(signal.reason) : 'Aborted');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
