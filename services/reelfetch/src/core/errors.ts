import type { FailureKind } from '../types/jobs.js';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly retryable = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = kind;
  }
}

export class ResolveError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ResolveError', false, options);
  }
}

export class NetworkError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'NetworkError', true, options);
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'UnsupportedFormatError', false, options);
  }
}

export class UnsupportedCodecError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'UnsupportedCodecError', false, options);
  }
}

export class ToolchainError extends PipelineError {
  constructor(
    message: string,
    public readonly exitCode?: number | null,
    public readonly stderrTail?: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'ToolchainError', false, options);
  }
}

export class TimeoutError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TimeoutError', false, options);
  }
}

export class DeliveryError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DeliveryError', false, options);
  }
}

export class QueueSaturatedError extends PipelineError {
  constructor(capacity: number) {
    super(`Job queue is full (capacity ${capacity})`, 'QueueSaturated', false);
  }
}

/** Submission-time errors that never become a Job. */
export class PipelineClosedError extends Error {
  constructor() {
    super('Pipeline is not accepting jobs');
    this.name = 'PipelineClosedError';
  }
}

export class InvalidPresetError extends Error {
  constructor(public readonly preset: string) {
    super(`Unknown output preset: ${preset}`);
    this.name = 'InvalidPresetError';
  }
}

export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === 'string' && error) return error;
  return fallback;
}

type PipelineErrorFactory = (message: string, options?: { cause?: unknown }) => PipelineError;

/**
 * Keeps typed failures as they are and wraps anything else in the stage's
 * fallback kind.
 */
export function toPipelineError(error: unknown, fallback: PipelineErrorFactory): PipelineError {
  if (error instanceof PipelineError) return error;
  return fallback(errorMessage(error), { cause: error });
}
