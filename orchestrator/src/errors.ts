export type PipelineErrorCode =
  | 'SUBMISSION_FAILED'
  | 'GENERATION_FAILED'
  | 'TIMEOUT'
  | 'TRANSFER_FAILED'
  | 'CONFIG_INVALID'
  | 'VALIDATION_FAILED'
  | 'UNEXPECTED';

export interface PipelineErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class PipelineError extends Error {
  public readonly details?: Record<string, unknown>;

  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    options: PipelineErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PipelineError';
    this.details = options.details;
  }
}

/** The remote API refused the job request. */
export class SubmissionError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('SUBMISSION_FAILED', message, options);
    this.name = 'SubmissionError';
  }
}

/** The remote API accepted the job but reported that generation failed. */
export class GenerationError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('GENERATION_FAILED', message, options);
    this.name = 'GenerationError';
  }
}

export class TimeoutError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('TIMEOUT', message, options);
    this.name = 'TimeoutError';
  }
}

export class TransferError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('TRANSFER_FAILED', message, options);
    this.name = 'TransferError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: PipelineErrorOptions
  ) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('VALIDATION_FAILED', message, options);
    this.name = 'ValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** True for the rejection of a request cut off by an abort signal. */
export function isAbortTimeout(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

export function toPipelineError(error: unknown, fallbackCode: PipelineErrorCode = 'UNEXPECTED'): PipelineError {
  if (error instanceof PipelineError) return error;
  if (error instanceof Error) return new PipelineError(fallbackCode, error.message, { cause: error });
  return new PipelineError(fallbackCode, String(error));
}
