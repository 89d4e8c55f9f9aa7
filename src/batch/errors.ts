import { FailureReason, JobFailure } from './interfaces/job-result.interface';

/**
 * Base class for every per-job failure. Anything a render or an output write
 * rejects with is normalised into one of these before it reaches a result.
 */
export class RenderFailure extends Error {
  constructor(
    readonly reason: FailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJobFailure(): JobFailure {
    return { reason: this.reason, message: this.message };
  }
}

export class BackendUnreachableError extends RenderFailure {
  constructor(message: string, options?: { cause?: unknown }) {
    super('BackendUnreachable', message, options);
  }
}

export class RenderTimeoutError extends RenderFailure {
  constructor(readonly timeoutSeconds: number) {
    super('Timeout', `Render exceeded ${timeoutSeconds}s timeout`);
  }
}

export class InvalidInputError extends RenderFailure {
  constructor(message: string, options?: { cause?: unknown }) {
    super('InvalidInput', message, options);
  }
}

export class BackendRenderError extends RenderFailure {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RenderError', message, options);
  }
}

export class OutputWriteError extends RenderFailure {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IOError', message, options);
  }
}

export class RunCancelledError extends RenderFailure {
  constructor() {
    super('Cancelled', 'Run was cancelled before the render finished');
  }
}

export class AlreadyFinalizedError extends Error {
  constructor(runId: string) {
    super(`Run ${runId} is already finalized; orchestrators are single-use`);
    this.name = 'AlreadyFinalizedError';
  }
}

export class RunInProgressError extends Error {
  constructor(runId: string) {
    super(`Run ${runId} has already been started`);
    this.name = 'RunInProgressError';
  }
}

export class DuplicateResultError extends Error {
  constructor(jobId: string) {
    super(`Result for job ${jobId} was already recorded`);
    this.name = 'DuplicateResultError';
  }
}

export class ReportWriteError extends Error {
  constructor(reportPath: string, options?: { cause?: unknown }) {
    super(
      `Failed to write status report to ${reportPath}: ${describeError(options?.cause)}`,
      options,
    );
    this.name = 'ReportWriteError';
  }
}

export class InvalidRunRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRunRequestError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

export function toJobFailure(error: unknown): JobFailure {
  if (error instanceof RenderFailure) {
    return error.toJobFailure();
  }
  return { reason: 'RenderError', message: `Unexpected error: ${describeError(error)}` };
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}
