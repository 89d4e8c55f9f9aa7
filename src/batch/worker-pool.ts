import { Logger } from '@nestjs/common';
import { promises as fsPromises } from 'fs';
import * as path from 'path';
import { Observable } from 'rxjs';
import { DEFAULT_RETRY_DELAY_MS } from '../constants';
import { RenderClient } from '../render/render-client.interface';
import {
  OutputWriteError,
  RenderFailure,
  RenderTimeoutError,
  RunCancelledError,
  describeError,
  hasErrorCode,
  toJobFailure,
} from './errors';
import { Job } from './interfaces/job.interface';
import { JobResult, JobStatus } from './interfaces/job-result.interface';
import { WorkerSlotState } from './interfaces/worker-slot.interface';
import { JobQueue } from './job-queue';

export interface WorkerPoolOptions {
  maxRetries?: number; // Extra attempts for BackendUnreachable only
  retryDelayMs?: number;
  now?: () => number;
}

/**
 * Fixed-size set of executors draining a JobQueue. Each executor owns its slot
 * in the worker state array; nothing else is shared between them.
 */
export class WorkerPool {
  private readonly logger = new Logger(WorkerPool.name);
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly now: () => number;
  private slots: readonly WorkerSlotState[] = [];

  constructor(
    private readonly renderClient: RenderClient,
    options: WorkerPoolOptions = {},
  ) {
    this.maxRetries = Math.max(0, options.maxRetries ?? 0);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
    this.now = options.now ?? Date.now;
  }

  workerStates(): readonly WorkerSlotState[] {
    return this.slots;
  }

  /**
   * Emits one result per job and completes once every executor has stopped.
   * Unsubscribing, or aborting the signal, abandons in-flight renders and stops
   * executors from taking further jobs.
   */
  run(queue: JobQueue, poolSize: number, signal?: AbortSignal): Observable<JobResult> {
    if (!Number.isInteger(poolSize) || poolSize < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${poolSize}`);
    }

    return new Observable<JobResult>((subscriber) => {
      const controller = new AbortController();
      const forwardAbort = () => controller.abort();
      if (signal?.aborted) {
        controller.abort();
      } else {
        signal?.addEventListener('abort', forwardAbort, { once: true });
      }

      const workerCount = Math.min(poolSize, queue.size);
      this.slots = Object.freeze(
        Array.from({ length: workerCount }, (_, i): WorkerSlotState => ({
          state: 'idle',
          workerId: i + 1,
        })),
      );
      this.logger.debug(`Starting ${workerCount} worker(s) for ${queue.size} job(s)`);

      const executors = this.slots.map((slot) =>
        this.runExecutor(slot.workerId, queue, controller.signal, (result) =>
          subscriber.next(result),
        ),
      );

      Promise.all(executors).then(
        () => subscriber.complete(),
        (error: unknown) => subscriber.error(error),
      );

      return () => {
        signal?.removeEventListener('abort', forwardAbort);
        controller.abort();
      };
    });
  }

  private async runExecutor(
    workerId: number,
    queue: JobQueue,
    signal: AbortSignal,
    emit: (result: JobResult) => void,
  ): Promise<void> {
    while (!signal.aborted) {
      const job = queue.take();
      if (!job) {
        break;
      }

      this.setSlot({ state: 'rendering', workerId, jobId: job.id, startedAt: new Date(this.now()) });
      const result = await this.processJob(job, workerId, signal);
      this.setSlot({ state: 'completed', workerId, jobId: job.id, status: result.status });
      emit(result);
    }

    this.setSlot({ state: 'idle', workerId });
  }

  private async processJob(job: Job, workerId: number, signal: AbortSignal): Promise<JobResult> {
    const startedAtMs = this.now();
    let attempts = 0;
    let status: JobStatus;

    try {
      const bytes = await this.renderWithRetries(job, workerId, signal, () => ++attempts);
      status = (await this.writeOutput(job.outputPath, bytes)) ? 'replaced' : 'success';
    } catch (error) {
      const finishedAtMs = this.now();
      const failure = toJobFailure(error);
      this.logger.error(`Worker ${workerId} failed to render ${job.id}: [${failure.reason}] ${failure.message}`);
      return {
        jobId: job.id,
        index: job.index,
        sourcePath: job.sourcePath,
        outputPath: job.outputPath,
        workerId,
        attempts,
        status: 'failed',
        error: failure,
        startedAt: new Date(startedAtMs),
        finishedAt: new Date(finishedAtMs),
        durationMs: Math.max(0, finishedAtMs - startedAtMs),
      };
    }

    const finishedAtMs = this.now();
    this.logger.log(
      `Worker ${workerId} rendered ${job.id}${status === 'replaced' ? ' (replaced existing image)' : ''}`,
    );
    return {
      jobId: job.id,
      index: job.index,
      sourcePath: job.sourcePath,
      outputPath: job.outputPath,
      workerId,
      attempts,
      status,
      startedAt: new Date(startedAtMs),
      finishedAt: new Date(finishedAtMs),
      durationMs: Math.max(0, finishedAtMs - startedAtMs),
    };
  }

  private async renderWithRetries(
    job: Job,
    workerId: number,
    signal: AbortSignal,
    nextAttempt: () => number,
  ): Promise<Buffer> {
    for (;;) {
      const attempt = nextAttempt();
      try {
        return await this.renderWithTimeout(job, signal);
      } catch (error) {
        if (!this.shouldRetry(error, attempt, signal)) {
          throw error;
        }
        this.logger.warn(
          `Worker ${workerId}: backend unreachable for ${job.id}, retrying (${attempt}/${this.maxRetries})`,
        );
        await this.delay(this.retryDelayMs, signal);
      }
    }
  }

  private shouldRetry(error: unknown, attempts: number, signal: AbortSignal): boolean {
    return (
      !signal.aborted &&
      error instanceof RenderFailure &&
      error.reason === 'BackendUnreachable' &&
      attempts <= this.maxRetries
    );
  }

  /**
   * Races the client against the job's own timeout and the run signal. The
   * client receives a per-attempt signal that aborts on either.
   */
  private renderWithTimeout(job: Job, runSignal: AbortSignal): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      if (runSignal.aborted) {
        reject(new RunCancelledError());
        return;
      }

      const attempt = new AbortController();
      const onCancel = () => {
        clearTimeout(timer);
        attempt.abort();
        reject(new RunCancelledError());
      };
      const timer = setTimeout(() => {
        runSignal.removeEventListener('abort', onCancel);
        attempt.abort();
        reject(new RenderTimeoutError(job.config.timeoutSeconds));
      }, job.config.timeoutSeconds * 1000);
      runSignal.addEventListener('abort', onCancel, { once: true });

      const settle = () => {
        clearTimeout(timer);
        runSignal.removeEventListener('abort', onCancel);
      };

      this.renderClient.render(job.sourcePath, job.config, attempt.signal).then(
        (bytes) => {
          settle();
          resolve(bytes);
        },
        (error: unknown) => {
          settle();
          reject(error);
        },
      );
    });
  }

  /**
   * Writes the image and reports whether a previous file was overwritten.
   */
  private async writeOutput(outputPath: string, bytes: Buffer): Promise<boolean> {
    let existed = false;
    try {
      await fsPromises.access(outputPath);
      existed = true;
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT') && !hasErrorCode(error, 'ENOTDIR')) {
        throw new OutputWriteError(`Cannot access ${outputPath}: ${describeError(error)}`, { cause: error });
      }
    }

    try {
      await fsPromises.mkdir(path.dirname(outputPath), { recursive: true });
      await fsPromises.writeFile(outputPath, bytes);
    } catch (error) {
      throw new OutputWriteError(`Failed to write ${outputPath}: ${describeError(error)}`, { cause: error });
    }

    if (existed) {
      this.logger.debug(`Replaced existing image: ${outputPath}`);
    }
    return existed;
  }

  private delay(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private setSlot(next: WorkerSlotState): void {
    this.slots = Object.freeze(
      this.slots.map((slot) => (slot.workerId === next.workerId ? Object.freeze(next) : slot)),
    );
  }
}
