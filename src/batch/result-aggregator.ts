import { DEFAULT_ETA_SAMPLE_SIZE } from '../constants';
import { DuplicateResultError } from './errors';
import { JobResult } from './interfaces/job-result.interface';
import { RunStats } from './interfaces/run-stats.interface';

export interface ResultAggregatorOptions {
  poolSize: number;
  sampleSize?: number;
  now?: () => number;
}

/**
 * Single writer for run counters and per-job history. Every update happens in
 * one synchronous call, so a snapshot taken between two records always sees
 * succeeded + failed + remaining === total.
 */
export class ResultAggregator {
  private succeeded = 0;
  private failed = 0;
  private replaced = 0;
  private remaining: number;
  private readonly results: JobResult[] = [];
  private readonly recordedIds = new Set<string>();
  private readonly samples: number[] = [];
  private readonly startedAtMs: number;
  private finishedAtMs?: number;

  private readonly poolSize: number;
  private readonly sampleSize: number;
  private readonly now: () => number;

  constructor(readonly total: number, options: ResultAggregatorOptions) {
    this.remaining = total;
    this.poolSize = Math.max(1, options.poolSize);
    this.sampleSize = Math.max(1, options.sampleSize ?? DEFAULT_ETA_SAMPLE_SIZE);
    this.now = options.now ?? Date.now;
    this.startedAtMs = this.now();

    if (total === 0) {
      this.finishedAtMs = this.startedAtMs;
    }
  }

  get isComplete(): boolean {
    return this.remaining === 0;
  }

  get isFrozen(): boolean {
    return this.finishedAtMs !== undefined;
  }

  record(result: JobResult): void {
    if (this.recordedIds.has(result.jobId)) {
      throw new DuplicateResultError(result.jobId);
    }
    if (this.isFrozen) {
      throw new Error(`Cannot record ${result.jobId}: run statistics are frozen`);
    }

    this.recordedIds.add(result.jobId);
    this.remaining--;
    if (result.status === 'failed') {
      this.failed++;
    } else {
      this.succeeded++;
      if (result.status === 'replaced') {
        this.replaced++;
      }
    }
    this.results.push(result);
    this.samples.push(result.durationMs);
    if (this.samples.length > this.sampleSize) {
      this.samples.shift();
    }

    if (this.remaining === 0) {
      this.finishedAtMs = this.now();
    }
  }

  /**
   * Stops accepting results before every job has reported, e.g. after a
   * cancelled run. Has no effect once frozen.
   */
  close(): void {
    if (!this.isFrozen) {
      this.finishedAtMs = this.now();
    }
  }

  snapshot(): Readonly<RunStats> {
    const endMs = this.finishedAtMs ?? this.now();
    const elapsedMs = Math.max(0, endMs - this.startedAtMs);
    const completed = this.succeeded + this.failed;
    const activeWorkers = Math.min(this.poolSize, this.remaining);
    const averageDurationMs = this.averageDuration();

    let etaSeconds: number | null = null;
    if (this.remaining === 0) {
      etaSeconds = 0;
    } else if (averageDurationMs !== null) {
      etaSeconds = (averageDurationMs * this.remaining) / activeWorkers / 1000;
    }

    const elapsedMinutes = elapsedMs / 60_000;

    return Object.freeze({
      total: this.total,
      succeeded: this.succeeded,
      failed: this.failed,
      replaced: this.replaced,
      remaining: this.remaining,
      startedAt: new Date(this.startedAtMs),
      finishedAt: this.finishedAtMs === undefined ? undefined : new Date(this.finishedAtMs),
      elapsedMs,
      averageDurationMs,
      etaSeconds,
      throughputPerMinute: elapsedMinutes > 0 ? completed / elapsedMinutes : 0,
      activeWorkers,
    });
  }

  /**
   * Results in queue order, independent of which worker finished first.
   */
  history(): readonly JobResult[] {
    return Object.freeze([...this.results].sort((a, b) => a.index - b.index));
  }

  private averageDuration(): number | null {
    if (this.samples.length === 0) {
      return null;
    }
    const sum = this.samples.reduce((accumulator, value) => accumulator + value, 0);
    return sum / this.samples.length;
  }
}
