import { Logger } from '@nestjs/common';
import { count, lastValueFrom, tap } from 'rxjs';
import { RenderClient } from '../render/render-client.interface';
import { StatusReport, StatusReportJob } from '../report/interfaces/status-report.interface';
import { LiveStatusSource, StatusReporterService } from '../report/status-reporter.service';
import { AlreadyFinalizedError, RunInProgressError, describeError } from './errors';
import { QueueEntry } from './interfaces/job.interface';
import { OutputLayout, RenderSettings } from './interfaces/render-settings.interface';
import { RunStats } from './interfaces/run-stats.interface';
import { WorkerSlotState } from './interfaces/worker-slot.interface';
import { JobQueue } from './job-queue';
import { reportFolder } from './output-paths';
import { ResultAggregator } from './result-aggregator';
import { WorkerPool } from './worker-pool';

export type OrchestratorState = 'idle' | 'running' | 'draining' | 'finalized';

const NEXT_STATE: Record<OrchestratorState, OrchestratorState | undefined> = {
  idle: 'running',
  running: 'draining',
  draining: 'finalized',
  finalized: undefined,
};

export interface RunPlan {
  runId: string;
  entries: QueueEntry[];
  settings: RenderSettings;
  layout: OutputLayout;
  workers: number;
  maxRetries: number;
  retryDelayMs: number;
  etaSampleSize: number;
  statusIntervalMs: number;
  reportPath?: string; // No report is written when unset
  carriedOver: StatusReportJob[];
}

export interface RunOutcome {
  stats: Readonly<RunStats>;
  report: StatusReport;
  reportPath?: string;
  cancelled: boolean;
}

/**
 * Owns one run from start to report. Single-use: once finalized, start()
 * throws AlreadyFinalizedError.
 */
export class Orchestrator implements LiveStatusSource {
  private readonly logger = new Logger(Orchestrator.name);
  private readonly pool: WorkerPool;
  private readonly cancellation = new AbortController();
  private readonly history: OrchestratorState[] = ['idle'];
  private aggregator?: ResultAggregator;

  constructor(
    private readonly plan: RunPlan,
    renderClient: RenderClient,
    private readonly reporter: StatusReporterService,
    private readonly now: () => number = Date.now,
  ) {
    this.pool = new WorkerPool(renderClient, {
      maxRetries: plan.maxRetries,
      retryDelayMs: plan.retryDelayMs,
      now,
    });
  }

  get runId(): string {
    return this.plan.runId;
  }

  get state(): OrchestratorState {
    return this.history[this.history.length - 1];
  }

  stateHistory(): readonly OrchestratorState[] {
    return [...this.history];
  }

  snapshot(): Readonly<RunStats> {
    if (this.aggregator) {
      return this.aggregator.snapshot();
    }
    // Not started yet: everything is still remaining.
    return new ResultAggregator(this.plan.entries.length, {
      poolSize: this.plan.workers,
      now: this.now,
    }).snapshot();
  }

  workerStates(): readonly WorkerSlotState[] {
    return this.pool.workerStates();
  }

  cancel(): void {
    if (this.state === 'running' || this.state === 'draining') {
      this.logger.warn(`Cancelling run ${this.runId}`);
    }
    this.cancellation.abort();
  }

  async start(signal?: AbortSignal): Promise<RunOutcome> {
    if (this.state === 'finalized') {
      throw new AlreadyFinalizedError(this.runId);
    }
    if (this.state !== 'idle') {
      throw new RunInProgressError(this.runId);
    }

    const queue = new JobQueue(this.plan.entries, this.plan.settings, this.plan.layout);
    const aggregator = new ResultAggregator(queue.size, {
      poolSize: this.plan.workers,
      sampleSize: this.plan.etaSampleSize,
      now: this.now,
    });
    this.aggregator = aggregator;

    const onExternalAbort = () => this.cancel();
    if (signal?.aborted) {
      this.cancel();
    } else {
      signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    queue.onExhausted(() => this.enterDraining());
    this.transition('running');
    this.logger.log(
      `Run ${this.runId} started: ${queue.size} job(s), ${Math.min(this.plan.workers, Math.max(queue.size, 1))} worker(s)`,
    );
    this.reporter.startLiveUpdates(this.runId, this, this.plan.statusIntervalMs);

    let runError: unknown;
    try {
      await lastValueFrom(
        this.pool.run(queue, this.plan.workers, this.cancellation.signal).pipe(
          tap((result) => aggregator.record(result)),
          count(),
        ),
      );
    } catch (error) {
      runError = error;
      this.logger.error(`Run ${this.runId} aborted: ${describeError(error)}`);
    } finally {
      signal?.removeEventListener('abort', onExternalAbort);
      this.reporter.stopLiveUpdates(this.runId);
    }

    this.enterDraining();
    aggregator.close();

    try {
      const outcome = await this.finalize(aggregator);
      if (runError !== undefined) {
        throw runError;
      }
      return outcome;
    } finally {
      this.transition('finalized');
    }
  }

  private async finalize(aggregator: ResultAggregator): Promise<RunOutcome> {
    const stats = aggregator.snapshot();
    const cancelled = this.cancellation.signal.aborted;
    const { layout } = this.plan;

    const report = this.reporter.buildReport(
      {
        runId: this.runId,
        mode: layout.mode,
        inputFolder: layout.inputFolder,
        outputFolder: layout.mode === 'directory' ? layout.outputFolder : undefined,
        reportFolder: reportFolder(layout),
        settings: {
          ...this.plan.settings,
          workers: this.plan.workers,
          maxRetries: this.plan.maxRetries,
        },
        cancelled,
      },
      stats,
      aggregator.history(),
      this.plan.carriedOver,
    );

    if (this.plan.reportPath !== undefined) {
      await this.reporter.writeReport(this.plan.reportPath, report);
    }

    const verdict = stats.failed > 0 ? 'complete with failures' : 'complete';
    this.logger.log(
      `Run ${this.runId} ${cancelled ? 'cancelled' : verdict}: ${stats.succeeded} succeeded ` +
        `(${stats.replaced} replaced), ${stats.failed} failed, ${stats.remaining} not started`,
    );

    return { stats, report, reportPath: this.plan.reportPath, cancelled };
  }

  // Reached when the last job is handed out, or when the pool stops without
  // handing one out (empty or cancelled before the first take).
  private enterDraining(): void {
    if (this.state === 'running') {
      this.transition('draining');
    }
  }

  private transition(next: OrchestratorState): void {
    if (NEXT_STATE[this.state] !== next) {
      throw new Error(`Invalid run state transition ${this.state} -> ${next}`);
    }
    this.history.push(next);
    this.logger.debug(`Run ${this.runId}: ${next}`);
  }
}
