import { Injectable, Logger } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { promises as fsPromises } from 'fs';
import * as path from 'path';
import { ReportWriteError, describeError, hasErrorCode } from '../batch/errors';
import { JobResult } from '../batch/interfaces/job-result.interface';
import { RunStats } from '../batch/interfaces/run-stats.interface';
import { WorkerSlotState } from '../batch/interfaces/worker-slot.interface';
import { formatDuration, formatSize, truncate } from './format';
import {
  ReportContext,
  StatusReport,
  StatusReportJob,
} from './interfaces/status-report.interface';

export interface LiveStatusSource {
  snapshot(): Readonly<RunStats>;
  workerStates(): readonly WorkerSlotState[];
}

@Injectable()
export class StatusReporterService {
  private readonly logger = new Logger(StatusReporterService.name);
  private readonly writeLocks = new Map<string, Promise<void>>();

  constructor(private readonly schedulerRegistry: SchedulerRegistry) {}

  /**
   * Live display payload: one summary line followed by one line per worker.
   */
  formatProgress(
    stats: Readonly<RunStats>,
    workers: readonly WorkerSlotState[],
    now: number = Date.now(),
  ): string[] {
    const completed = stats.succeeded + stats.failed;
    let eta = 'calculating';
    if (stats.remaining === 0) {
      eta = 'complete';
    } else if (stats.etaSeconds !== null) {
      eta = formatDuration(stats.etaSeconds);
    }

    const lines = [
      `${completed}/${stats.total} done | succeeded ${stats.succeeded} | failed ${stats.failed} | ` +
        `replaced ${stats.replaced} | remaining ${stats.remaining} | ETA ${eta} | ` +
        `${stats.throughputPerMinute.toFixed(1)} jobs/min`,
    ];

    for (const slot of workers) {
      switch (slot.state) {
        case 'idle':
          lines.push(`  Worker ${slot.workerId}: idle`);
          break;
        case 'rendering': {
          const elapsed = Math.max(0, now - slot.startedAt.getTime()) / 1000;
          lines.push(`  Worker ${slot.workerId}: rendering ${truncate(slot.jobId, 60)} (${elapsed.toFixed(1)}s)`);
          break;
        }
        case 'completed':
          lines.push(`  Worker ${slot.workerId}: ${slot.status} ${truncate(slot.jobId, 60)}`);
          break;
      }
    }

    return lines;
  }

  startLiveUpdates(runId: string, source: LiveStatusSource, intervalMs: number): void {
    const name = this.intervalName(runId);
    if (intervalMs <= 0 || this.schedulerRegistry.doesExist('interval', name)) {
      return;
    }

    const handle = setInterval(() => {
      const lines = this.formatProgress(source.snapshot(), source.workerStates());
      lines[0] += ` | memory ${formatSize(process.memoryUsage().rss)}`;
      for (const line of lines) {
        this.logger.log(line);
      }
    }, intervalMs);
    this.schedulerRegistry.addInterval(name, handle);
  }

  stopLiveUpdates(runId: string): void {
    const name = this.intervalName(runId);
    if (this.schedulerRegistry.doesExist('interval', name)) {
      this.schedulerRegistry.deleteInterval(name);
    }
  }

  buildReport(
    context: ReportContext,
    stats: Readonly<RunStats>,
    history: readonly JobResult[],
    carriedOver: readonly StatusReportJob[] = [],
  ): StatusReport {
    const finishedAt = stats.finishedAt ?? new Date(stats.startedAt.getTime() + stats.elapsedMs);

    const carriedSucceeded = carriedOver.filter((job) => job.status !== 'failed').length;

    const jobs: StatusReportJob[] = [
      ...carriedOver.map((job) => ({ ...job, carriedOver: true })),
      ...history.map((result) => this.toReportJob(context, result)),
    ];

    return {
      runId: context.runId,
      startedAt: stats.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      mode: context.mode,
      inputFolder: context.inputFolder,
      ...(context.outputFolder !== undefined ? { outputFolder: context.outputFolder } : {}),
      cancelled: context.cancelled,
      // Counts cover every entry in jobs; skipped is the carried-over share.
      summary: {
        total: stats.total + carriedOver.length,
        succeeded: stats.succeeded + carriedSucceeded,
        failed: stats.failed + carriedOver.length - carriedSucceeded,
        replaced: stats.replaced + carriedOver.filter((job) => job.status === 'replaced').length,
        remaining: stats.remaining,
        skipped: carriedOver.length,
        durationMs: stats.elapsedMs,
      },
      settings: { ...context.settings },
      jobs,
    };
  }

  /**
   * Writes the report through a temp file and rename. Calls for the same path
   * are serialised; repeating a write with the same report yields the same file.
   */
  async writeReport(reportPath: string, report: StatusReport): Promise<void> {
    const previous = this.writeLocks.get(reportPath) ?? Promise.resolve();
    const run = previous.then(() => this.writeAtomically(reportPath, report));
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.writeLocks.set(reportPath, settled);

    try {
      await run;
    } finally {
      if (this.writeLocks.get(reportPath) === settled) {
        this.writeLocks.delete(reportPath);
      }
    }
    this.logger.log(`Status report written to: ${reportPath}`);
  }

  async loadPreviousReport(reportPath: string): Promise<StatusReport | undefined> {
    let content: string;
    try {
      content = await fsPromises.readFile(reportPath, 'utf-8');
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.warn(`Failed to read previous report ${reportPath}: ${describeError(error)}`);
      }
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (!isStatusReport(parsed)) {
        this.logger.warn(`Ignoring previous report ${reportPath}: unexpected format`);
        return undefined;
      }
      this.logger.log(`Loaded existing state from ${reportPath}`);
      return parsed;
    } catch (error) {
      this.logger.warn(`Failed to parse previous report ${reportPath}: ${describeError(error)}`);
      return undefined;
    }
  }

  private toReportJob(context: ReportContext, result: JobResult): StatusReportJob {
    const entry: StatusReportJob = {
      sourcePath: result.jobId,
      outputPath: toPosix(path.relative(context.reportFolder, result.outputPath)),
      status: result.status,
      durationMs: result.durationMs,
      attempts: result.attempts,
      startedAt: result.startedAt.toISOString(),
    };
    if (result.status === 'failed') {
      entry.error = result.error;
    }
    return entry;
  }

  private async writeAtomically(reportPath: string, report: StatusReport): Promise<void> {
    const tmpPath = `${reportPath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fsPromises.mkdir(path.dirname(reportPath), { recursive: true });
      await fsPromises.writeFile(tmpPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
      await fsPromises.rename(tmpPath, reportPath);
    } catch (error) {
      await fsPromises.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug(`Could not remove ${tmpPath}: ${describeError(cleanupError)}`);
      });
      throw new ReportWriteError(reportPath, { cause: error });
    }
  }

  private intervalName(runId: string): string {
    return `status-${runId}`;
  }
}

function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

const JOB_STATUSES: readonly string[] = ['success', 'failed', 'replaced'];
const FAILURE_REASONS: readonly string[] = [
  'BackendUnreachable',
  'Timeout',
  'InvalidInput',
  'RenderError',
  'IOError',
  'Cancelled',
];

function isJobFailure(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'reason' in value &&
    typeof value.reason === 'string' &&
    FAILURE_REASONS.includes(value.reason) &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

function isReportJob(value: unknown): value is StatusReportJob {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sourcePath' in value &&
    typeof value.sourcePath === 'string' &&
    'outputPath' in value &&
    typeof value.outputPath === 'string' &&
    'status' in value &&
    typeof value.status === 'string' &&
    JOB_STATUSES.includes(value.status) &&
    'durationMs' in value &&
    typeof value.durationMs === 'number' &&
    'attempts' in value &&
    typeof value.attempts === 'number' &&
    'startedAt' in value &&
    typeof value.startedAt === 'string' &&
    (!('error' in value) || value.error === undefined || isJobFailure(value.error))
  );
}

export function isStatusReport(value: unknown): value is StatusReport {
  return (
    typeof value === 'object' &&
    value !== null &&
    'jobs' in value &&
    Array.isArray(value.jobs) &&
    value.jobs.every(isReportJob) &&
    'summary' in value &&
    typeof value.summary === 'object' &&
    value.summary !== null
  );
}
