import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fsPromises } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ESTIMATED_MEMORY_PER_WORKER_BYTES, OUTPUT_EXTENSION, RENDER_CLIENT, SQUARE_SIZE } from '../constants';
import { BatchDefaults, loadBatchDefaults } from '../config/batch-defaults';
import { ScanResult, WorkflowScannerService } from '../discovery/workflow-scanner.service';
import { RenderBackendService } from '../render/render-backend.service';
import { RenderClient } from '../render/render-client.interface';
import { formatSize } from '../report/format';
import { StatusReportJob } from '../report/interfaces/status-report.interface';
import { StatusReporterService } from '../report/status-reporter.service';
import { InvalidRunRequestError, describeError } from './errors';
import { OutputLayout, RenderSettings } from './interfaces/render-settings.interface';
import { Orchestrator, RunOutcome, RunPlan } from './orchestrator';
import { reportFolder, toJobId } from './output-paths';

export interface RunRequest {
  inputFolder: string;
  outputFolder?: string;
  inPlace?: boolean;
  force?: boolean;
  recursive?: boolean;
  square?: boolean;
  workers?: number;
  maxRetries?: number;
  settings?: Partial<RenderSettings>;
}

export interface PreviewRequest {
  workflowFile: string;
  outputPath?: string; // Defaults to <stem>.png beside the workflow
  settings?: Partial<RenderSettings>;
}

export interface PreviewOutcome extends RunOutcome {
  outputPath: string;
}

export interface PlannedPreview {
  plan: RunPlan;
  sourcePath: string;
  outputPath: string;
}

export interface PlannedRun {
  plan: RunPlan;
  scan: ScanResult;
  warnings: string[];
}

/**
 * Turns a run request into a plan (discovery, layout, resume, worker count)
 * and runs it through an Orchestrator. Previews go the same way as a one-job
 * plan that writes no report.
 */
@Injectable()
export class BatchService {
  private readonly logger = new Logger(BatchService.name);
  private readonly defaults: BatchDefaults;

  constructor(
    configService: ConfigService,
    private readonly scanner: WorkflowScannerService,
    private readonly reporter: StatusReporterService,
    private readonly backend: RenderBackendService,
    @Inject(RENDER_CLIENT) private readonly renderClient: RenderClient,
  ) {
    this.defaults = loadBatchDefaults(configService);
  }

  async plan(request: RunRequest): Promise<PlannedRun> {
    const warnings: string[] = [];
    const warn = (message: string) => {
      warnings.push(message);
      this.logger.warn(message);
    };

    const layout = this.resolveLayout(request, warn);
    const settings = this.resolveSettings(request.settings, request.square ?? false);
    const workers = this.resolveWorkers(request.workers ?? this.defaults.workers, warn);
    const reportPath = path.join(reportFolder(layout), this.defaults.reportFilename);

    const scan = await this.scanner.scan(layout.inputFolder, {
      recursive: request.recursive ?? true,
      exclude: [this.defaults.reportFilename],
    });
    const valid = scan.workflows.filter((workflow) => workflow.valid);

    const previouslySucceeded = new Map<string, StatusReportJob>();
    if (!request.force) {
      const previous = await this.reporter.loadPreviousReport(reportPath);
      for (const job of previous?.jobs ?? []) {
        if (job.status !== 'failed') {
          previouslySucceeded.set(job.sourcePath, job);
        }
      }
    }

    const carriedOver: StatusReportJob[] = [];
    const entries = valid
      .filter((workflow) => {
        const previous = previouslySucceeded.get(toJobId(layout.inputFolder, workflow.path));
        if (previous) {
          this.logger.debug(`Skipping already processed workflow: ${previous.sourcePath}`);
          carriedOver.push(previous);
          return false;
        }
        return true;
      })
      .map((workflow) => ({ sourcePath: workflow.path }));

    if (carriedOver.length > 0) {
      this.logger.log(`Skipping ${carriedOver.length} already processed workflow(s)`);
    }

    return {
      plan: {
        runId: uuidv4(),
        entries,
        settings,
        layout,
        workers,
        maxRetries: Math.max(0, request.maxRetries ?? this.defaults.maxRetries),
        retryDelayMs: this.defaults.retryDelayMs,
        etaSampleSize: this.defaults.etaSampleSize,
        statusIntervalMs: this.defaults.statusIntervalMs,
        reportPath,
        carriedOver,
      },
      scan,
      warnings,
    };
  }

  async run(request: RunRequest, signal?: AbortSignal): Promise<RunOutcome> {
    const { plan, scan, warnings } = await this.plan(request);
    const { layout, settings } = plan;

    this.logger.log(
      `Input: ${layout.inputFolder} | ` +
        (layout.mode === 'in-place' ? 'Output: in-place' : `Output: ${layout.outputFolder}`) +
        ` | Viewport: ${settings.width}x${settings.height}${settings.darkMode ? ' (dark mode)' : ''}` +
        ` | Mode: ${plan.workers === 1 ? 'single worker' : `${plan.workers} parallel workers`}`,
    );
    this.logger.log(
      `Found ${scan.summary.validWorkflows} valid workflows, ${plan.entries.length} to render` +
        (warnings.length > 0 ? ` (${warnings.length} warning(s))` : ''),
    );

    return this.execute(plan, signal);
  }

  /**
   * Validates a single workflow file and plans its render to an explicit
   * output path.
   */
  async planPreview(request: PreviewRequest): Promise<PlannedPreview> {
    const sourcePath = path.resolve(request.workflowFile);
    const inputFolder = path.dirname(sourcePath);

    const stats = await fsPromises.stat(sourcePath).catch((error: unknown) => {
      throw new InvalidRunRequestError(`Workflow file not found: ${sourcePath} (${describeError(error)})`);
    });
    if (!stats.isFile()) {
      throw new InvalidRunRequestError(`Workflow path is not a file: ${sourcePath}`);
    }

    const workflow = await this.scanner.inspect(inputFolder, sourcePath);
    if (!workflow.valid) {
      throw new InvalidRunRequestError(`Invalid workflow ${workflow.relativePath}: ${workflow.error}`);
    }

    const outputPath = path.resolve(
      request.outputPath ?? path.join(inputFolder, path.parse(sourcePath).name + OUTPUT_EXTENSION),
    );

    const plan: RunPlan = {
      runId: uuidv4(),
      entries: [{ sourcePath, outputPath }],
      settings: this.resolveSettings(request.settings, false),
      layout: { mode: 'in-place', inputFolder },
      workers: 1,
      maxRetries: this.defaults.maxRetries,
      retryDelayMs: this.defaults.retryDelayMs,
      etaSampleSize: this.defaults.etaSampleSize,
      statusIntervalMs: 0,
      carriedOver: [],
    };
    return { plan, sourcePath, outputPath };
  }

  async preview(request: PreviewRequest, signal?: AbortSignal): Promise<PreviewOutcome> {
    const { plan, sourcePath, outputPath } = await this.planPreview(request);

    this.logger.log(
      `Previewing ${sourcePath} at ${plan.settings.width}x${plan.settings.height}` +
        `${plan.settings.darkMode ? ' (dark mode)' : ''} -> ${outputPath}`,
    );

    const outcome = await this.execute(plan, signal);
    return { ...outcome, outputPath };
  }

  private async execute(plan: RunPlan, signal?: AbortSignal): Promise<RunOutcome> {
    if (plan.entries.length > 0) {
      await this.backend.ensureRunning();
    } else {
      this.logger.log('No workflows to render');
    }
    return new Orchestrator(plan, this.renderClient, this.reporter).start(signal);
  }

  private resolveLayout(request: RunRequest, warn: (message: string) => void): OutputLayout {
    const inputFolder = path.resolve(request.inputFolder);

    if (request.inPlace) {
      if (request.outputFolder) {
        warn('--in-place is set; the output folder argument will be ignored');
      }
      return { mode: 'in-place', inputFolder };
    }
    if (!request.outputFolder) {
      throw new InvalidRunRequestError('Either provide an output folder or use in-place mode');
    }
    return { mode: 'directory', inputFolder, outputFolder: path.resolve(request.outputFolder) };
  }

  private resolveSettings(overrides: Partial<RenderSettings> | undefined, square: boolean): RenderSettings {
    const settings: RenderSettings = { ...this.defaults.settings, ...overrides };
    if (square) {
      settings.width = SQUARE_SIZE;
      settings.height = SQUARE_SIZE;
    }
    if (settings.width <= 0 || settings.height <= 0) {
      throw new InvalidRunRequestError(`Invalid viewport ${settings.width}x${settings.height}`);
    }
    if (settings.timeoutSeconds <= 0) {
      throw new InvalidRunRequestError('Render timeout must be greater than zero');
    }
    if (settings.waitSeconds < 0) {
      throw new InvalidRunRequestError('Wait time cannot be negative');
    }
    return settings;
  }

  private resolveWorkers(requested: number, warn: (message: string) => void): number {
    if (!Number.isInteger(requested) || requested < 1) {
      throw new InvalidRunRequestError('Workers must be at least 1');
    }

    const cpuCount = os.availableParallelism();
    let workers = requested;
    if (workers > cpuCount) {
      warn(`Requested ${workers} workers exceeds CPU count (${cpuCount}). Using ${cpuCount} workers.`);
      workers = cpuCount;
    }

    const estimated = workers * ESTIMATED_MEMORY_PER_WORKER_BYTES;
    const available = os.freemem();
    if (estimated > available * 0.8) {
      warn(
        `${workers} workers may use ~${formatSize(estimated)} memory. Available: ${formatSize(available)}`,
      );
    }
    return workers;
  }
}
