import { INestApplicationContext, Logger } from '@nestjs/common';
import { BatchService, PreviewRequest, RunRequest } from '../batch/batch.service';
import { RunOutcome } from '../batch/orchestrator';
import { WorkflowRepairService } from '../discovery/workflow-repair.service';
import { WorkflowScannerService } from '../discovery/workflow-scanner.service';
import { formatDuration } from '../report/format';
import { openFile } from './open-file';

const logger = new Logger('flowsnap');

/**
 * Lists every JSON file with its validation result. Resolves to the process
 * exit code: 1 when any file is not a valid workflow.
 */
export async function runScan(
  app: INestApplicationContext,
  inputFolder: string,
  recursive: boolean,
): Promise<number> {
  const scanner = app.get(WorkflowScannerService);
  const { workflows, summary } = await scanner.scan(inputFolder, { recursive });

  if (workflows.length === 0) {
    logger.warn('No JSON files found in the specified folder.');
    return 0;
  }

  for (const workflow of workflows) {
    const status = workflow.valid ? `valid, ${workflow.nodeCount} nodes` : `invalid: ${workflow.error}`;
    logger.log(`${workflow.relativePath} (${workflow.name}): ${status}`);
  }
  logger.log(
    `Total files: ${summary.totalFiles} | valid: ${summary.validWorkflows} | ` +
      `invalid: ${summary.invalidWorkflows} | nodes: ${summary.totalNodes}`,
  );

  return summary.invalidWorkflows > 0 ? 1 : 0;
}

/**
 * Plans and runs one batch. SIGINT cancels the run; the partial report is
 * still written. Resolves to the process exit code.
 */
export async function runGenerate(
  app: INestApplicationContext,
  request: RunRequest,
): Promise<number> {
  const batchService = app.get(BatchService);
  const outcome = await cancelOnInterrupt((signal) => batchService.run(request, signal));

  printSummary(outcome);
  return outcome.cancelled ? 130 : 0;
}

/**
 * Renders a single workflow, optionally opening the image. Resolves to 1 when
 * the render failed.
 */
export async function runPreview(
  app: INestApplicationContext,
  request: PreviewRequest,
  open: boolean,
): Promise<number> {
  const batchService = app.get(BatchService);
  const outcome = await cancelOnInterrupt((signal) => batchService.preview(request, signal));

  if (outcome.cancelled) {
    return 130;
  }
  const [job] = outcome.report.jobs;
  if (job?.error) {
    logger.error(`Preview failed: [${job.error.reason}] ${job.error.message}`);
    return 1;
  }

  logger.log(`Preview saved: ${outcome.outputPath} (${formatDuration(outcome.stats.elapsedMs / 1000)})`);
  if (open) {
    openFile(outcome.outputPath, logger);
  }
  return 0;
}

/**
 * Adds missing names and drops trailing data in every JSON file of a folder.
 * Resolves to 1 when any file could not be repaired.
 */
export async function runFix(
  app: INestApplicationContext,
  inputFolder: string,
  recursive: boolean,
  dryRun: boolean,
): Promise<number> {
  if (dryRun) {
    logger.log('Dry run: no files will be changed');
  }
  const results = await app.get(WorkflowRepairService).repairFolder(inputFolder, { recursive, dryRun });

  const failed = results.filter((result) => result.status === 'failed');
  const fixed = results.filter((result) => result.status === 'fixed').length;
  const skipped = results.filter((result) => result.status === 'skipped').length;
  logger.log(`Fixed: ${fixed} | Skipped (already valid): ${skipped} | Failed: ${failed.length}`);

  for (const result of failed) {
    logger.error(`${result.relativePath}: ${result.message}`);
  }
  if (dryRun && fixed > 0) {
    logger.log('Re-run without --dry-run to apply the changes');
  }
  return failed.length > 0 ? 1 : 0;
}

async function cancelOnInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted by user, cancelling the run');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    return await task(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

function printSummary({ stats, report, reportPath }: RunOutcome): void {
  const lines = [
    `Success: ${stats.succeeded}`,
    `Failed: ${stats.failed}`,
    ...(stats.replaced > 0 ? [`Replaced: ${stats.replaced}`] : []),
    ...(report.summary.skipped > 0 ? [`Skipped: ${report.summary.skipped}`] : []),
    `Time: ${formatDuration(stats.elapsedMs / 1000)}`,
    ...(reportPath ? [`Report: ${reportPath}`] : []),
  ];
  logger.log(lines.join(' | '));

  for (const job of report.jobs) {
    if (job.error) {
      logger.error(`${job.sourcePath}: [${job.error.reason}] ${job.error.message}`);
    }
  }
}
