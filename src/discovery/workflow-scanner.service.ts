import { Injectable, Logger } from '@nestjs/common';
import { promises as fsPromises } from 'fs';
import * as path from 'path';
import { describeError } from '../batch/errors';
import { toJobId } from '../batch/output-paths';
import { ScanSummary, WorkflowFile } from './interfaces/workflow-file.interface';
import { validateWorkflow } from './workflow-validation';

export interface ScanOptions {
  recursive?: boolean;
  exclude?: string[]; // File names to skip, e.g. the status report
}

export interface ScanResult {
  workflows: WorkflowFile[];
  summary: ScanSummary;
}

@Injectable()
export class WorkflowScannerService {
  private readonly logger = new Logger(WorkflowScannerService.name);

  /**
   * Finds workflow JSON files under a folder, sorted by relative path, and
   * validates each one.
   */
  async scan(inputFolder: string, options: ScanOptions = {}): Promise<ScanResult> {
    const root = path.resolve(inputFolder);
    this.logger.log(`Scanning for workflows in: ${root}`);

    const jsonFiles = await this.listJsonFiles(root, options);
    this.logger.log(`Found ${jsonFiles.length} JSON files`);

    const workflows: WorkflowFile[] = [];
    for (const filePath of jsonFiles) {
      workflows.push(await this.inspect(root, filePath));
    }

    const summary = summarize(workflows);
    this.logger.log(`Validated workflows: ${summary.validWorkflows}/${summary.totalFiles}`);

    return { workflows, summary };
  }

  /**
   * Absolute paths of the `*.json` files under a folder, ordered by their
   * relative path compared code unit by code unit.
   */
  async listJsonFiles(inputFolder: string, options: ScanOptions = {}): Promise<string[]> {
    const root = path.resolve(inputFolder);
    const recursive = options.recursive ?? true;
    const exclude = new Set(options.exclude ?? []);

    const stats = await fsPromises.stat(root).catch((error: unknown) => {
      throw new Error(`Input folder not found: ${root} (${describeError(error)})`);
    });
    if (!stats.isDirectory()) {
      throw new Error(`Input path is not a directory: ${root}`);
    }

    const entries = await fsPromises.readdir(root, { recursive, withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.json'))
      .filter((entry) => !exclude.has(entry.name))
      .map((entry) => path.join(entry.parentPath ?? entry.path, entry.name))
      .sort((a, b) => compareCodeUnits(toJobId(root, a), toJobId(root, b)));
  }

  /**
   * Reads and validates one file; `root` is the folder its relative path is
   * reported against.
   */
  async inspect(root: string, filePath: string): Promise<WorkflowFile> {
    const relativePath = toJobId(root, filePath);
    const fallbackName = path.parse(filePath).name;

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fsPromises.readFile(filePath, 'utf-8'));
    } catch (error) {
      this.logger.debug(`Skipping ${relativePath}: ${describeError(error)}`);
      return {
        path: filePath,
        relativePath,
        name: fallbackName,
        valid: false,
        error: `Invalid JSON: ${describeError(error)}`,
        nodeCount: 0,
      };
    }

    const validation = validateWorkflow(parsed);
    if (!validation.valid) {
      this.logger.debug(`Invalid workflow ${relativePath}: ${validation.error}`);
      return {
        path: filePath,
        relativePath,
        name: fallbackName,
        valid: false,
        error: validation.error,
        nodeCount: 0,
      };
    }

    return {
      path: filePath,
      relativePath,
      name: validation.workflow.name || fallbackName,
      valid: true,
      nodeCount: validation.workflow.nodes.length,
    };
  }
}

function compareCodeUnits(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function summarize(workflows: readonly WorkflowFile[]): ScanSummary {
  const valid = workflows.filter((workflow) => workflow.valid);
  return {
    totalFiles: workflows.length,
    validWorkflows: valid.length,
    invalidWorkflows: workflows.length - valid.length,
    totalNodes: valid.reduce((accumulator, workflow) => accumulator + workflow.nodeCount, 0),
  };
}
