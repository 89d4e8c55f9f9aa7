import { Injectable, Logger } from '@nestjs/common';
import { promises as fsPromises } from 'fs';
import * as path from 'path';
import { describeError } from '../batch/errors';
import { toJobId } from '../batch/output-paths';
import { ScanOptions, WorkflowScannerService } from './workflow-scanner.service';
import { isRecord } from './workflow-validation';

export type RepairStatus = 'fixed' | 'skipped' | 'failed';

export interface RepairResult {
  path: string;
  relativePath: string;
  status: RepairStatus;
  message: string;
}

export interface RepairOptions extends ScanOptions {
  dryRun?: boolean;
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Repairs workflow exports that fail to load for two common reasons: a
 * missing or empty `name`, and trailing data after the top-level object.
 */
@Injectable()
export class WorkflowRepairService {
  private readonly logger = new Logger(WorkflowRepairService.name);

  constructor(private readonly scanner: WorkflowScannerService) {}

  async repairFolder(inputFolder: string, options: RepairOptions = {}): Promise<RepairResult[]> {
    const root = path.resolve(inputFolder);
    const files = await this.scanner.listJsonFiles(root, options);
    this.logger.log(`Found ${files.length} JSON files in ${root}`);

    const results: RepairResult[] = [];
    for (const filePath of files) {
      const result = await this.repairFile(root, filePath, options.dryRun ?? false);
      if (result.status === 'fixed') {
        this.logger.log(`${result.relativePath}: ${result.message}`);
      } else if (result.status === 'skipped') {
        this.logger.debug(`${result.relativePath}: ${result.message}`);
      } else {
        this.logger.warn(`${result.relativePath}: ${result.message}`);
      }
      results.push(result);
    }
    return results;
  }

  async repairFile(root: string, filePath: string, dryRun = false): Promise<RepairResult> {
    const relativePath = toJobId(root, filePath);
    const result = (status: RepairStatus, message: string): RepairResult => ({
      path: filePath,
      relativePath,
      status,
      message,
    });

    let content: string;
    try {
      content = await fsPromises.readFile(filePath, 'utf-8');
    } catch (error) {
      return result('failed', `Error: ${describeError(error)}`);
    }

    let truncated = false;
    let parsed = tryParse(content);
    if (!parsed.ok) {
      const end = endOfFirstObject(content);
      const retry = end === undefined ? undefined : tryParse(content.slice(0, end));
      if (retry === undefined || !retry.ok) {
        return result('failed', `Invalid JSON: ${parsed.error}`);
      }
      this.logger.warn(`${relativePath}: extra data after character ${end}`);
      parsed = retry;
      truncated = true;
    }

    const data = parsed.value;
    if (!isRecord(data)) {
      return result('failed', 'Workflow must be a JSON object');
    }
    if (!('nodes' in data)) {
      return result('failed', 'Missing nodes field - not a valid workflow');
    }

    const needsName = !data.name;
    if (!needsName && !truncated) {
      return result('skipped', 'Already valid');
    }

    const name = path.parse(filePath).name;
    const entries: Array<[string, unknown]> = [
      ['name', name],
      ...Object.entries(data).filter(([key]) => key !== 'name'),
    ];
    const repaired = needsName ? Object.fromEntries(entries) : data;

    const changes: string[] = [];
    if (needsName) {
      changes.push(dryRun ? `Would add name: '${name}'` : `Added name: '${name}'`);
    }
    if (truncated) {
      changes.push(dryRun ? 'Would remove extra data' : 'Removed extra data');
    }

    if (!dryRun) {
      try {
        await fsPromises.writeFile(filePath, JSON.stringify(repaired, null, 2) + '\n', 'utf-8');
      } catch (error) {
        return result('failed', `Error: ${describeError(error)}`);
      }
    }
    return result('fixed', changes.join('; '));
  }
}

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: describeError(error) };
  }
}

/**
 * Index just past the brace that closes the first top-level object, ignoring
 * braces inside strings. Undefined when no object closes.
 */
export function endOfFirstObject(text: string): number | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }
  return undefined;
}
