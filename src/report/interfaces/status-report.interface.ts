import { JobFailure, JobStatus } from '../../batch/interfaces/job-result.interface';
import { RenderSettings } from '../../batch/interfaces/render-settings.interface';

export interface StatusReportJob {
  sourcePath: string;
  outputPath: string;
  status: JobStatus;
  error?: JobFailure;
  durationMs: number;
  attempts: number;
  startedAt: string;
  carriedOver?: boolean; // Rendered by an earlier run and skipped in this one
}

export interface StatusReportSummary {
  total: number;
  succeeded: number;
  failed: number;
  replaced: number;
  remaining: number;
  skipped: number;
  durationMs: number;
}

export interface StatusReportSettings extends RenderSettings {
  workers: number;
  maxRetries: number;
}

export interface StatusReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  mode: 'in-place' | 'directory';
  inputFolder: string;
  outputFolder?: string;
  cancelled: boolean;
  summary: StatusReportSummary;
  settings: StatusReportSettings;
  jobs: StatusReportJob[];
}

export interface ReportContext {
  runId: string;
  mode: 'in-place' | 'directory';
  inputFolder: string;
  outputFolder?: string;
  reportFolder: string; // Output paths in the report are relative to this folder
  settings: StatusReportSettings;
  cancelled: boolean;
}
