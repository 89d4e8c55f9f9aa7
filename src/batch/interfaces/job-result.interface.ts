export type JobStatus = 'success' | 'failed' | 'replaced';

export type FailureReason =
  | 'BackendUnreachable'
  | 'Timeout'
  | 'InvalidInput'
  | 'RenderError'
  | 'IOError'
  | 'Cancelled';

export interface JobFailure {
  reason: FailureReason;
  message: string;
}

interface JobResultBase {
  jobId: string;
  index: number;
  sourcePath: string;
  outputPath: string;
  workerId: number;
  attempts: number;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export interface SucceededJobResult extends JobResultBase {
  status: 'success' | 'replaced';
}

export interface FailedJobResult extends JobResultBase {
  status: 'failed';
  error: JobFailure;
}

export type JobResult = SucceededJobResult | FailedJobResult;
