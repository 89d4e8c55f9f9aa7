import { JobStatus } from './job-result.interface';

export type WorkerSlotState =
  | { state: 'idle'; workerId: number }
  | { state: 'rendering'; workerId: number; jobId: string; startedAt: Date }
  | { state: 'completed'; workerId: number; jobId: string; status: JobStatus };
