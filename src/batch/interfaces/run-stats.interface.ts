export interface RunStats {
  total: number;
  succeeded: number; // Includes replaced
  failed: number;
  replaced: number;
  remaining: number;
  startedAt: Date;
  finishedAt?: Date;
  elapsedMs: number;
  averageDurationMs: number | null;
  etaSeconds: number | null;
  throughputPerMinute: number;
  activeWorkers: number;
}
