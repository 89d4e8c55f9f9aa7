import { Job, QueueEntry } from './interfaces/job.interface';
import { OutputLayout, RenderSettings } from './interfaces/render-settings.interface';
import { disambiguateOutputPath, resolveOutputPath, toJobId } from './output-paths';

/**
 * Ordered, immutable list of render jobs built once per run. Jobs are handed
 * out in entry order and never twice; once drained every take returns
 * undefined immediately. No two jobs share an output path: a later job whose
 * safe name collides with an earlier one gets a numbered suffix.
 */
export class JobQueue {
  private readonly jobs: readonly Job[];
  private cursor = 0;
  private exhaustedListener?: () => void;
  private exhaustedNotified = false;

  constructor(entries: readonly QueueEntry[], settings: RenderSettings, layout: OutputLayout) {
    const shared: Readonly<RenderSettings> = Object.freeze({ ...settings });
    const seen = new Set<string>();
    const outputs = new Set<string>();

    this.jobs = Object.freeze(
      entries.map((entry, index) => {
        const id = toJobId(layout.inputFolder, entry.sourcePath);
        if (seen.has(id)) {
          throw new Error(`Duplicate workflow in queue: ${id}`);
        }
        seen.add(id);

        const config = entry.overrides
          ? Object.freeze({ ...shared, ...entry.overrides })
          : shared;

        const outputPath = disambiguateOutputPath(
          entry.outputPath ?? resolveOutputPath(layout, entry.sourcePath),
          outputs,
        );
        outputs.add(outputPath);

        return Object.freeze({
          id,
          index,
          sourcePath: entry.sourcePath,
          outputPath,
          config,
        });
      }),
    );
  }

  get size(): number {
    return this.jobs.length;
  }

  get taken(): number {
    return this.cursor;
  }

  get pending(): number {
    return this.jobs.length - this.cursor;
  }

  get exhausted(): boolean {
    return this.cursor >= this.jobs.length;
  }

  list(): readonly Job[] {
    return this.jobs;
  }

  /**
   * Registers a one-shot listener fired when the last job is handed out, or
   * on the first take from an empty queue.
   */
  onExhausted(listener: () => void): void {
    this.exhaustedListener = listener;
  }

  take(): Job | undefined {
    const job = this.jobs[this.cursor];
    if (job) {
      this.cursor++;
    }
    if (this.exhausted) {
      this.notifyExhausted();
    }
    return job;
  }

  private notifyExhausted(): void {
    if (this.exhaustedNotified) {
      return;
    }
    this.exhaustedNotified = true;
    this.exhaustedListener?.();
  }
}
