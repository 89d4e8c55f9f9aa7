import { RenderSettings } from './render-settings.interface';

export interface QueueEntry {
  sourcePath: string;
  overrides?: Partial<RenderSettings>;
  outputPath?: string; // Explicit destination instead of the layout's
}

export interface Job {
  readonly id: string; // Source path relative to the input folder
  readonly index: number; // Position in the queue
  readonly sourcePath: string;
  readonly outputPath: string;
  readonly config: Readonly<RenderSettings>;
}
