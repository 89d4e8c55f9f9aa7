export interface RenderSettings {
  width: number;
  height: number;
  darkMode: boolean;
  timeoutSeconds: number; // Per-job budget enforced by the worker pool
  waitSeconds: number; // Time the backend waits for the canvas to settle
}

export type OutputLayout =
  | { mode: 'in-place'; inputFolder: string }
  | { mode: 'directory'; inputFolder: string; outputFolder: string };
