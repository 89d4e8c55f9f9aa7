export const RENDER_CLIENT = Symbol('RENDER_CLIENT');

export const DEFAULT_BACKEND_URL = 'http://127.0.0.1:5000';
export const DEFAULT_REPORT_FILENAME = 'flowsnap-job.json';
export const OUTPUT_EXTENSION = '.png';

export const DEFAULT_WIDTH = 1920;
export const DEFAULT_HEIGHT = 1080;
export const SQUARE_SIZE = 2560;
export const DEFAULT_TIMEOUT_SECONDS = 120;
export const DEFAULT_WAIT_SECONDS = 60;

export const DEFAULT_ETA_SAMPLE_SIZE = 10;
export const DEFAULT_RETRY_DELAY_MS = 2000;
export const DEFAULT_STATUS_INTERVAL_SECONDS = 5;
export const DEFAULT_BACKEND_STARTUP_SECONDS = 30;

// Rough resident size of one headless browser session on the backend.
export const ESTIMATED_MEMORY_PER_WORKER_BYTES = 400 * 1024 * 1024;
