import { ConfigService } from '@nestjs/config';
import { RenderSettings } from '../batch/interfaces/render-settings.interface';
import {
  DEFAULT_BACKEND_STARTUP_SECONDS,
  DEFAULT_BACKEND_URL,
  DEFAULT_ETA_SAMPLE_SIZE,
  DEFAULT_HEIGHT,
  DEFAULT_REPORT_FILENAME,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_STATUS_INTERVAL_SECONDS,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_WAIT_SECONDS,
  DEFAULT_WIDTH,
} from '../constants';
import { readBoolean, readNumber, readString } from './config.helpers';

export interface BatchDefaults {
  settings: RenderSettings;
  workers: number;
  maxRetries: number;
  retryDelayMs: number;
  etaSampleSize: number;
  statusIntervalMs: number;
  reportFilename: string;
}

export interface BackendConfig {
  url: string;
  command?: string;
  startupSeconds: number;
}

export function loadBatchDefaults(config: ConfigService): BatchDefaults {
  return {
    settings: {
      width: readNumber(config, 'RENDER_WIDTH', DEFAULT_WIDTH),
      height: readNumber(config, 'RENDER_HEIGHT', DEFAULT_HEIGHT),
      darkMode: readBoolean(config, 'RENDER_DARK_MODE', false),
      timeoutSeconds: readNumber(config, 'RENDER_TIMEOUT_SECONDS', DEFAULT_TIMEOUT_SECONDS),
      waitSeconds: readNumber(config, 'RENDER_WAIT_SECONDS', DEFAULT_WAIT_SECONDS),
    },
    workers: readNumber(config, 'MAX_WORKERS', 1),
    maxRetries: readNumber(config, 'MAX_RETRIES', 0),
    retryDelayMs: readNumber(config, 'RETRY_DELAY_MS', DEFAULT_RETRY_DELAY_MS),
    etaSampleSize: readNumber(config, 'ETA_SAMPLE_SIZE', DEFAULT_ETA_SAMPLE_SIZE),
    statusIntervalMs: readNumber(config, 'STATUS_INTERVAL_SECONDS', DEFAULT_STATUS_INTERVAL_SECONDS) * 1000,
    reportFilename: readString(config, 'REPORT_FILENAME', DEFAULT_REPORT_FILENAME),
  };
}

export function loadBackendConfig(config: ConfigService): BackendConfig {
  const command = readString(config, 'RENDER_BACKEND_COMMAND', '');
  return {
    url: readString(config, 'RENDER_BACKEND_URL', DEFAULT_BACKEND_URL).replace(/\/+$/, ''),
    command: command || undefined,
    startupSeconds: readNumber(config, 'RENDER_BACKEND_STARTUP_SECONDS', DEFAULT_BACKEND_STARTUP_SECONDS),
  };
}
