import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChildProcess, spawn } from 'child_process';
import treeKill from 'tree-kill';
import { BackendUnreachableError, describeError } from '../batch/errors';
import { BackendConfig, loadBackendConfig } from '../config/batch-defaults';

const HEALTH_POLL_INTERVAL_MS = 500;

/**
 * Lifecycle of the local render backend. When RENDER_BACKEND_COMMAND is set the
 * backend is started here and its whole process tree is killed on shutdown;
 * otherwise an already running backend is expected at RENDER_BACKEND_URL.
 */
@Injectable()
export class RenderBackendService implements OnApplicationShutdown {
  private readonly logger = new Logger(RenderBackendService.name);
  private readonly config: BackendConfig;
  private backendProcess?: ChildProcess;

  constructor(configService: ConfigService) {
    this.config = loadBackendConfig(configService);
  }

  async ensureRunning(): Promise<void> {
    if (await this.isHealthy()) {
      this.logger.log(`Render backend available at ${this.config.url}`);
      return;
    }

    if (!this.config.command) {
      this.logger.warn(
        `Render backend at ${this.config.url} is not responding; jobs will fail as BackendUnreachable until it is`,
      );
      return;
    }

    this.startProcess(this.config.command);
    await this.waitUntilHealthy();
  }

  async isHealthy(): Promise<boolean> {
    try {
      const response = await fetch(`${this.config.url}/health`, {
        signal: AbortSignal.timeout(2000),
      });
      return response.ok;
    } catch (error) {
      this.logger.debug(`Health check failed: ${describeError(error)}`);
      return false;
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  async stop(): Promise<void> {
    const child = this.backendProcess;
    this.backendProcess = undefined;
    if (!child?.pid || child.exitCode !== null) {
      return;
    }

    const pid = child.pid;
    this.logger.log(`Stopping render backend (PID ${pid})`);
    await new Promise<void>((resolve) => {
      treeKill(pid, 'SIGTERM', (err) => {
        if (err) {
          this.logger.error(`Failed to kill process tree for PID ${pid}: ${err.message}`);
        } else {
          this.logger.log(`Render backend process tree ${pid} stopped`);
        }
        resolve();
      });
    });
  }

  private startProcess(command: string): void {
    this.logger.log(`Starting render backend: ${command}`);
    const child = spawn(command, {
      shell: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    child.stdout?.on('data', (data: Buffer) => {
      this.logger.debug(`[backend] ${data.toString().trimEnd()}`);
    });
    child.stderr?.on('data', (data: Buffer) => {
      this.logger.debug(`[backend] ${data.toString().trimEnd()}`);
    });
    child.on('error', (error) => {
      this.logger.error(`Render backend process error: ${error.message}`);
    });
    child.on('close', (code) => {
      if (this.backendProcess === child) {
        this.logger.warn(`Render backend exited with code ${code}`);
        this.backendProcess = undefined;
      }
    });

    this.backendProcess = child;
  }

  private async waitUntilHealthy(): Promise<void> {
    const deadline = Date.now() + this.config.startupSeconds * 1000;

    while (Date.now() < deadline) {
      if (!this.backendProcess) {
        throw new BackendUnreachableError('Render backend exited during startup');
      }
      if (await this.isHealthy()) {
        this.logger.log(`Render backend running on ${this.config.url}`);
        return;
      }
      await new Promise((resolve) => setTimeout(resolve, HEALTH_POLL_INTERVAL_MS));
    }

    await this.stop();
    throw new BackendUnreachableError(
      `Render backend did not become healthy within ${this.config.startupSeconds}s`,
    );
  }
}
