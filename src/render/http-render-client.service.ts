import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fsPromises } from 'fs';
import {
  BackendRenderError,
  BackendUnreachableError,
  InvalidInputError,
  RunCancelledError,
  describeError,
} from '../batch/errors';
import { RenderSettings } from '../batch/interfaces/render-settings.interface';
import { loadBackendConfig } from '../config/batch-defaults';
import { WorkflowData } from '../discovery/interfaces/workflow-file.interface';
import { validateWorkflow } from '../discovery/workflow-validation';
import { RenderClient } from './render-client.interface';

export interface RenderRequestBody {
  workflow: WorkflowData;
  width: number;
  height: number;
  darkMode: boolean;
  waitMs: number;
}

/**
 * Sends one workflow to the render backend's /render endpoint and returns the
 * PNG it answers with.
 */
@Injectable()
export class HttpRenderClient implements RenderClient {
  private readonly logger = new Logger(HttpRenderClient.name);
  private readonly baseUrl: string;

  constructor(configService: ConfigService) {
    this.baseUrl = loadBackendConfig(configService).url;
  }

  async render(
    sourcePath: string,
    settings: Readonly<RenderSettings>,
    signal: AbortSignal,
  ): Promise<Buffer> {
    const workflow = await this.readWorkflow(sourcePath);
    const body: RenderRequestBody = {
      workflow,
      width: settings.width,
      height: settings.height,
      darkMode: settings.darkMode,
      waitMs: settings.waitSeconds * 1000,
    };

    this.logger.debug(`Rendering ${workflow.name} (${sourcePath}) via ${this.baseUrl}/render`);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/render`, {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'image/png' },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw new RunCancelledError();
      }
      throw new BackendUnreachableError(
        `Render backend at ${this.baseUrl} is unreachable: ${describeCause(error)}`,
        { cause: error },
      );
    }

    if (response.status === 400 || response.status === 422) {
      throw new InvalidInputError(`Backend rejected ${sourcePath}: ${await readText(response)}`);
    }
    if (!response.ok) {
      throw new BackendRenderError(
        `Backend responded ${response.status}: ${await readText(response)}`,
      );
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new BackendRenderError(`Backend returned an empty image for ${sourcePath}`);
    }
    return bytes;
  }

  private async readWorkflow(sourcePath: string): Promise<WorkflowData> {
    let content: string;
    try {
      content = await fsPromises.readFile(sourcePath, 'utf-8');
    } catch (error) {
      throw new InvalidInputError(`Cannot read ${sourcePath}: ${describeError(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new InvalidInputError(`Invalid JSON in ${sourcePath}: ${describeError(error)}`, { cause: error });
    }

    const validation = validateWorkflow(parsed);
    if (!validation.valid) {
      throw new InvalidInputError(`Invalid workflow ${sourcePath}: ${validation.error}`);
    }
    return validation.workflow;
  }
}

// fetch wraps socket errors (ECONNREFUSED and friends) in a TypeError's cause.
function describeCause(error: unknown): string {
  if (error instanceof Error && error.cause !== undefined) {
    return describeError(error.cause);
  }
  return describeError(error);
}

async function readText(response: Response): Promise<string> {
  try {
    const text = (await response.text()).trim();
    return text.length > 0 ? text.slice(0, 500) : response.statusText;
  } catch (error) {
    return `${response.statusText} (body unreadable: ${describeError(error)})`;
  }
}
