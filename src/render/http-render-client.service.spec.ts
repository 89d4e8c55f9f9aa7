import { ConfigService } from '@nestjs/config';
import { promises as fsPromises } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  BackendRenderError,
  BackendUnreachableError,
  InvalidInputError,
  RunCancelledError,
} from '../batch/errors';
import { RenderSettings } from '../batch/interfaces/render-settings.interface';
import { HttpRenderClient } from './http-render-client.service';

const settings: RenderSettings = {
  width: 1280,
  height: 720,
  darkMode: true,
  timeoutSeconds: 30,
  waitSeconds: 2,
};

const workflow = {
  name: 'Nightly sync',
  nodes: [{ name: 'Start', type: 'trigger.manual', position: [0, 0], typeVersion: 1 }],
  connections: {},
};

describe('HttpRenderClient', () => {
  let tmpDir: string;
  let sourcePath: string;
  let client: HttpRenderClient;
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(async () => {
    tmpDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'flowsnap-client-'));
    sourcePath = path.join(tmpDir, 'nightly.json');
    await fsPromises.writeFile(sourcePath, JSON.stringify(workflow));
    client = new HttpRenderClient(new ConfigService({ RENDER_BACKEND_URL: 'http://render.test/' }));
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(async () => {
    fetchMock.mockRestore();
    await fsPromises.rm(tmpDir, { recursive: true, force: true });
  });

  it('posts the workflow and settings and returns the image bytes', async () => {
    fetchMock.mockResolvedValue(new Response('png-bytes', { status: 200 }));

    const bytes = await client.render(sourcePath, settings, new AbortController().signal);

    expect(bytes.toString()).toBe('png-bytes');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://render.test/render');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      workflow,
      width: 1280,
      height: 720,
      darkMode: true,
      waitMs: 2000,
    });
  });

  it('maps connection failures to BackendUnreachable', async () => {
    fetchMock.mockRejectedValue(
      new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:5000') }),
    );

    const rendering = client.render(sourcePath, settings, new AbortController().signal);

    await expect(rendering).rejects.toThrow(BackendUnreachableError);
    await expect(rendering).rejects.toThrow(
      'Render backend at http://render.test is unreachable: connect ECONNREFUSED 127.0.0.1:5000',
    );
  });

  it('maps an aborted request to Cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    fetchMock.mockRejectedValue(new Error('This operation was aborted'));

    await expect(client.render(sourcePath, settings, controller.signal)).rejects.toThrow(RunCancelledError);
  });

  it('maps 422 responses to InvalidInput', async () => {
    fetchMock.mockResolvedValue(new Response('unknown node type', { status: 422 }));

    await expect(client.render(sourcePath, settings, new AbortController().signal)).rejects.toThrow(
      new InvalidInputError(`Backend rejected ${sourcePath}: unknown node type`),
    );
  });

  it('maps other error responses to RenderError', async () => {
    fetchMock.mockResolvedValue(new Response('  canvas crashed \n', { status: 500 }));

    await expect(client.render(sourcePath, settings, new AbortController().signal)).rejects.toThrow(
      new BackendRenderError('Backend responded 500: canvas crashed'),
    );
  });

  it('rejects an empty image', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 200 }));

    await expect(client.render(sourcePath, settings, new AbortController().signal)).rejects.toThrow(
      BackendRenderError,
    );
  });

  it('fails with InvalidInput before calling the backend for a broken file', async () => {
    await fsPromises.writeFile(sourcePath, JSON.stringify({ name: 'Empty', nodes: [] }));

    await expect(client.render(sourcePath, settings, new AbortController().signal)).rejects.toThrow(
      new InvalidInputError(`Invalid workflow ${sourcePath}: nodes must be a non-empty array`),
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails with InvalidInput for a missing file', async () => {
    const rendering = client.render(path.join(tmpDir, 'gone.json'), settings, new AbortController().signal);

    await expect(rendering).rejects.toThrow(InvalidInputError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
