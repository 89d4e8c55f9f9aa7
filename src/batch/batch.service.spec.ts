import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { Test, TestingModule } from '@nestjs/testing';
import { promises as fsPromises } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RENDER_CLIENT } from '../constants';
import { WorkflowScannerService } from '../discovery/workflow-scanner.service';
import { RenderBackendService } from '../render/render-backend.service';
import { StatusReporterService } from '../report/status-reporter.service';
import { BatchService } from './batch.service';
import { BackendRenderError, InvalidRunRequestError } from './errors';
import { FakeRenderClient } from './testing/fake-render-client';

const workflow = (name: string) =>
  JSON.stringify({
    name,
    nodes: [{ name: 'Start', type: 'trigger.manual', position: [0, 0], typeVersion: 1 }],
    connections: {},
  });

describe('BatchService', () => {
  let service: BatchService;
  let renderClient: FakeRenderClient;
  let failing: Set<string>;
  let backend: { ensureRunning: jest.Mock<Promise<void>, []> };
  let tmpDir: string;
  let inputFolder: string;
  let outputFolder: string;

  beforeEach(async () => {
    failing = new Set();
    renderClient = new FakeRenderClient((name) =>
      failing.has(name) ? { error: new BackendRenderError(`cannot draw ${name}`) } : {},
    );
    backend = { ensureRunning: jest.fn<Promise<void>, []>().mockResolvedValue(undefined) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BatchService,
        WorkflowScannerService,
        StatusReporterService,
        SchedulerRegistry,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            MAX_WORKERS: '2',
            RETRY_DELAY_MS: '0',
            STATUS_INTERVAL_SECONDS: '0',
          }),
        },
        { provide: RenderBackendService, useValue: backend },
        { provide: RENDER_CLIENT, useValue: renderClient },
      ],
    }).compile();

    service = module.get(BatchService);

    tmpDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'flowsnap-batch-'));
    inputFolder = path.join(tmpDir, 'flows');
    outputFolder = path.join(tmpDir, 'images');
    await fsPromises.mkdir(path.join(inputFolder, 'team'), { recursive: true });
    await fsPromises.writeFile(path.join(inputFolder, 'a.json'), workflow('A'));
    await fsPromises.writeFile(path.join(inputFolder, 'b.json'), workflow('B'));
    await fsPromises.writeFile(path.join(inputFolder, 'team', 'c flow.json'), workflow('C'));
    await fsPromises.writeFile(path.join(inputFolder, 'invalid.json'), JSON.stringify({ name: 'Nope' }));
  });

  afterEach(async () => {
    await fsPromises.rm(tmpDir, { recursive: true, force: true });
  });

  describe('plan', () => {
    it('requires an output folder unless rendering in place', async () => {
      await expect(service.plan({ inputFolder })).rejects.toThrow(
        new InvalidRunRequestError('Either provide an output folder or use in-place mode'),
      );
    });

    it('ignores the output folder in place and warns about it', async () => {
      const { plan, warnings } = await service.plan({ inputFolder, outputFolder, inPlace: true });

      expect(plan.layout).toEqual({ mode: 'in-place', inputFolder });
      expect(plan.reportPath).toBe(path.join(inputFolder, 'flowsnap-job.json'));
      expect(warnings).toContain('--in-place is set; the output folder argument will be ignored');
    });

    it('queues only valid workflows in relative-path order', async () => {
      const { plan, scan } = await service.plan({ inputFolder, outputFolder });

      expect(plan.entries.map((entry) => path.relative(inputFolder, entry.sourcePath))).toEqual([
        'a.json',
        'b.json',
        path.join('team', 'c flow.json'),
      ]);
      expect(scan.summary).toMatchObject({ totalFiles: 4, validWorkflows: 3, invalidWorkflows: 1 });
      expect(plan.workers).toBe(Math.min(2, os.availableParallelism()));
      expect(plan.statusIntervalMs).toBe(0);
    });

    it('applies the square viewport and request overrides', async () => {
      const { plan } = await service.plan({
        inputFolder,
        outputFolder,
        square: true,
        settings: { darkMode: true, timeoutSeconds: 10 },
      });

      expect(plan.settings).toEqual({
        width: 2560,
        height: 2560,
        darkMode: true,
        timeoutSeconds: 10,
        waitSeconds: 60,
      });
    });

    it('rejects fewer than one worker', async () => {
      await expect(service.plan({ inputFolder, outputFolder, workers: 0 })).rejects.toThrow(
        'Workers must be at least 1',
      );
    });

    it('caps workers at the CPU count', async () => {
      const cpuCount = os.availableParallelism();
      const { plan, warnings } = await service.plan({ inputFolder, outputFolder, workers: cpuCount + 1 });

      expect(plan.workers).toBe(cpuCount);
      expect(warnings).toContain(
        `Requested ${cpuCount + 1} workers exceeds CPU count (${cpuCount}). Using ${cpuCount} workers.`,
      );
    });

    it('rejects a non-positive timeout', async () => {
      await expect(
        service.plan({ inputFolder, outputFolder, settings: { timeoutSeconds: 0 } }),
      ).rejects.toThrow(InvalidRunRequestError);
    });
  });

  describe('run', () => {
    it('renders every valid workflow into the output folder', async () => {
      const outcome = await service.run({ inputFolder, outputFolder });

      expect(outcome.stats).toMatchObject({ total: 3, succeeded: 3, failed: 0, remaining: 0 });
      expect(backend.ensureRunning).toHaveBeenCalledTimes(1);
      expect(outcome.reportPath).toBe(path.join(outputFolder, 'flowsnap-job.json'));
      expect(outcome.report.jobs.map((job) => job.outputPath)).toEqual([
        'a.png',
        'b.png',
        'team/c_flow.png',
      ]);
      await expect(
        fsPromises.readFile(path.join(outputFolder, 'team', 'c_flow.png'), 'utf-8'),
      ).resolves.toBe('png:c flow.json');
    });

    it('resumes by re-rendering only what failed last time', async () => {
      failing.add('b.json');
      const first = await service.run({ inputFolder, outputFolder });
      expect(first.stats).toMatchObject({ succeeded: 2, failed: 1 });

      failing.clear();
      renderClient.calls.length = 0;
      const second = await service.run({ inputFolder, outputFolder });

      expect(renderClient.calls).toEqual(['b.json']);
      expect(second.stats).toMatchObject({ total: 1, succeeded: 1, failed: 0 });
      expect(second.report.summary).toMatchObject({ total: 3, succeeded: 3, failed: 0, skipped: 2 });
      expect(second.report.summary.total).toBe(second.report.jobs.length);
      expect(second.report.jobs.map((job) => [job.sourcePath, job.status, job.carriedOver])).toEqual([
        ['a.json', 'success', true],
        ['team/c flow.json', 'success', true],
        ['b.json', 'success', undefined],
      ]);
    });

    it('carries nothing over from a report with incomplete entries', async () => {
      await fsPromises.mkdir(outputFolder, { recursive: true });
      await fsPromises.writeFile(
        path.join(outputFolder, 'flowsnap-job.json'),
        JSON.stringify({ summary: {}, jobs: [{ sourcePath: 'a.json', outputPath: 'a.png', status: 'success' }] }),
      );

      const outcome = await service.run({ inputFolder, outputFolder });

      expect(renderClient.calls).toHaveLength(3);
      expect(outcome.report.summary).toMatchObject({ total: 3, skipped: 0 });
      expect(outcome.report.jobs.every((job) => typeof job.durationMs === 'number')).toBe(true);
    });

    it('re-renders everything with force', async () => {
      await service.run({ inputFolder, outputFolder });
      renderClient.calls.length = 0;

      const outcome = await service.run({ inputFolder, outputFolder, force: true });

      expect(renderClient.calls).toHaveLength(3);
      expect(outcome.stats).toMatchObject({ total: 3, succeeded: 3, replaced: 3 });
      expect(outcome.report.summary.skipped).toBe(0);
    });

    it('cancels through the signal it is given and still writes the report', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await service.run({ inputFolder, outputFolder }, controller.signal);

      expect(outcome.cancelled).toBe(true);
      expect(outcome.stats).toMatchObject({ total: 3, succeeded: 0, remaining: 3 });
      expect(renderClient.calls).toEqual([]);
      const report = JSON.parse(await fsPromises.readFile(path.join(outputFolder, 'flowsnap-job.json'), 'utf-8'));
      expect(report.cancelled).toBe(true);
    });

    it('finishes without the backend when there is nothing to render', async () => {
      const empty = path.join(tmpDir, 'empty');
      await fsPromises.mkdir(empty);

      const outcome = await service.run({ inputFolder: empty, inPlace: true });

      expect(backend.ensureRunning).not.toHaveBeenCalled();
      expect(outcome.stats.total).toBe(0);
      await expect(fsPromises.access(path.join(empty, 'flowsnap-job.json'))).resolves.toBeUndefined();
    });
  });

  describe('preview', () => {
    it('renders one workflow beside its source without writing a report', async () => {
      const workflowFile = path.join(inputFolder, 'team', 'c flow.json');

      const outcome = await service.preview({ workflowFile });

      expect(outcome.outputPath).toBe(path.join(inputFolder, 'team', 'c flow.png'));
      expect(outcome.reportPath).toBeUndefined();
      expect(outcome.stats).toMatchObject({ total: 1, succeeded: 1, failed: 0 });
      expect(backend.ensureRunning).toHaveBeenCalledTimes(1);
      expect(renderClient.calls).toEqual(['c flow.json']);
      expect((await fsPromises.readdir(path.join(inputFolder, 'team'))).sort()).toEqual([
        'c flow.json',
        'c flow.png',
      ]);
    });

    it('writes to an explicit output path with overridden settings', async () => {
      const outputPath = path.join(tmpDir, 'previews', 'a-preview.png');

      const { plan } = await service.planPreview({
        workflowFile: path.join(inputFolder, 'a.json'),
        outputPath,
        settings: { width: 640, darkMode: true },
      });
      const outcome = await service.preview({ workflowFile: path.join(inputFolder, 'a.json'), outputPath });

      expect(plan.workers).toBe(1);
      expect(plan.settings).toMatchObject({ width: 640, height: 1080, darkMode: true });
      expect(plan.entries).toEqual([{ sourcePath: path.join(inputFolder, 'a.json'), outputPath }]);
      expect(outcome.outputPath).toBe(outputPath);
      await expect(fsPromises.readFile(outputPath, 'utf-8')).resolves.toBe('png:a.json');
    });

    it('reports a failed render in the outcome', async () => {
      failing.add('b.json');

      const outcome = await service.preview({ workflowFile: path.join(inputFolder, 'b.json') });

      expect(outcome.stats).toMatchObject({ total: 1, succeeded: 0, failed: 1 });
      expect(outcome.report.jobs[0].error).toEqual({ reason: 'RenderError', message: 'cannot draw b.json' });
    });

    it('rejects an invalid workflow before starting the backend', async () => {
      await expect(service.preview({ workflowFile: path.join(inputFolder, 'invalid.json') })).rejects.toThrow(
        new InvalidRunRequestError('Invalid workflow invalid.json: nodes must be a non-empty array'),
      );
      expect(backend.ensureRunning).not.toHaveBeenCalled();
      expect(renderClient.calls).toEqual([]);
    });

    it('rejects a missing workflow file', async () => {
      await expect(service.preview({ workflowFile: path.join(inputFolder, 'missing.json') })).rejects.toThrow(
        /^Workflow file not found: /,
      );
    });
  });
});
