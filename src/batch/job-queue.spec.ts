import * as path from 'path';
import { RenderSettings } from './interfaces/render-settings.interface';
import { JobQueue } from './job-queue';

const root = path.join(path.sep, 'flows');
const settings: RenderSettings = {
  width: 1920,
  height: 1080,
  darkMode: false,
  timeoutSeconds: 120,
  waitSeconds: 60,
};

function entries(...names: string[]) {
  return names.map((name) => ({ sourcePath: path.join(root, name) }));
}

describe('JobQueue', () => {
  it('hands out jobs in entry order exactly once', () => {
    const queue = new JobQueue(entries('b.json', 'a.json', 'c.json'), settings, {
      mode: 'in-place',
      inputFolder: root,
    });

    expect(queue.take()?.id).toBe('b.json');
    expect(queue.take()?.id).toBe('a.json');
    expect(queue.take()?.id).toBe('c.json');
    expect(queue.take()).toBeUndefined();
    expect(queue.take()).toBeUndefined();
    expect(queue.taken).toBe(3);
    expect(queue.pending).toBe(0);
  });

  it('assigns indices and output paths', () => {
    const queue = new JobQueue(entries('x/one.json'), settings, { mode: 'in-place', inputFolder: root });
    const job = queue.take();

    expect(job).toEqual({
      id: 'x/one.json',
      index: 0,
      sourcePath: path.join(root, 'x', 'one.json'),
      outputPath: path.join(root, 'x', 'one.png'),
      config: settings,
    });
  });

  it('gives non-ASCII names their own output files', () => {
    const queue = new JobQueue(entries('データ.json', '処理.json'), settings, {
      mode: 'in-place',
      inputFolder: root,
    });

    expect(queue.list().map((job) => job.outputPath)).toEqual([
      path.join(root, 'データ.png'),
      path.join(root, '処理.png'),
    ]);
  });

  it('suffixes later jobs whose output path would collide', () => {
    const queue = new JobQueue(entries('daily sync.json', 'daily_sync.json', 'daily-sync.json', '+daily sync+.json'), settings, {
      mode: 'in-place',
      inputFolder: root,
    });

    expect(queue.list().map((job) => path.basename(job.outputPath))).toEqual([
      'daily_sync.png',
      'daily_sync_2.png',
      'daily-sync.png',
      'daily_sync_3.png',
    ]);
  });

  it('uses an explicit output path when the entry has one', () => {
    const target = path.join(path.sep, 'tmp', 'preview.png');
    const queue = new JobQueue([{ sourcePath: path.join(root, 'a.json'), outputPath: target }], settings, {
      mode: 'in-place',
      inputFolder: root,
    });

    expect(queue.take()?.outputPath).toBe(target);
  });

  it('fires the exhausted listener once, when the last job is taken', () => {
    const queue = new JobQueue(entries('a.json', 'b.json'), settings, { mode: 'in-place', inputFolder: root });
    const listener = jest.fn();
    queue.onExhausted(listener);

    queue.take();
    expect(listener).not.toHaveBeenCalled();
    queue.take();
    expect(listener).toHaveBeenCalledTimes(1);
    expect(queue.exhausted).toBe(true);
    queue.take();
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('reports exhaustion on the first take from an empty queue', () => {
    const queue = new JobQueue([], settings, { mode: 'in-place', inputFolder: root });
    const listener = jest.fn();
    queue.onExhausted(listener);

    expect(queue.size).toBe(0);
    expect(queue.take()).toBeUndefined();
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('shares one frozen config unless an entry overrides it', () => {
    const queue = new JobQueue(
      [
        { sourcePath: path.join(root, 'a.json') },
        { sourcePath: path.join(root, 'b.json') },
        { sourcePath: path.join(root, 'c.json'), overrides: { darkMode: true } },
      ],
      settings,
      { mode: 'in-place', inputFolder: root },
    );
    const [a, b, c] = queue.list();

    expect(a.config).toBe(b.config);
    expect(a.config).not.toBe(settings);
    expect(Object.isFrozen(a.config)).toBe(true);
    expect(c.config).toEqual({ ...settings, darkMode: true });
    expect(a.config.darkMode).toBe(false);
    expect(Object.isFrozen(a)).toBe(true);
  });

  it('rejects the same source twice', () => {
    expect(
      () => new JobQueue(entries('a.json', 'a.json'), settings, { mode: 'in-place', inputFolder: root }),
    ).toThrow('Duplicate workflow in queue: a.json');
  });
});
