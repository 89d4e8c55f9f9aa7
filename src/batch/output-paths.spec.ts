import * as path from 'path';
import {
  disambiguateOutputPath,
  reportFolder,
  resolveOutputPath,
  safeFilename,
  toJobId,
} from './output-paths';

describe('output paths', () => {
  describe('safeFilename', () => {
    it('keeps letters, digits, dashes and underscores', () => {
      expect(safeFilename('daily-sync_v2')).toBe('daily-sync_v2');
    });

    it('replaces other characters and collapses underscores', () => {
      expect(safeFilename('My Flow (v2)')).toBe('My_Flow_v2');
      expect(safeFilename('a..b')).toBe('a_b');
    });

    it('keeps letters and digits from any script', () => {
      expect(safeFilename('データ')).toBe('データ');
      expect(safeFilename('Größe 2 (neu)')).toBe('Größe_2_neu');
      expect(safeFilename('処理 ٣')).toBe('処理_٣');
    });

    it('falls back to "workflow" when nothing usable is left', () => {
      expect(safeFilename('***')).toBe('workflow');
    });
  });

  it('derives job ids relative to the input folder with forward slashes', () => {
    const root = path.join(path.sep, 'data', 'flows');
    expect(toJobId(root, path.join(root, 'team', 'sync.json'))).toBe('team/sync.json');
  });

  it('places in-place output next to the source file', () => {
    const root = path.join(path.sep, 'data', 'flows');
    const source = path.join(root, 'team', 'Daily Sync.json');
    expect(resolveOutputPath({ mode: 'in-place', inputFolder: root }, source)).toBe(
      path.join(root, 'team', 'Daily_Sync.png'),
    );
  });

  it('mirrors sub-folders under the output folder', () => {
    const root = path.join(path.sep, 'data', 'flows');
    const out = path.join(path.sep, 'data', 'images');
    const layout = { mode: 'directory' as const, inputFolder: root, outputFolder: out };

    expect(resolveOutputPath(layout, path.join(root, 'a', 'sync.json'))).toBe(path.join(out, 'a', 'sync.png'));
    expect(resolveOutputPath(layout, path.join(root, 'sync.json'))).toBe(path.join(out, 'sync.png'));
    expect(reportFolder(layout)).toBe(out);
  });

  describe('disambiguateOutputPath', () => {
    const dir = path.join(path.sep, 'out');

    it('returns a free path unchanged', () => {
      expect(disambiguateOutputPath(path.join(dir, 'a.png'), new Set())).toBe(path.join(dir, 'a.png'));
    });

    it('numbers the stem until the path is free', () => {
      const taken = new Set([path.join(dir, 'a.png'), path.join(dir, 'a_2.png')]);

      expect(disambiguateOutputPath(path.join(dir, 'a.png'), taken)).toBe(path.join(dir, 'a_3.png'));
    });
  });
});
