import * as path from 'path';
import { OUTPUT_EXTENSION } from '../constants';
import { OutputLayout } from './interfaces/render-settings.interface';

/**
 * Filesystem-safe version of a file stem: anything but letters, digits
 * (any script), dashes and underscores becomes an underscore, runs collapse,
 * and edge underscores are trimmed.
 */
export function safeFilename(stem: string): string {
  const safe = stem
    .replace(/[^\p{L}\p{N}_-]/gu, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '');
  return safe.length > 0 ? safe : 'workflow';
}

// Forward slashes keep ids and report entries identical across platforms.
export function toJobId(inputFolder: string, sourcePath: string): string {
  return path.relative(inputFolder, sourcePath).split(path.sep).join('/');
}

export function resolveOutputPath(layout: OutputLayout, sourcePath: string): string {
  const filename = safeFilename(path.parse(sourcePath).name) + OUTPUT_EXTENSION;

  if (layout.mode === 'in-place') {
    return path.join(path.dirname(sourcePath), filename);
  }

  const relativeDir = path.dirname(path.relative(layout.inputFolder, sourcePath));
  return path.join(layout.outputFolder, relativeDir, filename);
}

export function reportFolder(layout: OutputLayout): string {
  return layout.mode === 'in-place' ? layout.inputFolder : layout.outputFolder;
}

/**
 * Appends `_2`, `_3`, ... to the file stem until the path is not in `taken`.
 */
export function disambiguateOutputPath(outputPath: string, taken: ReadonlySet<string>): string {
  if (!taken.has(outputPath)) {
    return outputPath;
  }
  const { dir, name, ext } = path.parse(outputPath);
  for (let suffix = 2; ; suffix++) {
    const candidate = path.join(dir, `${name}_${suffix}${ext}`);
    if (!taken.has(candidate)) {
      return candidate;
    }
  }
}
