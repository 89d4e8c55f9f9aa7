import { parseArgs } from 'util';
import { InvalidRunRequestError } from '../batch/errors';
import { RenderSettings } from '../batch/interfaces/render-settings.interface';
import { PreviewRequest, RunRequest } from '../batch/batch.service';

export type CliCommand =
  | { command: 'scan'; inputFolder: string; recursive: boolean; verbose: boolean }
  | { command: 'generate'; request: RunRequest; verbose: boolean }
  | { command: 'preview'; request: PreviewRequest; open: boolean; verbose: boolean }
  | { command: 'fix'; inputFolder: string; recursive: boolean; dryRun: boolean; verbose: boolean }
  | { command: 'help' };

const VIEWPORT_OPTIONS = ['width', 'height', 'dark-mode', 'timeout', 'wait-time'];

const COMMAND_OPTIONS = new Map<string, readonly string[]>([
  ['scan', ['no-recursive', 'verbose']],
  [
    'generate',
    [...VIEWPORT_OPTIONS, 'in-place', 'square', 'force', 'workers', 'retries', 'no-recursive', 'verbose'],
  ],
  ['preview', [...VIEWPORT_OPTIONS, 'output', 'open', 'verbose']],
  ['fix', ['no-recursive', 'dry-run', 'verbose']],
]);

export const USAGE = `Usage:
  flowsnap scan <input-folder> [--no-recursive] [--verbose]
  flowsnap generate <input-folder> [output-folder] [options]
  flowsnap preview <workflow-file> [-o <image>] [--width <px>] [--height <px>] [--dark-mode] [--open]
  flowsnap fix <input-folder> [--no-recursive] [--dry-run]

Generate options:
  --in-place          Save images next to the source JSON files
  --width <px>        Viewport width (default: 1920)
  --height <px>       Viewport height (default: 1080)
  --square            Use a 2560x2560 viewport
  --dark-mode         Render on a dark background
  --force             Re-render everything, ignoring the previous report
  --timeout <s>       Per-workflow render timeout in seconds (default: 120)
  --wait-time <s>     Time the backend waits for the canvas (default: 60)
  --workers <n>       Parallel workers (default: 1, capped at CPU count)
  --retries <n>       Retries when the backend is unreachable (default: 0)
  --no-recursive      Only scan the top-level folder
  -v, --verbose       Debug logging

Preview options:
  -o, --output <file> Image path (default: <workflow>.png beside the file)
  --open              Open the image in the default viewer afterwards
  --width, --height, --dark-mode, --timeout and --wait-time as for generate

Fix options:
  --dry-run           Report the repairs without writing any file`;

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidRunRequestError(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }
  const allowed = COMMAND_OPTIONS.get(command);
  if (allowed === undefined) {
    throw new InvalidRunRequestError(`Unknown command "${command}"`);
  }

  const { values, positionals } = parseArgs({
    args: rest,
    allowPositionals: true,
    strict: true,
    options: {
      'in-place': { type: 'boolean' },
      'dark-mode': { type: 'boolean' },
      square: { type: 'boolean' },
      force: { type: 'boolean' },
      'no-recursive': { type: 'boolean' },
      'dry-run': { type: 'boolean' },
      open: { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      output: { type: 'string', short: 'o' },
      width: { type: 'string' },
      height: { type: 'string' },
      timeout: { type: 'string' },
      'wait-time': { type: 'string' },
      workers: { type: 'string' },
      retries: { type: 'string' },
    },
  });

  for (const flag of Object.keys(values)) {
    if (!allowed.includes(flag)) {
      throw new InvalidRunRequestError(`--${flag} is not an option of "${command}"`);
    }
  }

  const [target, outputFolder] = positionals;
  if (!target) {
    const expected = command === 'preview' ? '<workflow-file>' : '<input-folder>';
    throw new InvalidRunRequestError(`Missing ${expected} for "${command}"`);
  }
  const verbose = values.verbose ?? false;
  const recursive = !(values['no-recursive'] ?? false);

  if (command === 'scan') {
    return { command: 'scan', inputFolder: target, recursive, verbose };
  }
  if (command === 'fix') {
    return { command: 'fix', inputFolder: target, recursive, dryRun: values['dry-run'] ?? false, verbose };
  }

  const settings: Partial<RenderSettings> = {};
  const width = toNumber('width', values.width);
  const height = toNumber('height', values.height);
  const timeoutSeconds = toNumber('timeout', values.timeout);
  const waitSeconds = toNumber('wait-time', values['wait-time']);
  if (width !== undefined) settings.width = width;
  if (height !== undefined) settings.height = height;
  if (timeoutSeconds !== undefined) settings.timeoutSeconds = timeoutSeconds;
  if (waitSeconds !== undefined) settings.waitSeconds = waitSeconds;
  if (values['dark-mode']) settings.darkMode = true;

  if (command === 'preview') {
    return {
      command: 'preview',
      verbose,
      open: values.open ?? false,
      request: { workflowFile: target, outputPath: values.output, settings },
    };
  }

  return {
    command: 'generate',
    verbose,
    request: {
      inputFolder: target,
      outputFolder,
      inPlace: values['in-place'] ?? false,
      force: values.force ?? false,
      recursive,
      square: values.square ?? false,
      workers: toNumber('workers', values.workers),
      maxRetries: toNumber('retries', values.retries),
      settings,
    },
  };
}
