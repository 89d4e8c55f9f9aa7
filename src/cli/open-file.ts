import { Logger } from '@nestjs/common';
import { spawn } from 'child_process';
import { describeError } from '../batch/errors';

export function openerCommand(platform: NodeJS.Platform, filePath: string): [string, string[]] {
  if (platform === 'darwin') {
    return ['open', [filePath]];
  }
  if (platform === 'win32') {
    // The empty argument is the window title `start` expects first.
    return ['cmd', ['/c', 'start', '', filePath]];
  }
  return ['xdg-open', [filePath]];
}

/**
 * Hands a file to the platform's default viewer without waiting for it.
 */
export function openFile(filePath: string, logger: Logger): void {
  const [command, args] = openerCommand(process.platform, filePath);
  const child = spawn(command, args, { detached: true, stdio: 'ignore' });
  child.once('error', (error) => logger.warn(`Could not open ${filePath}: ${describeError(error)}`));
  child.unref();
}
