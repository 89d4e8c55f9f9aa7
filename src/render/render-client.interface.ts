import { RenderSettings } from '../batch/interfaces/render-settings.interface';

/**
 * Turns one workflow file into PNG bytes. Implementations reject with a
 * RenderFailure subclass and should stop work when the signal aborts. The
 * worker pool may call render concurrently.
 */
export interface RenderClient {
  render(
    sourcePath: string,
    settings: Readonly<RenderSettings>,
    signal: AbortSignal,
  ): Promise<Buffer>;
}
