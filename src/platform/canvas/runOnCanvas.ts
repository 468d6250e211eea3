import { createBrowserInstance } from './createBrowserInstance';
import { createCanvasPlatform, type CanvasPlatformOptions } from './createCanvasPlatform';
import type { ExitReason } from '../../core/createFrameLoop';
import { runApp, type RunAppOptions } from '../../core/runApp';

export interface RunOnCanvasOptions extends RunAppOptions, CanvasPlatformOptions {}

/**
 * Runs the clear-screen frame loop on `canvas` until it is closed or Escape is pressed.
 *
 * @example
 * ```typescript
 * const canvas = document.querySelector('canvas');
 * if (canvas) await runOnCanvas(canvas, { logLevel: 'debug' });
 * ```
 */
export async function runOnCanvas(
  canvas: HTMLCanvasElement,
  options: RunOnCanvasOptions = {}
): Promise<ExitReason> {
  const instance = createBrowserInstance();
  const platform = createCanvasPlatform(canvas, {
    devicePixelRatio: options.devicePixelRatio,
    eventTarget: options.eventTarget,
  });

  return runApp(
    {
      instance,
      window: platform.window,
      eventLoop: platform.eventLoop,
      dispose: platform.dispose,
    },
    options
  );
}
