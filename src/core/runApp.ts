/**
 * App runner - graphics bring-up, frame loop and teardown for one window.
 */

import { reportAdapters } from './adapterReporter';
import { createFrameLoop, type ExitReason } from './createFrameLoop';
import { SurfaceOutOfMemoryError } from './errors';
import { GraphicsContext } from './GraphicsContext';
import type { EventLoop, GraphicsInstance, WindowHandle } from './types';
import { resolveOptions } from '../config/resolveOptions';
import type { BootstrapOptions } from '../config/types';
import { createConsoleLogger, type Logger } from '../utils/logger';

/**
 * Everything the runner needs from a platform.
 */
export interface AppEnvironment<W extends WindowHandle = WindowHandle> {
  readonly instance: GraphicsInstance<W>;
  readonly window: W;
  readonly eventLoop: EventLoop;
  /** Releases the window and its event sources. Runs after the graphics context is destroyed. */
  readonly dispose?: () => void;
}

export interface RunAppOptions extends BootstrapOptions {
  /** Overrides the console logger built from `logLevel`. */
  readonly logger?: Logger;
}

/**
 * Brings up the graphics context for the environment's window and runs the frame loop
 * until it exits.
 *
 * Teardown order is fixed: the context (and with it the surface) goes first, the window last.
 *
 * @returns Why the loop stopped
 * @throws {GraphicsInitError} If initialization fails
 * @throws {SurfaceOutOfMemoryError} If the loop stopped because the surface ran out of memory
 */
export async function runApp<W extends WindowHandle>(
  environment: AppEnvironment<W>,
  options: RunAppOptions = {}
): Promise<ExitReason> {
  try {
    const resolved = resolveOptions(options);
    const logger = options.logger ?? createConsoleLogger({ level: resolved.logLevel });

    if (resolved.reportAdapters) {
      await reportAdapters(environment.instance.gpu, logger);
    }

    const context = await GraphicsContext.create(environment.window, environment.instance, {
      powerPreference: resolved.powerPreference,
      maxFrameLatency: resolved.maxFrameLatency,
      logger,
    });

    const frameLoop = createFrameLoop(context, environment.window, {
      exitKey: resolved.exitKey,
      logger,
    });

    try {
      await environment.eventLoop.run(frameLoop.handleEvent);
    } finally {
      context.destroy();
    }

    const reason = frameLoop.exitReason ?? 'close-requested';
    if (reason === 'out-of-memory') {
      throw new SurfaceOutOfMemoryError();
    }

    logger.debug(`Frame loop exited: ${reason}`);
    return reason;
  } finally {
    environment.dispose?.();
  }
}
