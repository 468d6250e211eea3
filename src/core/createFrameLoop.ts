/**
 * Frame loop - turns window events into resize, update and render calls on a target.
 *
 * A lost surface is reconfigured like an outdated one. When the device behind it is gone this
 * repeats every frame; the first failure of such a run is logged at error level.
 */

import type {
  LoopControl,
  LoopEvent,
  PhysicalSize,
  RenderResult,
  WindowEvent,
  WindowHandle,
} from './types';
import { noopLogger, type Logger } from '../utils/logger';

export type FrameLoopPhase = 'uninitialized' | 'ready';

export type ExitReason = 'close-requested' | 'exit-key' | 'out-of-memory';

/**
 * What the frame loop drives. {@link GraphicsContext} implements this.
 */
export interface FrameLoopTarget {
  readonly size: PhysicalSize;
  /** Returns true when the event was consumed and default handling must be skipped. */
  input(event: WindowEvent): boolean;
  update(): void;
  resize(size: PhysicalSize): void;
  render(): RenderResult;
}

export interface FrameLoopOptions {
  /** Key code that exits when pressed with no modifiers (default: `Escape`). */
  readonly exitKey?: string;
  readonly logger?: Logger;
}

export interface FrameLoop {
  /** `uninitialized` until the first resize reaches the window, then `ready` for good. */
  readonly phase: FrameLoopPhase;
  readonly configured: boolean;
  /** Set once, by the first exit request. */
  readonly exitReason: ExitReason | null;
  handleEvent(event: LoopEvent, control: LoopControl): void;
}

const assertNever = (value: never): never => {
  throw new Error(`Unhandled surface error: ${String(value)}`);
};

export function createFrameLoop(
  target: FrameLoopTarget,
  window: WindowHandle,
  options: FrameLoopOptions = {}
): FrameLoop {
  const exitKey = options.exitKey ?? 'Escape';
  const logger = options.logger ?? noopLogger;

  let configured = false;
  let surfaceLost = false;
  let exitReason: ExitReason | null = null;

  const requestExit = (reason: ExitReason, control: LoopControl): void => {
    if (exitReason !== null) return;
    exitReason = reason;
    control.exit();
  };

  const handleRenderResult = (result: RenderResult, control: LoopControl): void => {
    if (result.ok) {
      surfaceLost = false;
      return;
    }

    switch (result.error) {
      case 'lost':
        if (!surfaceLost) {
          surfaceLost = true;
          logger.error('Surface lost, reconfiguring');
        }
        target.resize(target.size);
        return;
      case 'outdated':
        // Reconfigure at the last valid size; this frame is dropped.
        target.resize(target.size);
        return;
      case 'out-of-memory':
        logger.error('Out of memory');
        requestExit('out-of-memory', control);
        return;
      case 'timeout':
        logger.warn('Surface timeout');
        return;
      default:
        assertNever(result.error);
    }
  };

  const redraw = (control: LoopControl): void => {
    window.requestRedraw();

    // Never render into a surface that has not seen a real size yet.
    if (!configured) return;

    target.update();
    handleRenderResult(target.render(), control);
  };

  const handleWindowEvent = (event: WindowEvent, control: LoopControl): void => {
    switch (event.type) {
      case 'resized':
        configured = true;
        target.resize(event.size);
        return;
      case 'redraw-requested':
        redraw(control);
        return;
      case 'close-requested':
        requestExit('close-requested', control);
        return;
      case 'keyboard-input': {
        const { modifiers } = event;
        const unmodified = !modifiers.shift && !modifiers.ctrl && !modifiers.alt && !modifiers.meta;
        if (event.state === 'pressed' && event.key === exitKey && unmodified) {
          requestExit('exit-key', control);
        }
        return;
      }
      default:
        return;
    }
  };

  const handleEvent: FrameLoop['handleEvent'] = (event, control) => {
    if (exitReason !== null) return;

    if (event.type === 'resumed') {
      logger.debug('Resumed');
      return;
    }

    if (event.windowId !== window.id) return;
    if (target.input(event)) return;

    handleWindowEvent(event, control);
  };

  return {
    get phase() {
      return configured ? 'ready' : 'uninitialized';
    },
    get configured() {
      return configured;
    },
    get exitReason() {
      return exitReason;
    },
    handleEvent,
  };
}
