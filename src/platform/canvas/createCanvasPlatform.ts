/**
 * Canvas platform - a canvas as the window, DOM events as the event loop.
 */

import type {
  EventLoop,
  LoopControl,
  LoopEvent,
  PhysicalSize,
  WindowHandle,
} from '../../core/types';

/**
 * A canvas acting as the window. Its drawing buffer size belongs to the surface.
 */
export interface CanvasWindow extends WindowHandle {
  readonly canvas: HTMLCanvasElement;
}

export interface CanvasPlatformOptions {
  /**
   * Fixed device pixel ratio applied to the CSS size everywhere, resize events included.
   * When omitted, resizes use the browser's device-pixel box and `window.innerSize()` reads
   * `window.devicePixelRatio` on every query.
   */
  readonly devicePixelRatio?: number;
  /** Receives keyboard, focus and `pagehide` listeners (default: `window`). */
  readonly eventTarget?: EventTarget;
}

export interface CanvasPlatform {
  readonly window: CanvasWindow;
  readonly eventLoop: EventLoop;
  /** Stops a running loop and removes every listener. */
  dispose(): void;
}

/**
 * Physical size of a resize entry: the browser's device-pixel box, or the CSS box times the
 * ratio when the ratio is fixed.
 */
const physicalSizeOf = (entry: ResizeObserverEntry, dpr: number, fixedRatio: boolean): PhysicalSize => {
  const devicePixels = fixedRatio ? undefined : entry.devicePixelContentBoxSize?.[0];
  if (devicePixels) {
    return { width: devicePixels.inlineSize, height: devicePixels.blockSize };
  }
  return {
    width: Math.round(entry.contentRect.width * dpr),
    height: Math.round(entry.contentRect.height * dpr),
  };
};

/**
 * Wraps a canvas as a window plus an event loop fed by DOM events:
 *
 * - `ResizeObserver` → `resized`
 * - animation frames requested through `window.requestRedraw()` → `redraw-requested`
 * - `keydown` / `keyup` → `keyboard-input`
 * - `focus` / `blur` → `focused`
 * - `pagehide` → `close-requested`
 */
export function createCanvasPlatform(
  canvas: HTMLCanvasElement,
  options: CanvasPlatformOptions = {}
): CanvasPlatform {
  const id = Symbol('CanvasWindow');
  const host: EventTarget = options.eventTarget ?? window;

  const fixedRatio = options.devicePixelRatio !== undefined;
  const devicePixelRatio = (): number => options.devicePixelRatio ?? (window.devicePixelRatio || 1);

  let disposed = false;
  let frameHandle: number | null = null;
  let dispatch: ((event: LoopEvent) => void) | null = null;
  let stopActiveLoop: (() => void) | null = null;

  const requestRedraw = (): void => {
    if (disposed || frameHandle !== null) return;
    frameHandle = requestAnimationFrame(() => {
      frameHandle = null;
      dispatch?.({ type: 'redraw-requested', windowId: id });
    });
  };

  const canvasWindow: CanvasWindow = {
    id,
    canvas,
    innerSize: () => {
      const dpr = devicePixelRatio();
      return {
        width: Math.round(canvas.clientWidth * dpr),
        height: Math.round(canvas.clientHeight * dpr),
      };
    },
    requestRedraw,
  };

  const onKey = (event: Event): void => {
    if (!(event instanceof KeyboardEvent)) return;
    dispatch?.({
      type: 'keyboard-input',
      windowId: id,
      key: event.code,
      state: event.type === 'keydown' ? 'pressed' : 'released',
      repeat: event.repeat,
      modifiers: {
        shift: event.shiftKey,
        ctrl: event.ctrlKey,
        alt: event.altKey,
        meta: event.metaKey,
      },
    });
  };

  const onFocus = (event: Event): void => {
    dispatch?.({ type: 'focused', windowId: id, focused: event.type === 'focus' });
  };

  const onPageHide = (): void => {
    dispatch?.({ type: 'close-requested', windowId: id });
  };

  const run: EventLoop['run'] = (handler) => {
    if (disposed) {
      return Promise.reject(new Error('Canvas platform is disposed.'));
    }
    if (dispatch) {
      return Promise.reject(new Error('Event loop is already running.'));
    }

    return new Promise<void>((resolve, reject) => {
      let exitRequested = false;
      const control: LoopControl = {
        exit: () => {
          exitRequested = true;
        },
      };

      const observer = new ResizeObserver((entries) => {
        for (const entry of entries) {
          if (entry.target !== canvas) continue;
          dispatch?.({
            type: 'resized',
            windowId: id,
            size: physicalSizeOf(entry, devicePixelRatio(), fixedRatio),
          });
        }
      });

      const detach = (): void => {
        observer.disconnect();
        host.removeEventListener('keydown', onKey);
        host.removeEventListener('keyup', onKey);
        host.removeEventListener('focus', onFocus);
        host.removeEventListener('blur', onFocus);
        host.removeEventListener('pagehide', onPageHide);
        if (frameHandle !== null) {
          cancelAnimationFrame(frameHandle);
          frameHandle = null;
        }
        dispatch = null;
        stopActiveLoop = null;
      };

      dispatch = (event) => {
        if (exitRequested) return;
        try {
          handler(event, control);
        } catch (error) {
          detach();
          reject(error);
          return;
        }
        if (exitRequested) {
          detach();
          resolve();
        }
      };

      stopActiveLoop = () => {
        exitRequested = true;
        detach();
        resolve();
      };

      if (fixedRatio) {
        observer.observe(canvas);
      } else {
        try {
          observer.observe(canvas, { box: 'device-pixel-content-box' });
        } catch {
          // Not every engine supports device-pixel-content-box.
          observer.observe(canvas);
        }
      }
      host.addEventListener('keydown', onKey);
      host.addEventListener('keyup', onKey);
      host.addEventListener('focus', onFocus);
      host.addEventListener('blur', onFocus);
      host.addEventListener('pagehide', onPageHide);

      dispatch({ type: 'resumed' });
      if (!exitRequested) requestRedraw();
    });
  };

  const dispose: CanvasPlatform['dispose'] = () => {
    if (disposed) return;
    stopActiveLoop?.();
    disposed = true;
  };

  return {
    window: canvasWindow,
    eventLoop: { run },
    dispose,
  };
}
