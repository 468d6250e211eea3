/**
 * GraphicsContext - owns the device, queue and surface for one window
 *
 * Exposes resize and render over a negotiated surface configuration.
 * Like the rest of the core, this module offers a functional API over readonly state and a
 * class wrapper that the frame loop drives.
 */

import { initializeGraphicsContext, type InitializeOptions } from './surfaceNegotiator';
import type {
  GraphicsInstance,
  LoopEvent,
  PhysicalSize,
  PresentationSurface,
  RenderResult,
  SurfaceConfiguration,
  WindowHandle,
} from './types';
import { noopLogger, type Logger } from '../utils/logger';

/**
 * Color the render pass clears to every frame.
 */
export const CLEAR_COLOR: Readonly<GPUColorDict> = { r: 0.1, g: 0.2, b: 0.3, a: 1.0 };

/**
 * Represents the state of a graphics context.
 * All properties are readonly; operations return a new state object.
 *
 * When initialized, `config.width/height` always equal `size` and are both positive.
 */
export interface GraphicsContextState {
  readonly adapter: GPUAdapter | null;
  readonly device: GPUDevice | null;
  readonly queue: GPUQueue | null;
  readonly surface: PresentationSurface | null;
  readonly config: SurfaceConfiguration | null;
  readonly size: PhysicalSize;
  readonly initialized: boolean;
}

interface ReadyContext {
  readonly device: GPUDevice;
  readonly queue: GPUQueue;
  readonly surface: PresentationSurface;
  readonly config: SurfaceConfiguration;
}

function requireInitialized(state: GraphicsContextState, operation: string): ReadyContext {
  const { device, queue, surface, config } = state;
  if (!state.initialized || !device || !queue || !surface || !config) {
    throw new Error(
      `GraphicsContext is not initialized. Call initializeGraphicsContext() before ${operation}().`
    );
  }
  return { device, queue, surface, config };
}

/**
 * Applies a new physical size to the surface.
 *
 * A size with a zero dimension (e.g. a minimized window) is ignored and the previous
 * configuration stays active. Reconfigures even when the size is unchanged, which is how a
 * lost or outdated surface is recovered.
 *
 * @returns The new state, or `state` itself when the size was ignored
 * @throws {Error} If the context is not initialized
 */
export function resizeGraphicsContext(
  state: GraphicsContextState,
  size: PhysicalSize
): GraphicsContextState {
  const ready = requireInitialized(state, 'resize');

  if (size.width <= 0 || size.height <= 0) {
    return state;
  }

  const config: SurfaceConfiguration = {
    ...ready.config,
    width: size.width,
    height: size.height,
  };
  ready.surface.configure(ready.device, config);

  return {
    ...state,
    config,
    size: { width: size.width, height: size.height },
  };
}

/**
 * Records and presents one frame: a single render pass that clears to {@link CLEAR_COLOR}.
 *
 * Acquiring the surface texture is the only step that can fail; its failure is returned, not
 * thrown, and nothing is submitted or presented for that frame.
 *
 * @throws {Error} If the context is not initialized
 */
export function renderGraphicsContext(state: GraphicsContextState): RenderResult {
  const { device, queue, surface, config } = requireInitialized(state, 'render');

  const frame = surface.getCurrentTexture();
  if (frame.status !== 'success') {
    return { ok: false, error: frame.status };
  }

  const view = frame.texture.createView({ format: config.format });

  const encoder = device.createCommandEncoder({ label: 'Render Encoder' });

  const renderPass = encoder.beginRenderPass({
    label: 'Render Pass',
    colorAttachments: [
      {
        view,
        clearValue: CLEAR_COLOR,
        loadOp: 'clear',
        storeOp: 'store',
      },
    ],
  });
  renderPass.end();

  queue.submit([encoder.finish()]);
  surface.present(frame.texture);

  return { ok: true };
}

/**
 * Tears the context down: the surface is unconfigured before the device is destroyed.
 * Safe to call more than once.
 *
 * @returns A new uninitialized state keeping the last known size
 */
export function destroyGraphicsContext(
  state: GraphicsContextState,
  logger: Logger = noopLogger
): GraphicsContextState {
  if (state.surface) {
    try {
      state.surface.unconfigure();
    } catch (error) {
      logger.warn('Error unconfiguring surface:', error);
    }
  }

  if (state.device) {
    try {
      state.device.destroy();
    } catch (error) {
      logger.warn('Error destroying GPU device:', error);
    }
  }

  return {
    adapter: null,
    device: null,
    queue: null,
    surface: null,
    config: null,
    size: state.size,
    initialized: false,
  };
}

export type GraphicsContextOptions = InitializeOptions;

/**
 * GraphicsContext class wrapper over the functional API.
 *
 * This is the object the frame loop drives: `input`, `update`, `resize` and `render`.
 */
export class GraphicsContext {
  private _state: GraphicsContextState;
  private readonly _logger: Logger;

  /**
   * Wraps an already initialized state. Prefer {@link GraphicsContext.create}.
   */
  constructor(state: GraphicsContextState, logger: Logger = noopLogger) {
    this._state = state;
    this._logger = logger;
  }

  /**
   * Negotiates a surface for `window` and returns a ready context.
   *
   * @throws {GraphicsInitError} If any step of initialization fails
   */
  static async create<W extends WindowHandle>(
    window: W,
    instance: GraphicsInstance<W>,
    options: GraphicsContextOptions = {}
  ): Promise<GraphicsContext> {
    const state = await initializeGraphicsContext(window, instance, options);
    return new GraphicsContext(state, options.logger);
  }

  get state(): GraphicsContextState {
    return this._state;
  }

  get device(): GPUDevice | null {
    return this._state.device;
  }

  get queue(): GPUQueue | null {
    return this._state.queue;
  }

  /**
   * Current surface configuration, or null once destroyed.
   */
  get config(): SurfaceConfiguration | null {
    return this._state.config;
  }

  /**
   * Last size applied to the surface.
   */
  get size(): PhysicalSize {
    return this._state.size;
  }

  get initialized(): boolean {
    return this._state.initialized;
  }

  /**
   * Offers an event to the context before the frame loop handles it.
   *
   * @returns Whether the event was consumed. Nothing is consumed yet.
   */
  input(_event: LoopEvent): boolean {
    return false;
  }

  /**
   * Per-frame state update, run before {@link render}. Nothing to update yet.
   */
  update(): void {}

  resize(size: PhysicalSize): void {
    const next = resizeGraphicsContext(this._state, size);
    if (next !== this._state) {
      this._logger.debug(`Resized surface to ${size.width}x${size.height}`);
    }
    this._state = next;
  }

  render(): RenderResult {
    return renderGraphicsContext(this._state);
  }

  destroy(): void {
    this._state = destroyGraphicsContext(this._state, this._logger);
  }
}
