/**
 * Core types shared by the surface negotiator, the graphics context and the frame loop.
 *
 * The window system and the GPU driver are collaborators: the core only sees the
 * interfaces below, so a platform (see `src/platform/canvas`) plugs in by implementing them.
 */

/**
 * Window size in physical (device) pixels.
 */
export interface PhysicalSize {
  readonly width: number;
  readonly height: number;
}

export type WindowId = symbol | string | number;

/**
 * A window borrowed by the core. The core never mutates it; the platform owns its lifetime.
 */
export interface WindowHandle {
  readonly id: WindowId;
  /** Current drawable size in physical pixels. */
  innerSize(): PhysicalSize;
  /** Asks the platform to deliver a `redraw-requested` event for this window. */
  requestRedraw(): void;
}

export interface Modifiers {
  readonly shift: boolean;
  readonly ctrl: boolean;
  readonly alt: boolean;
  readonly meta: boolean;
}

export type ElementState = 'pressed' | 'released';

export type WindowEvent =
  | { readonly type: 'resized'; readonly windowId: WindowId; readonly size: PhysicalSize }
  | { readonly type: 'redraw-requested'; readonly windowId: WindowId }
  | { readonly type: 'close-requested'; readonly windowId: WindowId }
  | {
      readonly type: 'keyboard-input';
      readonly windowId: WindowId;
      /** Physical key code, e.g. `Escape` or `KeyA`. */
      readonly key: string;
      readonly state: ElementState;
      readonly repeat: boolean;
      readonly modifiers: Modifiers;
    }
  | { readonly type: 'focused'; readonly windowId: WindowId; readonly focused: boolean };

/**
 * Events delivered by the event loop. `resumed` is application-level and carries no window id.
 */
export type LoopEvent = { readonly type: 'resumed' } | WindowEvent;

export interface LoopControl {
  /** Requests the loop to stop after the current event. */
  exit(): void;
}

export type EventHandler = (event: LoopEvent, control: LoopControl) => void;

export interface EventLoop {
  /**
   * Delivers events to `handler` one at a time until `control.exit()` is called.
   * Resolves once the loop has stopped and released its resources.
   */
  run(handler: EventHandler): Promise<void>;
}

export type PresentMode = 'fifo' | 'fifo-relaxed' | 'immediate' | 'mailbox';

/**
 * What the platform reports it can present for an (adapter, surface) pair.
 * Used once during initialization, never retained.
 */
export interface SurfaceCapabilities {
  readonly formats: readonly GPUTextureFormat[];
  readonly presentModes: readonly PresentMode[];
  readonly alphaModes: readonly GPUCanvasAlphaMode[];
}

export interface SurfaceConfiguration {
  readonly usage: GPUTextureUsageFlags;
  readonly format: GPUTextureFormat;
  readonly width: number;
  readonly height: number;
  readonly presentMode: PresentMode;
  readonly alphaMode: GPUCanvasAlphaMode;
  readonly desiredMaximumFrameLatency: number;
  readonly viewFormats: readonly GPUTextureFormat[];
}

/**
 * Why a frame could not be acquired. Every consumer switches over this union exhaustively,
 * so adding a kind here is a compile error until each caller handles it.
 */
export type SurfaceErrorKind = 'lost' | 'outdated' | 'out-of-memory' | 'timeout';

export type SurfaceTextureResult =
  | { readonly status: 'success'; readonly texture: GPUTexture }
  | { readonly status: SurfaceErrorKind };

/**
 * Presentation target bound to a window. The window must outlive the surface.
 */
export interface PresentationSurface {
  getCapabilities(adapter: GPUAdapter): SurfaceCapabilities;
  configure(device: GPUDevice, config: SurfaceConfiguration): void;
  /** Acquires the next presentable texture. The only fallible per-frame step. */
  getCurrentTexture(): SurfaceTextureResult;
  present(texture: GPUTexture): void;
  unconfigure(): void;
}

/**
 * The platform's GPU entry point plus its one way of creating a surface for a window.
 */
export interface GraphicsInstance<W extends WindowHandle = WindowHandle> {
  readonly gpu: GPU;
  createSurface(window: W): PresentationSurface;
}

export type RenderResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: SurfaceErrorKind };
