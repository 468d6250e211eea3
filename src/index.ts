/**
 * webgpu-bootstrap - window surface negotiation and a clear-screen frame loop on WebGPU
 */

export const version = '1.0.0';

// Core types
export type {
  PhysicalSize,
  WindowId,
  WindowHandle,
  Modifiers,
  ElementState,
  WindowEvent,
  LoopEvent,
  LoopControl,
  EventHandler,
  EventLoop,
  PresentMode,
  SurfaceCapabilities,
  SurfaceConfiguration,
  SurfaceErrorKind,
  SurfaceTextureResult,
  PresentationSurface,
  GraphicsInstance,
  RenderResult,
} from './core/types';

export { GraphicsInitError, SurfaceOutOfMemoryError } from './core/errors';
export type { GraphicsInitStage } from './core/errors';

// Surface negotiation
export type { InitializeOptions } from './core/surfaceNegotiator';
export {
  initializeGraphicsContext,
  selectSurfaceFormat,
  createSurfaceConfiguration,
  isSrgbFormat,
  RENDER_ATTACHMENT_USAGE,
} from './core/surfaceNegotiator';

// Graphics context - Functional API
export type { GraphicsContextState, GraphicsContextOptions } from './core/GraphicsContext';
export {
  CLEAR_COLOR,
  resizeGraphicsContext,
  renderGraphicsContext,
  destroyGraphicsContext,
} from './core/GraphicsContext';

// Graphics context - Class-based API
export { GraphicsContext } from './core/GraphicsContext';

// Frame loop
export type {
  FrameLoop,
  FrameLoopOptions,
  FrameLoopPhase,
  FrameLoopTarget,
  ExitReason,
} from './core/createFrameLoop';
export { createFrameLoop } from './core/createFrameLoop';

// Diagnostics
export { reportAdapters, enumerateAdapters, formatAdapterInfo } from './core/adapterReporter';

// Runner
export type { AppEnvironment, RunAppOptions } from './core/runApp';
export { runApp } from './core/runApp';

// Configuration
export type { BootstrapOptions, ResolvedBootstrapOptions } from './config/types';
export { resolveOptions, DEFAULT_OPTIONS } from './config/resolveOptions';

// Logging
export type { Logger, LogLevel, ConsoleLoggerOptions } from './utils/logger';
export { createConsoleLogger, noopLogger, isLogLevel, LOG_LEVELS } from './utils/logger';

// Canvas platform
export type {
  CanvasWindow,
  CanvasPlatform,
  CanvasPlatformOptions,
} from './platform/canvas/createCanvasPlatform';
export { createCanvasPlatform } from './platform/canvas/createCanvasPlatform';
export { createCanvasSurface, canvasStorageFormat } from './platform/canvas/createCanvasSurface';
export { createBrowserInstance } from './platform/canvas/createBrowserInstance';
export type { RunOnCanvasOptions } from './platform/canvas/runOnCanvas';
export { runOnCanvas } from './platform/canvas/runOnCanvas';
