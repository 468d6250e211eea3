/**
 * Surface negotiation - adapter, device and surface configuration bring-up.
 *
 * Every failure on this path is a startup error: nothing is retried and no software
 * adapter is substituted.
 */

import type { GraphicsContextState } from './GraphicsContext';
import { GraphicsInitError } from './errors';
import type {
  GraphicsInstance,
  PhysicalSize,
  PresentationSurface,
  SurfaceCapabilities,
  SurfaceConfiguration,
  WindowHandle,
} from './types';
import { DEFAULT_MAX_FRAME_LATENCY } from '../config/resolveOptions';
import { noopLogger, type Logger } from '../utils/logger';

/**
 * `GPUTextureUsage.RENDER_ATTACHMENT`. The global only exists where WebGPU does.
 */
export const RENDER_ATTACHMENT_USAGE = 0x10;

export interface InitializeOptions {
  readonly powerPreference?: GPUPowerPreference;
  readonly maxFrameLatency?: number;
  readonly logger?: Logger;
}

/**
 * Gamma-corrected formats are the `-srgb` variants.
 */
export function isSrgbFormat(format: GPUTextureFormat): boolean {
  return format.endsWith('-srgb');
}

/**
 * Picks the first sRGB format in reported order, else the first reported format.
 *
 * @throws {GraphicsInitError} If the list is empty
 */
export function selectSurfaceFormat(formats: readonly GPUTextureFormat[]): GPUTextureFormat {
  const srgb = formats.find(isSrgbFormat);
  if (srgb !== undefined) return srgb;

  if (formats.length === 0) {
    throw new GraphicsInitError('surface', 'Surface reports no supported texture formats.');
  }
  return formats[0];
}

/**
 * Builds the initial configuration from the platform's first choices.
 * A zero dimension is raised to 1 so the surface is never configured with an empty target.
 */
export function createSurfaceConfiguration(
  capabilities: SurfaceCapabilities,
  size: PhysicalSize,
  maxFrameLatency: number = DEFAULT_MAX_FRAME_LATENCY
): SurfaceConfiguration {
  const presentMode = capabilities.presentModes[0];
  const alphaMode = capabilities.alphaModes[0];
  if (presentMode === undefined || alphaMode === undefined) {
    throw new GraphicsInitError('surface', 'Surface reports no present modes or alpha modes.');
  }

  return {
    usage: RENDER_ATTACHMENT_USAGE,
    format: selectSurfaceFormat(capabilities.formats),
    width: Math.max(1, size.width),
    height: Math.max(1, size.height),
    presentMode,
    alphaMode,
    desiredMaximumFrameLatency: maxFrameLatency,
    viewFormats: [],
  };
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Negotiates an adapter, a device and a surface configuration for `window`.
 *
 * @param window - Borrowed window; it must outlive the returned context
 * @param instance - Platform GPU entry point
 * @returns A freshly owned, configured context state
 * @throws {GraphicsInitError} On any surface, adapter or device failure
 */
export async function initializeGraphicsContext<W extends WindowHandle>(
  window: W,
  instance: GraphicsInstance<W>,
  options: InitializeOptions = {}
): Promise<GraphicsContextState> {
  const logger = options.logger ?? noopLogger;
  const size = window.innerSize();

  let surface: PresentationSurface;
  try {
    surface = instance.createSurface(window);
  } catch (error) {
    throw new GraphicsInitError('surface', `Could not create surface: ${describeError(error)}`, {
      cause: error,
    });
  }

  let adapter: GPUAdapter | null;
  try {
    adapter = await instance.gpu.requestAdapter({
      powerPreference: options.powerPreference,
      // Hardware only: never ask for the software adapter.
      forceFallbackAdapter: false,
    });
  } catch (error) {
    throw new GraphicsInitError('adapter', `Could not request adapter: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (!adapter) {
    throw new GraphicsInitError(
      'adapter',
      'Could not request adapter. No compatible hardware adapter was found for this surface.'
    );
  }

  let device: GPUDevice;
  try {
    device = await adapter.requestDevice({ label: 'Graphics Device' });
  } catch (error) {
    throw new GraphicsInitError('device', `Could not request device: ${describeError(error)}`, {
      cause: error,
    });
  }

  device.addEventListener('uncapturederror', (event: GPUUncapturedErrorEvent) => {
    logger.error('WebGPU uncaptured error:', event.error);
  });

  void device.lost.then((info) => {
    if (info.reason === 'destroyed') {
      logger.warn('WebGPU device destroyed');
    } else {
      logger.error(`WebGPU device lost: ${info.message}`);
    }
  });

  try {
    const capabilities = surface.getCapabilities(adapter);
    const config = createSurfaceConfiguration(capabilities, size, options.maxFrameLatency);
    surface.configure(device, config);

    logger.debug(
      `Configured surface: ${config.format} ${config.width}x${config.height} ` +
        `(${config.presentMode}, ${config.alphaMode})`
    );

    return {
      adapter,
      device,
      queue: device.queue,
      surface,
      config,
      size: { width: config.width, height: config.height },
      initialized: true,
    };
  } catch (error) {
    // The device was created but cannot present; release it before surfacing the failure.
    device.destroy();
    if (error instanceof GraphicsInitError) {
      throw error;
    }
    throw new GraphicsInitError('surface', `Could not configure surface: ${describeError(error)}`, {
      cause: error,
    });
  }
}
