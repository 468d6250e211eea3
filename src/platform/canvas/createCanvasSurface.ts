/**
 * Canvas surface - a `GPUCanvasContext` behind the presentation surface interface.
 */

import type {
  PresentationSurface,
  SurfaceCapabilities,
  SurfaceConfiguration,
  SurfaceTextureResult,
} from '../../core/types';

/**
 * Formats a canvas context accepts as its storage format.
 */
export const CANVAS_FORMATS: readonly GPUTextureFormat[] = ['bgra8unorm', 'rgba8unorm', 'rgba16float'];

/**
 * sRGB views a canvas texture can be created with, keyed by storage format.
 * A canvas cannot store sRGB directly; it stores the linear format and lists the sRGB
 * variant in `viewFormats`.
 */
const SRGB_VIEW_FORMATS: ReadonlyMap<GPUTextureFormat, GPUTextureFormat> = new Map<
  GPUTextureFormat,
  GPUTextureFormat
>([
  ['bgra8unorm', 'bgra8unorm-srgb'],
  ['rgba8unorm', 'rgba8unorm-srgb'],
]);

/**
 * Maps a configured format to the format the canvas stores, e.g. `bgra8unorm-srgb` → `bgra8unorm`.
 */
export function canvasStorageFormat(format: GPUTextureFormat): GPUTextureFormat {
  for (const [storage, view] of SRGB_VIEW_FORMATS) {
    if (view === format) return storage;
  }
  return format;
}

interface ConfiguredSize {
  readonly width: number;
  readonly height: number;
}

/**
 * Presentation surface over a WebGPU canvas context.
 *
 * - Capabilities list the preferred canvas format first, then the other canvas formats, then
 *   their sRGB view variants.
 * - Configuring sets the canvas drawing buffer to the configured size.
 * - Acquisition reports `outdated` while unconfigured or after the drawing buffer was resized
 *   behind the surface's back, and `lost` once the configured device is lost.
 * - Reconfiguring with the lost device keeps reporting `lost`; only a new device clears it.
 */
export function createCanvasSurface(
  gpu: GPU,
  canvasContext: GPUCanvasContext,
  canvas: HTMLCanvasElement
): PresentationSurface {
  let configured: ConfiguredSize | null = null;
  let trackedDevice: GPUDevice | null = null;
  let deviceLost = false;

  const trackDevice = (device: GPUDevice): void => {
    if (trackedDevice === device) return;
    trackedDevice = device;
    deviceLost = false;

    void device.lost.then(() => {
      if (trackedDevice === device) deviceLost = true;
    });
  };

  const getCapabilities = (): SurfaceCapabilities => {
    const preferred = gpu.getPreferredCanvasFormat();
    const storageFormats = [preferred, ...CANVAS_FORMATS.filter((format) => format !== preferred)];

    const srgbFormats: GPUTextureFormat[] = [];
    for (const format of storageFormats) {
      const view = SRGB_VIEW_FORMATS.get(format);
      if (view !== undefined) srgbFormats.push(view);
    }

    return {
      formats: [...storageFormats, ...srgbFormats],
      // The browser compositor always presents in FIFO order.
      presentModes: ['fifo'],
      alphaModes: ['opaque', 'premultiplied'],
    };
  };

  const configure = (device: GPUDevice, config: SurfaceConfiguration): void => {
    const format = canvasStorageFormat(config.format);
    const viewFormats = [...config.viewFormats];
    if (format !== config.format && !viewFormats.includes(config.format)) {
      viewFormats.push(config.format);
    }

    canvas.width = config.width;
    canvas.height = config.height;

    canvasContext.configure({
      device,
      format,
      usage: config.usage,
      alphaMode: config.alphaMode,
      viewFormats,
    });

    trackDevice(device);
    configured = { width: config.width, height: config.height };
  };

  const getCurrentTexture = (): SurfaceTextureResult => {
    if (deviceLost) return { status: 'lost' };
    if (!configured) return { status: 'outdated' };
    if (canvas.width !== configured.width || canvas.height !== configured.height) {
      return { status: 'outdated' };
    }

    try {
      return { status: 'success', texture: canvasContext.getCurrentTexture() };
    } catch (error) {
      // Thrown when the context lost its configuration.
      if (error instanceof DOMException && error.name === 'InvalidStateError') {
        return { status: 'outdated' };
      }
      throw error;
    }
  };

  const present = (): void => {
    // The browser presents the current texture once the task yields.
  };

  const unconfigure = (): void => {
    canvasContext.unconfigure();
    configured = null;
    trackedDevice = null;
  };

  return { getCapabilities, configure, getCurrentTexture, present, unconfigure };
}
