import type { CanvasWindow } from './createCanvasPlatform';
import { createCanvasSurface } from './createCanvasSurface';
import { GraphicsInitError } from '../../core/errors';
import type { GraphicsInstance } from '../../core/types';

/**
 * The browser's GPU entry point. Surfaces are WebGPU canvas contexts.
 *
 * @param gpu - Defaults to `navigator.gpu`
 * @throws {GraphicsInitError} If WebGPU is not available
 */
export function createBrowserInstance(gpu?: GPU): GraphicsInstance<CanvasWindow> {
  const resolvedGpu = gpu ?? (typeof navigator === 'undefined' ? undefined : navigator.gpu);

  if (!resolvedGpu) {
    throw new GraphicsInitError(
      'instance',
      'WebGPU is not available in this browser. ' +
        'Please use a browser that supports WebGPU (Chrome 113+, Edge 113+, or Safari 18+).'
    );
  }

  return {
    gpu: resolvedGpu,
    createSurface: (window) => {
      const canvasContext = window.canvas.getContext('webgpu');
      if (!canvasContext) {
        throw new Error('Failed to get WebGPU context from canvas.');
      }
      return createCanvasSurface(resolvedGpu, canvasContext, window.canvas);
    },
  };
}
