import { describe, it, expect, vi } from 'vitest';
import { runApp } from '../runApp';
import { SurfaceOutOfMemoryError } from '../errors';
import { noopLogger } from '../../utils/logger';
import {
  FakeSurface,
  createFakeGpu,
  createFakeInstance,
  createFakeWindow,
  createScriptedEventLoop,
} from './fakes';
import type { LoopEvent } from '../types';

function createEnvironment(events: LoopEvent[]) {
  const log: string[] = [];
  const surface = new FakeSurface(log);
  const fake = createFakeGpu(log);
  const { window } = createFakeWindow({ width: 800, height: 600 });
  const { eventLoop, delivered } = createScriptedEventLoop(events);
  const dispose = vi.fn(() => {
    log.push('window.dispose');
  });

  return {
    log,
    surface,
    fake,
    delivered,
    environment: { instance: createFakeInstance(fake.gpu, surface), window, eventLoop, dispose },
  };
}

describe('runApp', () => {
  it('renders until close and tears down the surface before the window', async () => {
    const { environment, log, surface } = createEnvironment([
      { type: 'resumed' },
      { type: 'resized', windowId: 'main', size: { width: 800, height: 600 } },
      { type: 'redraw-requested', windowId: 'main' },
      { type: 'close-requested', windowId: 'main' },
    ]);

    const reason = await runApp(environment, { reportAdapters: false, logger: noopLogger });

    expect(reason).toBe('close-requested');
    expect(surface.presented).toHaveLength(1);
    expect(log.slice(-3)).toEqual(['surface.unconfigure', 'device.destroy', 'window.dispose']);
  });

  it('resolves with exit-key when Escape is pressed', async () => {
    const { environment } = createEnvironment([
      {
        type: 'keyboard-input',
        windowId: 'main',
        key: 'Escape',
        state: 'pressed',
        repeat: false,
        modifiers: { shift: false, ctrl: false, alt: false, meta: false },
      },
    ]);

    await expect(runApp(environment, { reportAdapters: false, logger: noopLogger })).resolves.toBe('exit-key');
  });

  it('rejects with SurfaceOutOfMemoryError after cleaning up', async () => {
    const { environment, surface, log } = createEnvironment([
      { type: 'resized', windowId: 'main', size: { width: 800, height: 600 } },
      { type: 'redraw-requested', windowId: 'main' },
      { type: 'redraw-requested', windowId: 'main' },
    ]);
    surface.pendingFailures.push('out-of-memory');

    await expect(runApp(environment, { reportAdapters: false, logger: noopLogger })).rejects.toBeInstanceOf(
      SurfaceOutOfMemoryError
    );
    expect(surface.acquisitions).toBe(1);
    expect(log.slice(-3)).toEqual(['surface.unconfigure', 'device.destroy', 'window.dispose']);
  });

  it('reports adapters before initializing when enabled', async () => {
    const { environment, fake } = createEnvironment([{ type: 'close-requested', windowId: 'main' }]);
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await runApp(environment, { logger });

    expect(logger.info).toHaveBeenCalledWith('Available adapters:');
    expect(logger.info).toHaveBeenCalledWith('Default adapter: test-vendor test-arch (Test GPU)');
    // Three probes, the default adapter, then the adapter for the surface.
    expect(fake.mocks.gpu.requestAdapter).toHaveBeenCalledTimes(5);
  });

  it('passes power preference and frame latency through to the surface', async () => {
    const { environment, surface, fake } = createEnvironment([{ type: 'close-requested', windowId: 'main' }]);

    await runApp(environment, {
      reportAdapters: false,
      logger: noopLogger,
      powerPreference: 'low-power',
      maxFrameLatency: 3,
    });

    expect(fake.mocks.gpu.requestAdapter).toHaveBeenCalledWith({
      powerPreference: 'low-power',
      forceFallbackAdapter: false,
    });
    expect(surface.configurations[0].desiredMaximumFrameLatency).toBe(3);
  });

  it('disposes the window when the options are invalid', async () => {
    const { environment, fake } = createEnvironment([{ type: 'resumed' }]);

    await expect(runApp(environment, { maxFrameLatency: 0, logger: noopLogger })).rejects.toThrow(
      'maxFrameLatency must be a positive integer, got 0.'
    );
    expect(environment.dispose).toHaveBeenCalledTimes(1);
    expect(fake.mocks.gpu.requestAdapter).not.toHaveBeenCalled();
  });

  it('still disposes the window when initialization fails', async () => {
    const { environment, fake } = createEnvironment([]);
    fake.mocks.gpu.requestAdapter.mockResolvedValue(null);

    await expect(runApp(environment, { reportAdapters: false, logger: noopLogger })).rejects.toMatchObject({
      name: 'GraphicsInitError',
      stage: 'adapter',
    });
    expect(environment.dispose).toHaveBeenCalledTimes(1);
  });

  it('rejects invalid options before touching the GPU', async () => {
    const { environment, fake } = createEnvironment([]);

    await expect(runApp(environment, { maxFrameLatency: 0 })).rejects.toThrow(
      'maxFrameLatency must be a positive integer, got 0.'
    );
    expect(fake.mocks.gpu.requestAdapter).not.toHaveBeenCalled();
  });
});
