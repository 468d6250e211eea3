import { GraphicsInitError, isLogLevel, runOnCanvas, type LogLevel } from '../../src/index';

/**
 * Hello World example - clear the canvas every frame until Escape is pressed
 *
 * Append `?log=debug` to the URL to see resize and lifecycle messages.
 */

function logLevelFromQuery(): LogLevel {
  const requested = new URLSearchParams(window.location.search).get('log');
  return isLogLevel(requested) ? requested : 'info';
}

async function main(): Promise<void> {
  const canvas = document.getElementById('canvas');
  if (!(canvas instanceof HTMLCanvasElement)) {
    throw new Error('Canvas element not found');
  }

  try {
    const reason = await runOnCanvas(canvas, { logLevel: logLevelFromQuery() });
    console.info(`Frame loop stopped: ${reason}`);
  } catch (error) {
    console.error('Failed to run WebGPU frame loop:', error);
    if (error instanceof GraphicsInitError) {
      alert(`WebGPU Error (${error.stage}): ${error.message}`);
    } else if (error instanceof Error) {
      alert(`WebGPU Error: ${error.message}`);
    }
  }
}

const start = (): void => {
  main().catch((error: unknown) => {
    console.error(error);
  });
};

// Start the application when DOM is ready
if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', start);
} else {
  start();
}
