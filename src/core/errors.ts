export type GraphicsInitStage = 'instance' | 'surface' | 'adapter' | 'device';

/**
 * Unrecoverable failure while bringing up the graphics context. There is no retry and no
 * software fallback: callers are expected to abort.
 */
export class GraphicsInitError extends Error {
  readonly stage: GraphicsInitStage;

  constructor(stage: GraphicsInitStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GraphicsInitError';
    this.stage = stage;
  }
}

/**
 * The surface reported out-of-memory while acquiring a frame. Rendering cannot continue.
 */
export class SurfaceOutOfMemoryError extends Error {
  constructor() {
    super('Out of memory while acquiring the next surface texture.');
    this.name = 'SurfaceOutOfMemoryError';
  }
}
