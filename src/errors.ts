export class RayTracerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// the output sink rejected a write; the render stops, whatever was flushed stays
export class OutputWriteError extends RayTracerError {
  constructor(cause: unknown) {
    super(`Failed to write to PPM output: ${describe(cause)}`, { cause });
  }
}

// an encoded channel left [0, 255]: the encoding math is broken, not the input
export class ColorRangeError extends RayTracerError {
  constructor(public readonly channels: [number, number, number]) {
    super(`Color value out of range: ${channels.join(' ')}`);
  }
}

export class ConfigError extends RayTracerError {}

export class MeshLoadError extends RayTracerError {}

export class SceneSealedError extends RayTracerError {
  constructor() {
    super('Meshes must be added before the first render');
  }
}

export class RenderWorkerError extends RayTracerError {
  constructor(
    public readonly workerIndex: number,
    cause: unknown
  ) {
    super(`Render worker ${workerIndex} failed: ${describe(cause)}`, { cause });
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
