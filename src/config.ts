import { ConfigError } from './errors';

export enum DrawingModes {
  Colors = 'colors',
  Normals = 'normals',
  Samples = 'samples'
}

export type DrawingMode =
  | { type: DrawingModes.Colors }
  | { type: DrawingModes.Normals }
  | { type: DrawingModes.Samples; samples: number };

export const DrawingMode = {
  // flat material colors, no bounces
  Colors: { type: DrawingModes.Colors } satisfies DrawingMode,
  // surface normals remapped to [0, 1]
  Normals: { type: DrawingModes.Normals } satisfies DrawingMode,
  // path traced, `samples` jittered rays per pixel
  Samples: (samples: number): DrawingMode => ({ type: DrawingModes.Samples, samples })
};

// serializable, it is handed to every render worker
export type RayTracerConfig = {
  mode: DrawingMode;
  width: number;
  height: number;
  maxDepth: number;
};

export const defaultConfig: RayTracerConfig = {
  mode: DrawingMode.Samples(3),
  width: 480,
  height: 270,
  maxDepth: 5
};

export function createConfig(options: Partial<RayTracerConfig> = {}): RayTracerConfig {
  let config = { ...defaultConfig, ...options };

  checkInteger('width', config.width, 1);
  checkInteger('height', config.height, 1);
  checkInteger('maxDepth', config.maxDepth, 0);
  if (config.mode.type === DrawingModes.Samples) {
    checkInteger('samples', config.mode.samples, 1);
  }

  return config;
}

export function aspectRatio(config: RayTracerConfig): number {
  return config.width / config.height;
}

export function parseDrawingMode(name: string, samples: number): DrawingMode {
  switch (name) {
    case DrawingModes.Colors:
      return DrawingMode.Colors;
    case DrawingModes.Normals:
      return DrawingMode.Normals;
    case DrawingModes.Samples:
      return DrawingMode.Samples(samples);
    default:
      throw new ConfigError(`Unknown drawing mode '${name}', expected colors, normals or samples`);
  }
}

export function checkInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}
