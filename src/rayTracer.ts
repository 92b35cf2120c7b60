import type { Vector3 } from 'three';
import { Camera } from './camera';
import { aspectRatio, DrawingModes, type RayTracerConfig } from './config';
import { isSurfaceHit } from './geometry/intersection';
import type { Ray } from './geometry/ray';
import { lerp, vec3 } from './geometry/vec3';
import { albedo, scatter } from './materials/materials';
import { writeTo, type OutputSink } from './output';
import { clamp, ppmHeader, ppmPixel } from './ppm';
import type { Mesh } from './primitives/mesh';
import { serializeScene } from './scene';
import { Tile, TileManager } from './tile';
import { createRng, type Rng } from './utils/random';
import { renderTiles, type WorkerPoolOptions } from './workers';
import { World } from './world';

const SKY_WHITE = vec3(1, 1, 1);
const SKY_BLUE = vec3(0.5, 0.7, 1.0);

export type ParallelRenderOptions = WorkerPoolOptions & {
  rowsPerTile?: number;
};

export class RayTracer {
  readonly camera: Camera;

  constructor(
    readonly config: RayTracerConfig,
    readonly world: World = new World()
  ) {
    this.camera = Camera.fromAspectRatio(aspectRatio(config));
  }

  addMesh(mesh: Mesh): void {
    this.world.add(mesh);
  }

  /**
   * Writes the whole image pixel by pixel: the top scanline (y = height - 1)
   * first, left to right within a row.
   */
  runSequential(sink: OutputSink, rng: Rng = createRng()): void {
    this.world.seal();
    writeTo(sink, ppmHeader(this.config.width, this.config.height));

    for (let y = this.config.height - 1; y >= 0; y--) {
      for (let x = 0; x < this.config.width; x++) {
        let pixel = this.generatePixel(x, y, rng);
        writeTo(sink, ppmPixel(pixel, this.config));
      }
    }
  }

  /**
   * Same output as runSequential, but the pixels are computed by a pool of
   * worker threads, one band of rows at a time. Results are gathered back in
   * scanline order before anything is written.
   */
  async runParallel(sink: OutputSink, options: ParallelRenderOptions = {}): Promise<void> {
    let { width, height } = this.config;

    this.world.seal();
    let tiles = TileManager.createTiles(width, height, options.rowsPerTile ?? 8);
    let finished = await renderTiles(serializeScene(this.config, this.world), tiles, options);

    let image = new Float64Array(width * height * 3);
    for (let tile of finished) {
      TileManager.addTile(image, width, tile);
    }

    writeTo(sink, ppmHeader(width, height));
    for (let i = 0; i < width * height; i++) {
      let pixel = vec3(image[i * 3 + 0], image[i * 3 + 1], image[i * 3 + 2]);
      writeTo(sink, ppmPixel(pixel, this.config));
    }
  }

  // fills tile.data with raw pixel colors; tile rows count from the top of the image
  renderTile(tile: Tile, rng: Rng): Tile {
    let data = TileManager.resetTileData(tile);

    for (let j = 0; j < tile.height; j++) {
      let y = TileManager.scanline(tile.y + j, this.config.height);

      for (let i = 0; i < tile.width; i++) {
        let color = this.generatePixel(tile.x + i, y, rng);
        let index = (tile.width * j + i) * 3;

        data[index + 0] = color.x;
        data[index + 1] = color.y;
        data[index + 2] = color.z;
      }
    }

    return tile;
  }

  /**
   * Flat modes shoot one ray through the pixel's centre; Samples mode adds
   * uniform [0, 1) offsets to the pixel's integer coordinates instead, so a
   * generator that always returns 0 lands on the pixel's lower left corner.
   * Both divide by the image size, not size - 1: u and v stay below 1 and a
   * single pixel wide image still works.
   */
  primaryRay(x: number, y: number, rng: Rng): Ray {
    let jitter = this.config.mode.type === DrawingModes.Samples;
    let u = (x + (jitter ? rng() : 0.5)) / this.config.width;
    let v = (y + (jitter ? rng() : 0.5)) / this.config.height;

    return this.camera.getRay(u, v);
  }

  // raw color of a pixel; Samples mode returns the sum over all its samples
  generatePixel(x: number, y: number, rng: Rng): Vector3 {
    let mode = this.config.mode;

    if (mode.type !== DrawingModes.Samples) {
      return this.rayColor(this.primaryRay(x, y, rng), this.config.maxDepth, rng);
    }

    let color = vec3(0, 0, 0);
    for (let s = 0; s < mode.samples; s++) {
      color.add(this.rayColor(this.primaryRay(x, y, rng), this.config.maxDepth, rng));
    }

    return color;
  }

  rayColor(ray: Ray, depth: number, rng: Rng): Vector3 {
    let mode = this.config.mode.type;

    // out of bounces, the path carries no light
    if (mode === DrawingModes.Samples && depth <= 0) {
      return vec3(0, 0, 0);
    }

    let hit = this.world.hit(ray);
    if (!isSurfaceHit(hit)) {
      return background(ray);
    }

    switch (mode) {
      case DrawingModes.Colors:
        return albedo(hit.material).clone();
      case DrawingModes.Normals: {
        let n = hit.triangle.shadingNormal(hit.uvs);
        return vec3(n.x + 1, n.y + 1, n.z + 1).multiplyScalar(0.5);
      }
      case DrawingModes.Samples: {
        let result = scatter(hit.material, ray, hit, rng);
        if (!result) return vec3(0, 0, 0);

        return this.rayColor(result.scattered, depth - 1, rng).multiply(result.attenuation);
      }
    }
  }
}

// vertical white to light blue gradient keyed on the raw direction's y;
// primary rays span y in [-1, 1], steeper bounced rays saturate
export function background(ray: Ray): Vector3 {
  let t = clamp(0.5 * (ray.direction.y + 1), 0, 1);

  return lerp(SKY_WHITE, SKY_BLUE, t);
}
