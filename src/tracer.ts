import { parentPort } from 'worker_threads';
import { ComputationResult, type TracerRequest } from './commonTypes';
import { RayTracer } from './rayTracer';
import { deserializeScene } from './scene';
import type { Tile } from './tile';
import { createRng, type Rng } from './utils/random';

// worker thread entry: gets the scene once, then renders one tile per request

if (!parentPort) {
  throw new Error('tracer.ts has to be started as a worker thread');
}

const port = parentPort;

let workerIndex = 0;
let tracer: RayTracer | null = null;
let rng: Rng | null = null;

port.on('message', (data: TracerRequest) => {
  let tile: Tile;

  if (data.type === 'scene-setup') {
    let scene = deserializeScene(data.scene);

    workerIndex = data.workerIndex;
    tracer = new RayTracer(scene.config, scene.world);
    rng = createRng(data.seed);
    tile = data.tile;
  } else {
    tile = data.tile;
  }

  if (!tracer || !rng) {
    throw new Error(`worker ${workerIndex} got a tile before its scene`);
  }

  port.postMessage(new ComputationResult(workerIndex, tracer.renderTile(tile, rng)));
});
