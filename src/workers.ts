import { availableParallelism } from 'os';
import { Worker } from 'worker_threads';
import { ComputationRequest, type ComputationResult, type IStartMessage } from './commonTypes';
import { checkInteger } from './config';
import { RenderWorkerError } from './errors';
import type { Tile } from './tile';
import { createSeed } from './utils/random';

// plain module that registers tsx in the thread, then imports tracer.ts
const TRACER_URL = new URL('./tracerWorker.mjs', import.meta.url);

export type WorkerPoolOptions = {
  workers?: number;
  verbose?: boolean;
};

/**
 * Hands the tiles out to a fixed pool of worker threads: every worker gets the
 * scene with its first tile, then a new tile each time it returns one. Resolves
 * with every tile filled in, in completion order.
 */
export async function renderTiles(scene: string, tiles: Tile[], options: WorkerPoolOptions = {}): Promise<Tile[]> {
  if (options.workers !== undefined) {
    checkInteger('workers', options.workers, 1);
  }
  if (tiles.length === 0) return [];

  let workersCount = Math.min(options.workers ?? availableParallelism(), tiles.length);
  let pending = [...tiles];
  let finished: Tile[] = [];
  let workers: Worker[] = [];
  let settled = false;

  return new Promise((resolve, reject) => {
    function shutdown(): Promise<number[]> {
      settled = true;
      return Promise.all(workers.map((worker) => worker.terminate()));
    }

    function fail(workerIndex: number, error: unknown) {
      if (settled) return;
      let failure = new RenderWorkerError(workerIndex, error);
      shutdown().then(
        () => reject(failure),
        () => reject(failure)
      );
    }

    function onWorkerMessage(worker: Worker, data: ComputationResult) {
      if (settled) return;
      finished.push(data.tile);

      if (options.verbose) {
        console.log(`${finished.length}/${tiles.length} tiles  from worker: ${data.workerIndex}`);
      }

      let next = pending.shift();
      if (next) {
        worker.postMessage(new ComputationRequest(next));
      } else if (finished.length === tiles.length) {
        shutdown().then(() => resolve(finished), reject);
      }
    }

    for (let i = 0; i < workersCount; i++) {
      let tile = pending.shift();
      if (!tile) break;

      let worker = new Worker(TRACER_URL);
      workers.push(worker);

      worker.on('message', (data: ComputationResult) => onWorkerMessage(worker, data));
      worker.on('error', (error) => fail(i, error));
      worker.on('exit', (code) => {
        if (code !== 0) fail(i, new Error(`exited with code ${code}`));
      });

      let startMessage: IStartMessage = {
        type: 'scene-setup',
        tile,
        scene,
        workerIndex: i,
        seed: createSeed()
      };
      worker.postMessage(startMessage);
    }
  });
}
