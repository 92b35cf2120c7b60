import type { Tile } from './tile';

export interface IWorkerMessage {
  type: string;
}

export interface IStartMessage extends IWorkerMessage {
  type: 'scene-setup';
  tile: Tile;
  scene: string;
  workerIndex: number;
  seed: string;
}

export class ComputationRequest implements IWorkerMessage {
  readonly type = 'computation-request';
  readonly tile: Tile;

  constructor(tile: Tile) {
    this.tile = tile;
  }
}

export class ComputationResult implements IWorkerMessage {
  readonly type = 'computation-result';
  readonly tile: Tile;
  readonly workerIndex: number;

  constructor(workerIndex: number, tile: Tile) {
    this.workerIndex = workerIndex;
    this.tile = tile;
  }
}

// what the coordinator posts to a render worker
export type TracerRequest = IStartMessage | ComputationRequest;
