import { describe, expect, it } from 'vitest';
import { DrawingMode, createConfig } from './config';
import { ConfigError, RenderWorkerError } from './errors';
import { serializeScene } from './scene';
import { TileManager } from './tile';
import { renderTiles } from './workers';
import { World } from './world';

describe('renderTiles', () => {
  it('returns every tile filled in', async () => {
    let scene = serializeScene(createConfig({ mode: DrawingMode.Colors, width: 3, height: 4 }), new World());
    let tiles = TileManager.createTiles(3, 4, 1);

    let finished = await renderTiles(scene, tiles, { workers: 2 });

    expect(finished.map((tile) => tile.y).sort()).toEqual([0, 1, 2, 3]);
    for (let tile of finished) {
      expect(tile.data).toHaveLength(3 * 3);
    }
  });

  it('resolves right away without tiles', async () => {
    await expect(renderTiles('{}', [])).resolves.toEqual([]);
  });

  it.each([Number('abc'), 0, 1.5])('rejects a worker count of %s before starting', async (workers) => {
    let tiles = TileManager.createTiles(2, 2, 1);

    await expect(renderTiles('{}', tiles, { workers })).rejects.toThrow(ConfigError);
  });

  it('rejects when a worker fails', async () => {
    let tiles = TileManager.createTiles(2, 2, 1);

    await expect(renderTiles('not json', tiles, { workers: 1 })).rejects.toThrow(RenderWorkerError);
  });
});
