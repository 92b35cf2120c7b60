/**
 * A rectangle of the image, in image rows counted from the top. `data` holds
 * three numbers per pixel (raw, not yet encoded) once a worker filled it in.
 */
export class Tile {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  data: number[] | null;

  constructor(x: number, y: number, width: number, height: number, data: number[] | null = null) {
    this.x = x;
    this.y = y;
    this.width = width;
    this.height = height;
    this.data = data;
  }
}

export class TileManager {
  // bands of `rowsPerTile` full rows, top band first
  static createTiles(width: number, height: number, rowsPerTile: number): Tile[] {
    let rows = Math.max(1, Math.floor(rowsPerTile));
    let tiles: Tile[] = [];

    for (let y = 0; y < height; y += rows) {
      tiles.push(new Tile(0, y, width, Math.min(rows, height - y)));
    }

    return tiles;
  }

  static resetTileData(tile: Tile): number[] {
    if (!tile.data || tile.data.length !== tile.width * tile.height * 3) {
      tile.data = new Array(tile.width * tile.height * 3);
    }

    for (let i = 0; i < tile.data.length; i++) {
      tile.data[i] = 0;
    }

    return tile.data;
  }

  // image rows counted from the top map to scanline y = height - 1 - row
  static scanline(row: number, imageHeight: number): number {
    return imageHeight - 1 - row;
  }

  static addTile(image: Float64Array, imageWidth: number, tile: Tile): void {
    if (!tile.data) return;

    for (let j = 0; j < tile.height; j++) {
      for (let i = 0; i < tile.width; i++) {
        let src = (tile.width * j + i) * 3;
        let dst = (imageWidth * (tile.y + j) + tile.x + i) * 3;

        image[dst + 0] = tile.data[src + 0];
        image[dst + 1] = tile.data[src + 1];
        image[dst + 2] = tile.data[src + 2];
      }
    }
  }
}
