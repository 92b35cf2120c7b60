import { Vector2, Vector3 } from 'three';
import type { Material } from '../materials/materials';
import type { Triangle } from '../primitives/triangle';

export class Hit {
  constructor(
    // t <= 0 means nothing was hit
    public t: number = 0,
    // the no-hit sentinel sits infinitely far down -z so any real hit beats it
    public at: Vector3 = new Vector3(0, 0, -Infinity),
    public triangle: Triangle | null = null,
    public material: Material | null = null,
    // barycentric weights of the second and third vertex
    public uvs: Vector2 = new Vector2(0, 0)
  ) {}

  static none(): Hit {
    return new Hit();
  }
}

export type SurfaceHit = Hit & { triangle: Triangle; material: Material };

export function isSurfaceHit(hit: Hit): hit is SurfaceHit {
  return hit.t > 0 && hit.triangle !== null && hit.material !== null;
}
