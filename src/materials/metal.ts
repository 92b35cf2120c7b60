import type { SurfaceHit } from '../geometry/intersection';
import { Ray } from '../geometry/ray';
import { randomUnitVector, reflect } from '../geometry/vec3';
import type { Rng } from '../utils/random';
import type { MetalMaterial, Scattered } from './materials';

export function scatterMetal(
  material: MetalMaterial,
  ray: Ray,
  hit: SurfaceHit,
  rng: Rng
): Scattered | null {
  let normal = hit.triangle.shadingNormal(hit.uvs);
  let direction = reflect(ray.direction, normal);

  if (material.fuzz > 0) {
    direction.addScaledVector(randomUnitVector(rng), material.fuzz);
  }

  // reflections that end up below the surface are absorbed
  if (direction.dot(normal) <= 0) return null;

  return {
    attenuation: material.albedo.clone(),
    scattered: new Ray(hit.at.clone(), direction)
  };
}
