import type { SurfaceHit } from '../geometry/intersection';
import { Ray } from '../geometry/ray';
import { nearZero, randomUnitVector } from '../geometry/vec3';
import type { Rng } from '../utils/random';
import type { DiffuseMaterial, Scattered } from './materials';

export function scatterDiffuse(material: DiffuseMaterial, hit: SurfaceHit, rng: Rng): Scattered {
  let normal = hit.triangle.shadingNormal(hit.uvs);
  let direction = normal.clone().add(randomUnitVector(rng));

  // the random vector cancelled the normal out
  if (nearZero(direction)) {
    direction = normal.clone();
  }

  return {
    attenuation: material.albedo.clone(),
    scattered: new Ray(hit.at.clone(), direction)
  };
}
