import { Vector2, Vector3 } from 'three';
import type { Rng } from '../utils/random';

// Vector3 doubles as point, direction and rgb color. Helpers never mutate
// their arguments: they clone first and hand back a new vector
export type Vec3 = Vector3;

const NEAR_ZERO = 1e-8;

export function vec3(x: number, y: number, z: number): Vec3 {
  return new Vector3(x, y, z);
}

export function reflect(d: Vec3, n: Vec3): Vec3 {
  return d.clone().addScaledVector(n, -2 * d.dot(n));
}

// uniform on the unit sphere: z in [-1, 1], phi in [0, 2pi)
export function randomUnitVector(rng: Rng): Vec3 {
  let z = 1 - 2 * rng();
  let phi = 2 * Math.PI * rng();
  let r = Math.sqrt(Math.max(0, 1 - z * z));

  return new Vector3(r * Math.cos(phi), r * Math.sin(phi), z);
}

export function nearZero(v: Vec3): boolean {
  return Math.abs(v.x) < NEAR_ZERO && Math.abs(v.y) < NEAR_ZERO && Math.abs(v.z) < NEAR_ZERO;
}

/**
 * Blends three vertex normals with the (u, v) weights of a Möller–Trumbore hit,
 * where u weights the second vertex and v the third.
 */
export function interpolateNormal(n0: Vec3, n1: Vec3, n2: Vec3, uv: Vector2): Vec3 {
  return n0
    .clone()
    .multiplyScalar(1 - uv.x - uv.y)
    .addScaledVector(n1, uv.x)
    .addScaledVector(n2, uv.y)
    .normalize();
}

export function lerp(a: Vec3, b: Vec3, t: number): Vec3 {
  return a.clone().multiplyScalar(1 - t).addScaledVector(b, t);
}
