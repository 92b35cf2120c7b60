import type { Vector3 } from 'three';
import { expect } from 'vitest';
import { vec3 } from './geometry/vec3';
import { diffuse, type Material } from './materials/materials';
import { Mesh } from './primitives/mesh';
import { Triangle } from './primitives/triangle';

export function expectVector(v: Vector3, x: number, y: number, z: number, digits: number = 9) {
  expect(v.x).toBeCloseTo(x, digits);
  expect(v.y).toBeCloseTo(y, digits);
  expect(v.z).toBeCloseTo(z, digits);
}

export const zeroRng = () => 0;

// a big triangle straight ahead of the camera at z = -10
export function centeredTriangle(normalZ: number = 1): Triangle {
  return new Triangle([vec3(-5, -5, -10), vec3(5, -5, -10), vec3(0, 5, -10)], vec3(0, 0, normalZ));
}

// unit right triangle in the plane z = `z`
export function unitTriangle(z: number, normalZ: number = 1): Triangle {
  return new Triangle([vec3(0, 0, z), vec3(1, 0, z), vec3(0, 1, z)], vec3(0, 0, normalZ));
}

export function meshOf(triangles: Triangle[], material: Material = diffuse(vec3(0.8, 0.8, 0.4))): Mesh {
  return new Mesh(triangles, material);
}
