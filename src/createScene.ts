import { fileURLToPath } from 'url';
import { vec3 } from './geometry/vec3';
import { loadMesh } from './loaders/objLoader';
import { diffuse, metal } from './materials/materials';
import type { Mesh } from './primitives/mesh';

const MODELS_DIR = new URL('../models/', import.meta.url);

export function modelPath(name: string): string {
  return fileURLToPath(new URL(name, MODELS_DIR));
}

// a reflective floor with a yellow cube sitting on it
export async function createScene(): Promise<Mesh[]> {
  let floor = await loadMesh(modelPath('plane.obj'));
  floor.scale(4.0);
  floor.rotate(vec3(0, 0, 0));
  floor.translate(vec3(0, -1.4, -10));
  floor.material = metal(vec3(0.89, 0.4, 0.4), 0.0);

  let cube = await loadMesh(modelPath('cube.obj'));
  cube.scale(1.0);
  cube.rotate(vec3(0, 10, 0));
  cube.translate(vec3(0, -0.4, -12));
  cube.material = diffuse(vec3(0.8, 0.8, 0.4));

  return [floor, cube];
}
