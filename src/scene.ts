import { Vector3 } from 'three';
import type { RayTracerConfig } from './config';
import { diffuse, metal, Materials, type Material } from './materials/materials';
import { Mesh } from './primitives/mesh';
import { Triangle, type TrianglePoints } from './primitives/triangle';
import { World } from './world';

type Vec3Def = { x: number; y: number; z: number };
type PointsDef = [Vec3Def, Vec3Def, Vec3Def];

type TriangleDef = {
  points: PointsDef;
  normal: Vec3Def;
  normals: PointsDef;
  smooth: boolean;
};

type MaterialDef =
  | { type: Materials.Diffuse; albedo: Vec3Def }
  | { type: Materials.Metal; albedo: Vec3Def; fuzz: number };

type MeshDef = {
  triangles: TriangleDef[];
  material: MaterialDef;
};

type SceneDef = {
  config: RayTracerConfig;
  meshes: MeshDef[];
};

export type Scene = {
  config: RayTracerConfig;
  world: World;
};

// Vector3 serializes to {x, y, z}, which is all the workers need
export function serializeScene(config: RayTracerConfig, world: World): string {
  let meshes = world.getMeshes().map((mesh) => ({
    triangles: mesh.triangles,
    material: mesh.material
  }));

  return JSON.stringify({ config, meshes });
}

export function deserializeScene(json: string): Scene {
  let scene: SceneDef = JSON.parse(json);
  let world = new World();

  for (let m of scene.meshes) {
    let triangles = m.triangles.map(
      (t) => new Triangle(toPoints(t.points), toVector3(t.normal), toPoints(t.normals), t.smooth)
    );
    world.add(new Mesh(triangles, toMaterial(m.material)));
  }

  return { config: scene.config, world };
}

function toVector3(v: Vec3Def): Vector3 {
  return new Vector3(v.x, v.y, v.z);
}

function toPoints(p: PointsDef): TrianglePoints {
  return [toVector3(p[0]), toVector3(p[1]), toVector3(p[2])];
}

function toMaterial(m: MaterialDef): Material {
  if (m.type === Materials.Metal) {
    return metal(toVector3(m.albedo), m.fuzz);
  }
  return diffuse(toVector3(m.albedo));
}
