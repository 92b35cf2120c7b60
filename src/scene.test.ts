import { describe, expect, it } from 'vitest';
import { DrawingMode, createConfig } from './config';
import { Ray } from './geometry/ray';
import { vec3 } from './geometry/vec3';
import { Materials, metal } from './materials/materials';
import { Triangle } from './primitives/triangle';
import { deserializeScene, serializeScene } from './scene';
import { centeredTriangle, expectVector, meshOf } from './testHelpers';
import { World } from './world';

describe('scene serialization', () => {
  it('rebuilds the config and every mesh', () => {
    let config = createConfig({ mode: DrawingMode.Samples(4), width: 6, height: 5 });
    let world = new World();
    world.add(meshOf([centeredTriangle()]));

    let smooth = new Triangle(
      [vec3(0, 0, -3), vec3(1, 0, -3), vec3(0, 1, -3)],
      vec3(0, 0, 1),
      [vec3(1, 0, 0), vec3(0, 1, 0), vec3(0, 0, 1)],
      true
    );
    world.add(meshOf([smooth], metal(vec3(0.9, 0.4, 0.4), 0.25)));

    let scene = deserializeScene(serializeScene(config, world));

    expect(scene.config).toEqual(config);
    expect(scene.world.isSealed()).toBe(false);

    let meshes = scene.world.getMeshes();
    expect(meshes).toHaveLength(2);

    let flat = meshes[0].triangles[0];
    expect(flat.smooth).toBe(false);
    expectVector(flat.points[0], -5, -5, -10);
    expectVector(flat.points[2], 0, 5, -10);
    expectVector(flat.normal, 0, 0, 1);
    expect(meshes[0].material.type).toBe(Materials.Diffuse);
    expectVector(meshes[0].material.albedo, 0.8, 0.8, 0.4);

    let rebuilt = meshes[1].triangles[0];
    expect(rebuilt.smooth).toBe(true);
    expectVector(rebuilt.normals[1], 0, 1, 0);
    expect(meshes[1].material).toMatchObject({ type: Materials.Metal, fuzz: 0.25 });
    expectVector(meshes[1].material.albedo, 0.9, 0.4, 0.4);
  });

  it('gives back working geometry', () => {
    let world = new World();
    world.add(meshOf([centeredTriangle()]));

    let scene = deserializeScene(serializeScene(createConfig({ mode: DrawingMode.Colors }), world));
    let hit = scene.world.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)));

    expect(hit.t).toBeCloseTo(10, 9);
    expect(hit.material?.type).toBe(Materials.Diffuse);
  });
});
