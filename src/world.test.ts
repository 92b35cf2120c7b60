import { describe, expect, it } from 'vitest';
import { SceneSealedError } from './errors';
import { isSurfaceHit } from './geometry/intersection';
import { Ray } from './geometry/ray';
import { vec3 } from './geometry/vec3';
import { diffuse, metal } from './materials/materials';
import { expectVector, meshOf, unitTriangle } from './testHelpers';
import { World } from './world';

describe('World.hit', () => {
  it('never hits anything without meshes', () => {
    let hit = new World().hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)));

    expect(hit.t).toBeLessThanOrEqual(0);
    expect(isSurfaceHit(hit)).toBe(false);
  });

  it('picks the mesh whose hit has the largest z and stamps its material', () => {
    let back = meshOf([unitTriangle(-10)], diffuse(vec3(1, 0, 0)));
    let front = meshOf([unitTriangle(-5)], metal(vec3(0, 1, 0), 0.2));
    let world = new World();
    world.add(back);
    world.add(front);

    let hit = world.hit(new Ray(vec3(0.25, 0.25, 0), vec3(0, 0, -1)));

    expect(isSurfaceHit(hit)).toBe(true);
    expect(hit.at.z).toBeCloseTo(-5, 9);
    expect(hit.material).toEqual(front.material);
  });

  it('reports no hit when every mesh misses', () => {
    let world = new World();
    world.add(meshOf([unitTriangle(-5)]));

    let hit = world.hit(new Ray(vec3(3, 3, 0), vec3(0, 0, -1)));
    expect(hit.t).toBeLessThanOrEqual(0);
  });
});

describe('World.add', () => {
  it('copies the mesh so later edits do not reach the scene', () => {
    let mesh = meshOf([unitTriangle(-5)]);
    let world = new World();
    world.add(mesh);

    mesh.translate(vec3(0, 0, -1));
    mesh.material = metal(vec3(0, 1, 0), 0);

    let stored = world.getMeshes()[0];
    expectVector(stored.triangles[0].points[0], 0, 0, -5);
    expect(stored.material).toEqual(diffuse(vec3(0.8, 0.8, 0.4)));
    expect(world.hit(new Ray(vec3(0.25, 0.25, 0), vec3(0, 0, -1))).t).toBeCloseTo(5, 9);
  });
});

describe('World.seal', () => {
  it('refuses meshes once sealed', () => {
    let world = new World();
    world.add(meshOf([unitTriangle(-5)]));
    world.seal();

    expect(() => world.add(meshOf([unitTriangle(-6)]))).toThrow(SceneSealedError);
    expect(world.getMeshes()).toHaveLength(1);
  });
});
