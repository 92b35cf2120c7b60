import type { Vector3 } from 'three';
import type { SurfaceHit } from '../geometry/intersection';
import type { Ray } from '../geometry/ray';
import type { Rng } from '../utils/random';
import { scatterDiffuse } from './diffuse';
import { scatterMetal } from './metal';

export enum Materials {
  Diffuse = 0,
  Metal = 1
}

export type DiffuseMaterial = {
  readonly type: Materials.Diffuse;
  readonly albedo: Vector3;
};

export type MetalMaterial = {
  readonly type: Materials.Metal;
  readonly albedo: Vector3;
  // 0 is a perfect mirror
  readonly fuzz: number;
};

// plain data, materials travel to the worker threads as JSON
export type Material = DiffuseMaterial | MetalMaterial;

export type Scattered = {
  attenuation: Vector3;
  scattered: Ray;
};

export function diffuse(albedo: Vector3): DiffuseMaterial {
  return { type: Materials.Diffuse, albedo: albedo.clone() };
}

export function metal(albedo: Vector3, fuzz: number): MetalMaterial {
  return { type: Materials.Metal, albedo: albedo.clone(), fuzz: Math.min(Math.max(fuzz, 0), 1) };
}

export function cloneMaterial(material: Material): Material {
  switch (material.type) {
    case Materials.Diffuse:
      return diffuse(material.albedo);
    case Materials.Metal:
      return metal(material.albedo, material.fuzz);
  }
}

/**
 * Either absorbs the incoming ray (null) or proposes the next ray of the path
 * together with the color it gets multiplied by.
 */
export function scatter(material: Material, ray: Ray, hit: SurfaceHit, rng: Rng): Scattered | null {
  switch (material.type) {
    case Materials.Diffuse:
      return scatterDiffuse(material, hit, rng);
    case Materials.Metal:
      return scatterMetal(material, ray, hit, rng);
  }
}

export function albedo(material: Material): Vector3 {
  return material.albedo;
}
