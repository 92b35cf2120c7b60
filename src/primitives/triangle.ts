import { Vector2, Vector3 } from 'three';
import { Hit } from '../geometry/intersection';
import type { Ray } from '../geometry/ray';
import { interpolateNormal } from '../geometry/vec3';

export const EPSILON = 1e-7;

export type TrianglePoints = [Vector3, Vector3, Vector3];

export class Triangle {
  public points: TrianglePoints;
  public normal: Vector3;
  public normals: TrianglePoints;
  public smooth: boolean;

  // keeps copies of every vector: mesh transforms edit them in place
  constructor(points: TrianglePoints, normal: Vector3, normals?: TrianglePoints, smooth: boolean = false) {
    this.points = [points[0].clone(), points[1].clone(), points[2].clone()];
    this.normal = normal.clone();
    // without vertex normals every corner shares the face normal
    this.normals = normals
      ? [normals[0].clone(), normals[1].clone(), normals[2].clone()]
      : [normal.clone(), normal.clone(), normal.clone()];
    this.smooth = smooth && normals !== undefined;
  }

  clone(): Triangle {
    return new Triangle(this.points, this.normal, this.normals, this.smooth);
  }

  // Möller–Trumbore, two sided
  hit(ray: Ray): Hit {
    let result = Hit.none();

    let [p0, p1, p2] = this.points;
    let e1 = p1.clone().sub(p0);
    let e2 = p2.clone().sub(p0);
    let h = ray.direction.clone().cross(e2);
    let a = e1.dot(h);

    // the ray is parallel to the triangle's plane
    if (a > -EPSILON && a < EPSILON) return result;

    let f = 1 / a;
    let s = ray.origin.clone().sub(p0);
    let u = f * s.dot(h);

    if (u < 0 || u > 1) return result;

    let q = s.clone().cross(e1);
    let v = f * ray.direction.dot(q);

    if (v < 0 || u + v > 1) return result;

    let t = f * e2.dot(q);

    // line intersection, but at or behind the ray's origin
    if (t <= EPSILON) return result;

    result.t = t;
    result.at = ray.at(t);
    result.triangle = this;
    result.uvs = new Vector2(u, v);

    return result;
  }

  shadingNormal(uv: Vector2): Vector3 {
    if (!this.smooth) return this.normal;

    return interpolateNormal(this.normals[0], this.normals[1], this.normals[2], uv);
  }
}
