import type { Vector3 } from 'three';
import { Hit } from '../geometry/intersection';
import type { Ray } from '../geometry/ray';
import { vec3 } from '../geometry/vec3';
import { cloneMaterial, diffuse, type Material } from '../materials/materials';
import type { Triangle } from './triangle';

export class Mesh {
  constructor(
    public triangles: Triangle[] = [],
    public material: Material = diffuse(vec3(1, 1, 1))
  ) {}

  // loaded geometry starts out grey
  static fromTriangles(triangles: Triangle[]): Mesh {
    return new Mesh(triangles, diffuse(vec3(0.5, 0.5, 0.5)));
  }

  add(triangle: Triangle): void {
    this.triangles.push(triangle);
  }

  clone(): Mesh {
    return new Mesh(
      this.triangles.map((triangle) => triangle.clone()),
      cloneMaterial(this.material)
    );
  }

  /**
   * Closest hit of the mesh. "Closest" compares the z of the hit points, not t:
   * with the camera looking down -z the least negative z is the nearest
   * surface for scenes laid out in front of it. Rays travelling towards +z, or
   * surfaces that overlap in depth, can pick the wrong triangle.
   */
  hit(ray: Ray): Hit {
    let closest = Hit.none();

    for (let i = 0; i < this.triangles.length; i++) {
      let hit = this.triangles[i].hit(ray);
      if (hit.t > 0 && hit.at.z > closest.at.z) {
        closest = hit;
        closest.material = this.material;
      }
    }

    return closest;
  }

  translate(d: Vector3): void {
    for (let triangle of this.triangles) {
      for (let point of triangle.points) {
        point.add(d);
      }
    }
  }

  scale(c: number): void {
    for (let triangle of this.triangles) {
      for (let point of triangle.points) {
        point.multiplyScalar(c);
      }
    }
  }

  // r holds degrees around x, y and z, applied in that order
  rotate(r: Vector3): void {
    let thetaX = (r.x * Math.PI) / 180;
    let thetaY = (r.y * Math.PI) / 180;
    let thetaZ = (r.z * Math.PI) / 180;

    for (let triangle of this.triangles) {
      let normals = [triangle.normal, ...triangle.normals];

      for (let n of normals) {
        rotateX(n, thetaX).normalize();
        rotateY(n, thetaY).normalize();
        rotateZ(n, thetaZ).normalize();
      }

      for (let point of triangle.points) {
        rotateZ(rotateY(rotateX(point, thetaX), thetaY), thetaZ);
      }
    }
  }
}

function rotateX(v: Vector3, theta: number): Vector3 {
  let cos = Math.cos(theta);
  let sin = Math.sin(theta);
  return v.set(v.x, v.y * cos - v.z * sin, v.y * sin + v.z * cos);
}

function rotateY(v: Vector3, theta: number): Vector3 {
  let cos = Math.cos(theta);
  let sin = Math.sin(theta);
  return v.set(v.x * cos + v.z * sin, v.y, -v.x * sin + v.z * cos);
}

function rotateZ(v: Vector3, theta: number): Vector3 {
  let cos = Math.cos(theta);
  let sin = Math.sin(theta);
  return v.set(v.x * cos - v.y * sin, v.x * sin + v.y * cos, v.z);
}
