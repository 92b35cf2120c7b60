import type { Vector3 } from 'three';
import { Ray } from './geometry/ray';
import { vec3 } from './geometry/vec3';

const VIEWPORT_HEIGHT = 2;
const FOCAL_LENGTH = 5;

export class Camera {
  constructor(
    public readonly origin: Vector3,
    public readonly horizontal: Vector3,
    public readonly vertical: Vector3,
    public readonly lowerLeftCorner: Vector3
  ) {}

  static fromAspectRatio(aspectRatio: number): Camera {
    let viewportWidth = aspectRatio * VIEWPORT_HEIGHT;

    let origin = vec3(0, 0, 0);
    let horizontal = vec3(viewportWidth, 0, 0);
    let vertical = vec3(0, VIEWPORT_HEIGHT, 0);
    let lowerLeftCorner = origin
      .clone()
      .addScaledVector(horizontal, -0.5)
      .addScaledVector(vertical, -0.5)
      .sub(vec3(0, 0, FOCAL_LENGTH));

    return new Camera(origin, horizontal, vertical, lowerLeftCorner);
  }

  // u and v in [0, 1] span the viewport from its lower left corner
  getRay(u: number, v: number): Ray {
    let direction = this.lowerLeftCorner
      .clone()
      .addScaledVector(this.horizontal, u)
      .addScaledVector(this.vertical, v)
      .sub(this.origin);

    return new Ray(this.origin.clone(), direction);
  }
}
