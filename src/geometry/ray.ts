import type { Vector3 } from 'three';

export class Ray {
  constructor(
    public origin: Vector3,
    public direction: Vector3
  ) {}

  at(t: number): Vector3 {
    return this.origin.clone().addScaledVector(this.direction, t);
  }
}
