import { Hit } from './geometry/intersection';
import type { Ray } from './geometry/ray';
import { SceneSealedError } from './errors';
import type { Mesh } from './primitives/mesh';

export class World {
  private meshes: Mesh[] = [];
  private sealed = false;

  // the world keeps its own copy, later edits to `mesh` never reach a render
  add(mesh: Mesh): void {
    if (this.sealed) throw new SceneSealedError();
    this.meshes.push(mesh.clone());
  }

  getMeshes(): readonly Mesh[] {
    return this.meshes;
  }

  // once rendering starts the meshes are shared read-only with the workers
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  // brute force over every mesh, same z rule as Mesh.hit
  hit(ray: Ray): Hit {
    let closest = Hit.none();

    for (let i = 0; i < this.meshes.length; i++) {
      let mesh = this.meshes[i];
      let hit = mesh.hit(ray);
      if (hit.t > 0 && hit.at.z > closest.at.z) {
        closest = hit;
        closest.material = mesh.material;
      }
    }

    return closest;
  }
}
