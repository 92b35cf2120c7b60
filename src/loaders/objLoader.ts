import { readFile } from 'fs/promises';
import { Vector3 } from 'three';
import { MeshLoadError } from '../errors';
import { Mesh } from '../primitives/mesh';
import { Triangle } from '../primitives/triangle';

/**
 * Builds a mesh from Wavefront OBJ text. Only `v`, `vn` and triangular `f`
 * records are read; every face corner needs a normal index (`f 1/2/3 ...` or
 * `f 1//3 ...`). The first corner's normal becomes the face normal; with
 * `smooth` the three corner normals are kept for interpolation.
 */
export function parseObj(text: string, smooth: boolean = false): Mesh {
  let positions: Vector3[] = [];
  let normals: Vector3[] = [];
  let triangles: Triangle[] = [];

  let lines = text.split('\n');
  for (let l = 0; l < lines.length; l++) {
    let words = lines[l].trim().split(/\s+/);
    let lineNumber = l + 1;

    if (words[0] === 'v') {
      positions.push(parseVector(words, lineNumber));
    } else if (words[0] === 'vn') {
      normals.push(parseVector(words, lineNumber));
    } else if (words[0] === 'f') {
      if (words.length < 4) {
        throw new MeshLoadError(`line ${lineNumber}: a face needs three vertices`);
      }

      let corners = [words[1], words[2], words[3]].map((word) => {
        let [p, , n] = word.split('/');
        return {
          point: lookup(positions, parseIndex(p, lineNumber), lineNumber, 'vertex'),
          normal: lookup(normals, parseIndex(n, lineNumber), lineNumber, 'normal')
        };
      });

      triangles.push(
        new Triangle(
          [corners[0].point, corners[1].point, corners[2].point],
          corners[0].normal,
          smooth ? [corners[0].normal, corners[1].normal, corners[2].normal] : undefined,
          smooth
        )
      );
    }
  }

  return Mesh.fromTriangles(triangles);
}

export async function loadMesh(path: string, smooth: boolean = false): Promise<Mesh> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new MeshLoadError(`Failed to open mesh file ${path}`, { cause: error });
  }

  try {
    return parseObj(text, smooth);
  } catch (error) {
    if (error instanceof MeshLoadError) {
      throw new MeshLoadError(`${path}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

function parseVector(words: string[], lineNumber: number): Vector3 {
  let [x, y, z] = [words[1], words[2], words[3]].map((word) => parseNumber(word, lineNumber));
  return new Vector3(x, y, z);
}

function parseNumber(word: string | undefined, lineNumber: number): number {
  let value = word === undefined ? NaN : Number(word);
  if (!Number.isFinite(value)) {
    throw new MeshLoadError(`line ${lineNumber}: failed to parse number '${word ?? ''}'`);
  }
  return value;
}

function parseIndex(word: string | undefined, lineNumber: number): number {
  if (word === undefined || !/^\d+$/.test(word)) {
    throw new MeshLoadError(`line ${lineNumber}: failed to parse index '${word ?? ''}'`);
  }
  return parseInt(word, 10);
}

// OBJ indices start at 1
function lookup(list: Vector3[], index: number, lineNumber: number, kind: string): Vector3 {
  let value = list[index - 1];
  if (index < 1 || !value) {
    throw new MeshLoadError(`line ${lineNumber}: ${kind} index ${index} is out of range`);
  }
  return value;
}
