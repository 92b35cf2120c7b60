import { Vector2 } from 'three';
import { describe, expect, it } from 'vitest';
import { expectVector } from '../testHelpers';
import { interpolateNormal, lerp, nearZero, randomUnitVector, reflect, vec3 } from './vec3';

describe('reflect', () => {
  it('mirrors the direction about the normal', () => {
    expectVector(reflect(vec3(1, -1, 0), vec3(0, 1, 0)), 1, 1, 0);
  });

  it('leaves its arguments untouched', () => {
    let d = vec3(1, -1, 0);
    reflect(d, vec3(0, 1, 0));
    expectVector(d, 1, -1, 0);
  });
});

describe('randomUnitVector', () => {
  it('maps an all-zero generator to +z', () => {
    expectVector(randomUnitVector(() => 0), 0, 0, 1);
  });

  it('returns unit vectors', () => {
    let values = [0.1, 0.9, 0.25, 0.5, 0.75, 0.33];
    let i = 0;
    let rng = () => values[i++ % values.length];

    for (let n = 0; n < 3; n++) {
      expect(randomUnitVector(rng).length()).toBeCloseTo(1, 12);
    }
  });
});

describe('nearZero', () => {
  it('is true only when every component is tiny', () => {
    expect(nearZero(vec3(1e-9, -1e-9, 0))).toBe(true);
    expect(nearZero(vec3(1e-9, 0.1, 0))).toBe(false);
  });
});

describe('interpolateNormal', () => {
  it('weights the first vertex with 1 - u - v', () => {
    let n = interpolateNormal(vec3(1, 0, 0), vec3(0, 1, 0), vec3(0, 0, 1), new Vector2(0, 0));
    expectVector(n, 1, 0, 0);
  });

  it('normalizes the blend', () => {
    let n = interpolateNormal(vec3(1, 0, 0), vec3(0, 1, 0), vec3(0, 0, 1), new Vector2(0.5, 0.5));
    expectVector(n, 0, Math.SQRT1_2, Math.SQRT1_2);
  });
});

describe('lerp', () => {
  it('blends two colors', () => {
    expectVector(lerp(vec3(1, 1, 1), vec3(0.5, 0.7, 1), 0.5), 0.75, 0.85, 1);
  });
});
