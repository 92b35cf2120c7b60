import type { Vector3 } from 'three';
import { DrawingModes, type RayTracerConfig } from './config';
import { ColorRangeError } from './errors';

export function ppmHeader(width: number, height: number): string {
  return `P3\n${width} ${height}\n255\n`;
}

export function clamp(val: number, low: number, high: number) {
  if (val < low) return low;
  else if (val > high) return high;
  else return val;
}

/**
 * Maps a pixel's accumulated color to 8 bit channels. Flat modes scale the
 * [0, 1] color straight to 255, path traced pixels are averaged over their
 * samples and gamma corrected (gamma 2) first.
 */
export function encodeColor(color: Vector3, config: RayTracerConfig): [number, number, number] {
  let channels: [number, number, number];

  if (config.mode.type === DrawingModes.Samples) {
    let scale = 1 / config.mode.samples;
    channels = [
      Math.trunc(clamp(Math.sqrt(color.x * scale), 0, 0.999) * 255),
      Math.trunc(clamp(Math.sqrt(color.y * scale), 0, 0.999) * 255),
      Math.trunc(clamp(Math.sqrt(color.z * scale), 0, 0.999) * 255)
    ];
  } else {
    channels = [Math.trunc(color.x * 255), Math.trunc(color.y * 255), Math.trunc(color.z * 255)];
  }

  for (let c of channels) {
    // also catches NaN
    if (!(c >= 0 && c <= 255)) throw new ColorRangeError(channels);
  }

  return channels;
}

export function ppmPixel(color: Vector3, config: RayTracerConfig): string {
  let [r, g, b] = encodeColor(color, config);
  return `${r} ${g} ${b}\n`;
}
