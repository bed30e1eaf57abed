import type { ScreenFrame } from '../capture/types';

export type RGB = [number, number, number];

export interface Hsv {
  h: number; // 0-1
  s: number; // 0-1
  v: number; // 0-1
}

export function lerp(start: number, end: number, factor: number): number {
  return start + (end - start) * factor;
}

/**
 * Interpolate between two hues along the shorter arc of the color wheel.
 */
export function lerpHue(start: number, end: number, factor: number): number {
  let from = start;
  let to = end;
  if (Math.abs(to - from) > 180) {
    if (to > from) {
      from += 360;
    } else {
      to += 360;
    }
  }
  const result = lerp(from, to, factor) % 360;
  return result < 0 ? result + 360 : result;
}

/**
 * Channels are truncated toward zero, like every integer conversion on the
 * way to the bulb.
 */
export function applyGammaCorrection(color: RGB, gamma: number): RGB {
  return [
    Math.trunc(255 * Math.pow(color[0] / 255, gamma)),
    Math.trunc(255 * Math.pow(color[1] / 255, gamma)),
    Math.trunc(255 * Math.pow(color[2] / 255, gamma)),
  ];
}

/**
 * Channels in 0-1.
 */
export function rgbToHsv(r: number, g: number, b: number): Hsv {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;

  if (delta === 0) {
    return { h: 0, s: 0, v: max };
  }

  let h: number;
  if (max === r) {
    h = ((g - b) / delta) % 6;
  } else if (max === g) {
    h = (b - r) / delta + 2;
  } else {
    h = (r - g) / delta + 4;
  }
  h /= 6;
  if (h < 0) {
    h += 1;
  }

  return { h, s: delta / max, v: max };
}

/**
 * Average color where brighter pixels count more: each pixel is weighted by
 * mean(R,G,B)^powerFactor. A frame with zero total weight averages uniformly.
 * Weights are scaled so the heaviest pixel counts 1, which keeps the average
 * of a solid frame exact before truncation.
 */
export function weightedAverageColor(frame: ScreenFrame, powerFactor: number): RGB {
  const pixelCount = frame.width * frame.height;
  if (pixelCount === 0) {
    return [0, 0, 0];
  }

  const { data } = frame;
  const weights = new Float64Array(pixelCount);
  let maxWeight = 0;

  for (let i = 0; i < pixelCount; i++) {
    const offset = i * 3;
    const luminance = (data[offset] + data[offset + 1] + data[offset + 2]) / 3;
    const weight = Math.pow(luminance, powerFactor);
    weights[i] = weight;
    maxWeight = Math.max(maxWeight, weight);
  }

  let r = 0;
  let g = 0;
  let b = 0;
  let weightSum = 0;
  for (let i = 0; i < pixelCount; i++) {
    const weight = maxWeight > 0 ? weights[i] / maxWeight : 1;
    const offset = i * 3;
    r += data[offset] * weight;
    g += data[offset + 1] * weight;
    b += data[offset + 2] * weight;
    weightSum += weight;
  }

  return [Math.trunc(r / weightSum), Math.trunc(g / weightSum), Math.trunc(b / weightSum)];
}
