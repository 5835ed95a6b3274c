import { type Grid, type Pixel, RING_PRIORITY, putPixel } from './grid.js';
import { roundHalfAway } from './projection.js';

export const MIN_RING_STEPS = 64;
export const MAX_RING_STEPS = 720;
const STEPS_PER_CELL = 6;

export const RING_PIXEL: Pixel = Object.freeze({ glyph: '·', color: 'gray', priority: RING_PRIORITY });

export function ringSteps(radiusCells: number): number {
  return Math.trunc(Math.min(MAX_RING_STEPS, Math.max(MIN_RING_STEPS, radiusCells * STEPS_PER_CELL)));
}

/**
 * Samples a circle by angle rather than tracing it midpoint-style. Radii
 * under one cell draw nothing. Returns how many samples were attempted.
 */
export function drawRing(grid: Grid, cx: number, cy: number, radiusCells: number, pixel: Pixel = RING_PIXEL): number {
  if (!(radiusCells >= 1)) {
    return 0;
  }
  const steps = ringSteps(radiusCells);
  for (let i = 0; i < steps; i++) {
    const t = (i * 2 * Math.PI) / steps;
    const x = cx + roundHalfAway(Math.cos(t) * radiusCells);
    const y = cy - roundHalfAway(Math.sin(t) * radiusCells);
    putPixel(grid, x, y, pixel);
  }
  return steps;
}
