import type { EphemerisVector } from '../models/ephemeris-vector.js';

// Fraction of the shorter panel side given to the focus orbit's radius.
export const FIT_FRACTION = 0.45;
export const MIN_FOCUS_AU = 0.1;

export interface GridSize {
  width: number;
  height: number;
}

export interface Projection {
  width: number;
  height: number;
  cx: number;
  cy: number;
  /** Cells per AU. */
  scale: number;
}

export interface Cell {
  x: number;
  y: number;
}

/** Floors both sides to at least one cell. */
export function normalizeGridSize(width: number, height: number): GridSize {
  const floorDim = (value: number) => (Number.isFinite(value) ? Math.max(1, Math.floor(value)) : 1);
  return { width: floorDim(width), height: floorDim(height) };
}

export function computeScale(size: GridSize, focusAu: number, zoom: number): number {
  const baseScale = (Math.min(size.width, size.height) * FIT_FRACTION) / Math.max(focusAu, MIN_FOCUS_AU);
  return baseScale * zoom;
}

export function createProjection(width: number, height: number, focusAu: number, zoom: number): Projection {
  const size = normalizeGridSize(width, height);
  return {
    ...size,
    cx: Math.floor(size.width / 2),
    cy: Math.floor(size.height / 2),
    scale: computeScale(size, focusAu, zoom)
  };
}

/** Half away from zero; `Math.round` sends -2.5 to -2. */
export function roundHalfAway(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/** Top-down XY projection; z is ignored and the result is not clamped. */
export function projectToCell(projection: Projection, pos: Pick<EphemerisVector, 'x_au' | 'y_au'>): Cell {
  return {
    x: projection.cx + roundHalfAway(pos.x_au * projection.scale),
    y: projection.cy - roundHalfAway(pos.y_au * projection.scale)
  };
}
