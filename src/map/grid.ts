import type { TermColor } from '../config/bodies.js';

export const RING_PRIORITY = 1;
export const SUN_PRIORITY = 10;
export const BODY_PRIORITY = 20;

export interface Pixel {
  glyph: string;
  color: TermColor;
  priority: number;
}

export type Grid = (Pixel | null)[][];

export function createGrid(width: number, height: number): Grid {
  const w = Math.max(1, Math.floor(width));
  const h = Math.max(1, Math.floor(height));
  return Array.from({ length: h }, () => new Array<Pixel | null>(w).fill(null));
}

export function gridWidth(grid: Grid): number {
  return grid[0]?.length ?? 0;
}

/**
 * The only way pixels enter a grid. Out-of-range writes are dropped; an
 * occupied cell changes hands only to a strictly higher priority, so the
 * first writer keeps a tie.
 */
export function putPixel(grid: Grid, x: number, y: number, pixel: Pixel): boolean {
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0) {
    return false;
  }
  const row = grid[y];
  if (!row || x >= row.length) {
    return false;
  }
  const existing = row[x];
  if (existing && pixel.priority <= existing.priority) {
    return false;
  }
  row[x] = pixel;
  return true;
}
