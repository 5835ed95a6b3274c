import type { ViewState } from '../state/viewState.js';
import { focusLevelOf } from '../state/viewState.js';
import type { EphemerisVector } from '../models/ephemeris-vector.js';

export const UNKNOWN = '—';

export const CONTROLS_HINT = '+/- zoom, 0 reset, [ ] focus, q quit';

export function formatSigned(value: number, digits = 6): string {
  const text = value.toFixed(digits);
  return text.startsWith('-') ? text : `+${text}`;
}

export interface VectorCells {
  x: string;
  y: string;
  z: string;
  r: string;
}

/** R is the distance in the ecliptic plane, sqrt(x² + y²). */
export function formatVectorCells(pos: EphemerisVector | null): VectorCells {
  if (!pos) {
    return { x: UNKNOWN, y: UNKNOWN, z: UNKNOWN, r: UNKNOWN };
  }
  return {
    x: formatSigned(pos.x_au),
    y: formatSigned(pos.y_au),
    z: formatSigned(pos.z_au),
    r: Math.hypot(pos.x_au, pos.y_au).toFixed(6)
  };
}

export function formatHeader(state: Pick<ViewState, 'lastUpdateUtc' | 'status' | 'zoom' | 'focusIndex'>): string {
  const focus = focusLevelOf(state);
  return [
    `Last update: ${state.lastUpdateUtc ?? UNKNOWN}`,
    `Status: ${state.status}`,
    `zoom: ${state.zoom.toFixed(2)}x`,
    `focus: ${focus.name} (${focus.orbitAu.toFixed(2)} AU)`,
    CONTROLS_HINT
  ].join(' | ');
}

export interface GlyphRun {
  text: string;
  color?: string;
}

/** Merges neighbouring cells of the same color so a row renders as a few spans. */
export function groupRuns(row: readonly { glyph: string; color?: string }[]): GlyphRun[] {
  const runs: GlyphRun[] = [];
  for (const cell of row) {
    const last = runs[runs.length - 1];
    if (last && last.color === cell.color) {
      last.text += cell.glyph;
    } else {
      runs.push({ text: cell.glyph, color: cell.color });
    }
  }
  return runs;
}
