import {
  BODY_NAMES,
  type BodyName,
  DEFAULT_FOCUS_INDEX,
  FOCUS_LEVELS,
  type FocusLevel,
  type IconStyle,
  type PlanetName
} from '../config/bodies.js';
import { type EphemerisVector, ORIGIN } from '../models/ephemeris-vector.js';

export const MIN_ZOOM = 0.2;
export const MAX_ZOOM = 50;
export const ZOOM_STEP = 1.25;
export const DEFAULT_ZOOM = 1;

export interface BodyState {
  name: BodyName;
  /** Last known position; `null` until the first successful fetch. */
  posAu: EphemerisVector | null;
}

export interface ViewState {
  bodies: readonly BodyState[];
  lastUpdateUtc: string | null;
  status: string;
  iconStyle: IconStyle;
  zoom: number;
  focusIndex: number;
}

export type ViewTransition = (state: ViewState) => ViewState;

export function createInitialState(iconStyle: IconStyle = 'ascii'): ViewState {
  return {
    bodies: BODY_NAMES.map((name) => ({ name, posAu: name === 'Sun' ? ORIGIN : null })),
    lastUpdateUtc: null,
    status: 'Starting…',
    iconStyle,
    zoom: DEFAULT_ZOOM,
    focusIndex: DEFAULT_FOCUS_INDEX
  };
}

export function clampZoom(zoom: number): number {
  if (Number.isNaN(zoom)) {
    return DEFAULT_ZOOM;
  }
  return Math.min(MAX_ZOOM, Math.max(MIN_ZOOM, zoom));
}

export function clampFocusIndex(index: number): number {
  return Math.min(FOCUS_LEVELS.length - 1, Math.max(0, Math.trunc(index)));
}

export function focusLevelOf(state: Pick<ViewState, 'focusIndex'>): FocusLevel {
  return FOCUS_LEVELS[clampFocusIndex(state.focusIndex)];
}

export const zoomIn: ViewTransition = (state) => ({ ...state, zoom: clampZoom(state.zoom * ZOOM_STEP) });

export const zoomOut: ViewTransition = (state) => ({ ...state, zoom: clampZoom(state.zoom / ZOOM_STEP) });

export const resetView: ViewTransition = (state) => ({
  ...state,
  zoom: DEFAULT_ZOOM,
  focusIndex: DEFAULT_FOCUS_INDEX
});

export const focusIn: ViewTransition = (state) => ({
  ...state,
  focusIndex: clampFocusIndex(state.focusIndex - 1)
});

export const focusOut: ViewTransition = (state) => ({
  ...state,
  focusIndex: clampFocusIndex(state.focusIndex + 1)
});

export function setZoom(zoom: number): ViewTransition {
  return (state) => ({ ...state, zoom: clampZoom(zoom) });
}

export interface EphemerisCycleResult {
  positions: Partial<Record<PlanetName, EphemerisVector>>;
  status: string;
  completedAt: string;
}

/**
 * Merges one refresh cycle into the state. Bodies missing from `positions`
 * keep whatever they had; the Sun is pinned to the origin.
 */
export function applyEphemerisCycle(result: EphemerisCycleResult): ViewTransition {
  return (state) => ({
    ...state,
    bodies: state.bodies.map((body) => {
      if (body.name === 'Sun') {
        return { name: body.name, posAu: ORIGIN };
      }
      const fresh = result.positions[body.name];
      return fresh ? { name: body.name, posAu: fresh } : body;
    }),
    lastUpdateUtc: result.completedAt,
    status: result.status
  });
}
