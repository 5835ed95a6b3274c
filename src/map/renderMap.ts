import { BODIES, BODY_NAMES, iconFor } from '../config/bodies.js';
import { ORIGIN } from '../models/ephemeris-vector.js';
import { type ViewState, focusLevelOf } from '../state/viewState.js';
import { BODY_PRIORITY, type Grid, SUN_PRIORITY, createGrid, putPixel } from './grid.js';
import { type Projection, createProjection, projectToCell } from './projection.js';
import { drawRing } from './rings.js';

export type MapView = Pick<ViewState, 'bodies' | 'zoom' | 'focusIndex' | 'iconStyle'>;

export interface StyledGlyph {
  glyph: string;
  color?: string;
}

export type StyledRow = StyledGlyph[];

export interface MapFrame {
  projection: Projection;
  grid: Grid;
}

const BLANK: StyledGlyph = Object.freeze({ glyph: ' ' });

export function composeGrid(width: number, height: number, view: MapView): MapFrame {
  const focus = focusLevelOf(view);
  const projection = createProjection(width, height, focus.orbitAu, view.zoom);
  const grid = createGrid(projection.width, projection.height);
  const { cx, cy, scale } = projection;

  // Focus decides which rings show; planets are drawn regardless of it.
  for (const name of BODY_NAMES) {
    const orbitAu = BODIES[name].orbitAu;
    if (orbitAu !== null && orbitAu <= focus.orbitAu) {
      drawRing(grid, cx, cy, orbitAu * scale);
    }
  }

  const sunCell = projectToCell(projection, ORIGIN);
  putPixel(grid, sunCell.x, sunCell.y, {
    glyph: iconFor('Sun', view.iconStyle),
    color: BODIES.Sun.color,
    priority: SUN_PRIORITY
  });

  for (const body of view.bodies) {
    if (body.name === 'Sun' || !body.posAu) {
      continue;
    }
    const cell = projectToCell(projection, body.posAu);
    putPixel(grid, cell.x, cell.y, {
      glyph: iconFor(body.name, view.iconStyle),
      color: BODIES[body.name].color,
      priority: BODY_PRIORITY
    });
  }

  return { projection, grid };
}

export function serializeGrid(grid: Grid): StyledRow[] {
  return grid.map((row) =>
    row.map((pixel) => (pixel ? { glyph: pixel.glyph, color: pixel.color } : BLANK))
  );
}

/** Renders the orbit map for a panel of the given inner size. */
export function renderMap(width: number, height: number, view: MapView): StyledRow[] {
  return serializeGrid(composeGrid(width, height, view).grid);
}
