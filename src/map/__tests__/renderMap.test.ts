import { describe, expect, it } from 'vitest';

import { BODY_PRIORITY, RING_PRIORITY, SUN_PRIORITY } from '../grid.js';
import { type MapView, composeGrid, renderMap, serializeGrid } from '../renderMap.js';
import { type BodyState, type ViewState, applyEphemerisCycle, createInitialState } from '../../state/viewState.js';

function withPositions(
  base: ViewState,
  positions: Partial<Record<BodyState['name'], [number, number, number]>>
): ViewState {
  return {
    ...base,
    bodies: base.bodies.map((body) => {
      const p = positions[body.name];
      return p ? { name: body.name, posAu: { x_au: p[0], y_au: p[1], z_au: p[2] } } : body;
    })
  };
}

function glyphCells(view: MapView, width: number, height: number, priority: number): string[] {
  const { grid } = composeGrid(width, height, view);
  const found: string[] = [];
  grid.forEach((row, y) =>
    row.forEach((cell, x) => {
      if (cell && cell.priority === priority) found.push(`${cell.glyph}@${x},${y}`);
    })
  );
  return found;
}

describe('composeGrid', () => {
  const earthFocus: ViewState = { ...createInitialState(), focusIndex: 0, zoom: 1 };

  it('draws the Earth ring and lets the Earth marker win the shared cell', () => {
    const view = withPositions(earthFocus, { Earth: [1, 0, 0] });
    const { grid, projection } = composeGrid(80, 24, view);

    expect(projection).toMatchObject({ width: 80, height: 24, cx: 40, cy: 12 });
    expect(grid[12][51]).toEqual({ glyph: 'E', color: 'blueBright', priority: BODY_PRIORITY });
    expect(grid[1][40]).toEqual({ glyph: '·', color: 'gray', priority: RING_PRIORITY });
    expect(grid[12][40]).toEqual({ glyph: '@', color: 'yellow', priority: SUN_PRIORITY });
  });

  it('only draws rings up to the focus orbit', () => {
    const view = withPositions(earthFocus, { Earth: [1, 0, 0] });
    const { grid } = composeGrid(80, 24, view);
    // The Mars ring would cross +x at 40 + round(1.523679 * 10.8).
    expect(grid[12][56]).toBeNull();

    const marsFocus = composeGrid(80, 24, { ...view, focusIndex: 1 }).grid;
    const marsScale = 10.8 / 1.523679;
    expect(marsFocus[12][40 + Math.round(1.523679 * marsScale)]).toMatchObject({ priority: RING_PRIORITY });
  });

  it('still draws planets beyond the focus orbit when they fit on screen', () => {
    const view = withPositions({ ...earthFocus, zoom: 0.2 }, { Jupiter: [5, 0, 0] });
    // scale = 10.8 * 0.2 = 2.16 cells/AU, so Jupiter lands 11 cells right of centre.
    expect(glyphCells(view, 80, 24, BODY_PRIORITY)).toEqual(['J@51,12']);
  });

  it('skips bodies that have never been fetched', () => {
    const view = createInitialState();
    expect(glyphCells(view, 80, 24, BODY_PRIORITY)).toEqual([]);
    expect(glyphCells(view, 80, 24, SUN_PRIORITY)).toEqual(['@@40,12']);
  });

  it('drops planets that project off the grid', () => {
    const view = withPositions(earthFocus, { Neptune: [30, 0, 0] });
    expect(glyphCells(view, 80, 24, BODY_PRIORITY)).toEqual([]);
  });

  it('ignores z', () => {
    const flat = withPositions(earthFocus, { Mars: [1, 0.5, 0] });
    const tilted = withPositions(earthFocus, { Mars: [1, 0.5, 3] });
    expect(glyphCells(tilted, 80, 24, BODY_PRIORITY)).toEqual(glyphCells(flat, 80, 24, BODY_PRIORITY));
  });

  it('resolves body-on-body overlaps by list order', () => {
    const view = withPositions(earthFocus, { Venus: [1, 0, 0], Earth: [1, 0, 0] });
    expect(glyphCells(view, 80, 24, BODY_PRIORITY)).toEqual(['v@51,12']);
  });

  it('keeps a stale position after a failed refresh', () => {
    const marsFocus: ViewState = { ...createInitialState(), focusIndex: 1 };
    const first = applyEphemerisCycle({
      positions: { Mars: { x_au: 1.5, y_au: 0, z_au: 0 }, Earth: { x_au: 0, y_au: 1, z_au: 0 } },
      status: 'OK',
      completedAt: '2026-10-19T08:00:00Z'
    })(marsFocus);
    const second = applyEphemerisCycle({
      positions: { Earth: { x_au: -1, y_au: 0, z_au: 0 } },
      status: 'Fetch error (Mars): HTTP 503 from Horizons',
      completedAt: '2026-10-19T08:00:05Z'
    })(first);

    // scale = 10.8 / 1.523679; Mars at 1.5 AU is 10.63 cells out, Earth 7.09.
    expect(glyphCells(second, 80, 24, BODY_PRIORITY).sort()).toEqual(['E@33,12', 'M@51,12']);
    expect(second.status).toBe('Fetch error (Mars): HTTP 503 from Horizons');
  });

  it('uses the unicode icon set when selected', () => {
    const view = withPositions({ ...earthFocus, iconStyle: 'unicode' }, { Earth: [1, 0, 0] });
    const { grid } = composeGrid(80, 24, view);
    expect(grid[12][51]?.glyph).toBe('⊕');
    expect(grid[12][40]?.glyph).toBe('☉');
  });

  it('renders a single cell for an empty panel', () => {
    const { grid } = composeGrid(0, 0, createInitialState());
    expect(grid).toEqual([[{ glyph: '@', color: 'yellow', priority: SUN_PRIORITY }]]);
  });
});

describe('serializeGrid', () => {
  it('emits one glyph per cell with blanks unstyled', () => {
    const { grid } = composeGrid(3, 1, createInitialState());
    expect(serializeGrid(grid)).toEqual([[{ glyph: ' ' }, { glyph: '@', color: 'yellow' }, { glyph: ' ' }]]);
  });
});

describe('renderMap', () => {
  it('returns height rows of width glyphs', () => {
    const rows = renderMap(30, 9, createInitialState());
    expect(rows).toHaveLength(9);
    expect(rows.every((row) => row.length === 30)).toBe(true);
    expect(rows[4][15]).toEqual({ glyph: '@', color: 'yellow' });
  });
});
