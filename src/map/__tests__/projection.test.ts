import { describe, expect, it } from 'vitest';

import { FOCUS_LEVELS } from '../../config/bodies.js';
import { computeScale, createProjection, normalizeGridSize, projectToCell, roundHalfAway } from '../projection.js';

describe('normalizeGridSize', () => {
  it('floors to whole cells and at least 1x1', () => {
    expect(normalizeGridSize(0, -3)).toEqual({ width: 1, height: 1 });
    expect(normalizeGridSize(Number.NaN, 10.7)).toEqual({ width: 1, height: 10 });
    expect(normalizeGridSize(80, 24)).toEqual({ width: 80, height: 24 });
  });
});

describe('computeScale', () => {
  const size = { width: 80, height: 24 };

  it('fits the focus orbit into 45% of the shorter side', () => {
    expect(computeScale(size, 1, 1)).toBeCloseTo(10.8, 10);
    expect(computeScale({ width: 20, height: 60 }, 2, 1)).toBeCloseTo(4.5, 10);
  });

  it('floors degenerate focus radii at 0.1 AU', () => {
    expect(computeScale(size, 0, 1)).toBeCloseTo(108, 10);
    expect(computeScale(size, 0.05, 1)).toBeCloseTo(108, 10);
  });

  it('is positive for every focus level', () => {
    for (const level of FOCUS_LEVELS) {
      expect(computeScale(size, level.orbitAu, 0.2)).toBeGreaterThan(0);
    }
  });

  it('increases with zoom', () => {
    const zooms = [0.2, 0.5, 1, 1.25, 10, 50];
    const scales = zooms.map((zoom) => computeScale(size, FOCUS_LEVELS[2].orbitAu, zoom));
    for (let i = 1; i < scales.length; i++) {
      expect(scales[i]).toBeGreaterThan(scales[i - 1]);
    }
  });
});

describe('createProjection', () => {
  it('centres with floor division', () => {
    const even = createProjection(80, 24, 1, 1);
    expect(even.cx).toBe(40);
    expect(even.cy).toBe(12);

    const odd = createProjection(81, 25, 1, 1);
    expect(odd.cx).toBe(40);
    expect(odd.cy).toBe(12);
  });

  it('survives an empty panel', () => {
    const projection = createProjection(0, 0, 1, 1);
    expect(projection).toMatchObject({ width: 1, height: 1, cx: 0, cy: 0 });
    expect(projection.scale).toBeGreaterThan(0);
  });
});

describe('roundHalfAway', () => {
  it('rounds halves away from zero', () => {
    expect(roundHalfAway(2.5)).toBe(3);
    expect(roundHalfAway(-2.5)).toBe(-3);
    expect(roundHalfAway(-1.4)).toBe(-1);
    expect(roundHalfAway(10.8)).toBe(11);
  });
});

describe('projectToCell', () => {
  const projection = createProjection(80, 24, 1, 1);

  it('maps +x to the right of centre', () => {
    expect(projectToCell(projection, { x_au: 1, y_au: 0 })).toEqual({ x: 51, y: 12 });
  });

  it('inverts y so +y points up the screen', () => {
    expect(projectToCell(projection, { x_au: 0, y_au: 1 })).toEqual({ x: 40, y: 1 });
    expect(projectToCell(projection, { x_au: 0, y_au: -1 })).toEqual({ x: 40, y: 23 });
  });

  it('does not clamp positions outside the panel', () => {
    expect(projectToCell(projection, { x_au: -30, y_au: 0 })).toEqual({ x: 40 - 324, y: 12 });
  });

  it('places a body on the focus orbit within one cell of the fitted radius', () => {
    const neptune = FOCUS_LEVELS[FOCUS_LEVELS.length - 1].orbitAu;
    for (const zoom of [0.5, 1, 2]) {
      const p = createProjection(80, 24, neptune, zoom);
      const cell = projectToCell(p, { x_au: neptune, y_au: 0 });
      expect(Math.abs(cell.x - (40 + Math.round(0.45 * 24 * zoom)))).toBeLessThanOrEqual(1);
      expect(cell.y).toBe(12);
    }
  });
});
