import { describe, expect, it } from 'vitest';

import { computeLayout } from '../layout.js';

describe('computeLayout', () => {
  it('splits the body 40/60 and leaves room for the panel chrome', () => {
    expect(computeLayout(100, 31)).toEqual({
      columns: 100,
      headerHeight: 3,
      bodyHeight: 27,
      tableWidth: 40,
      mapWidth: 60,
      mapInner: { width: 58, height: 24 }
    });
  });

  it('keeps the map at least one cell on a tiny terminal', () => {
    const layout = computeLayout(0, 0);
    expect(layout.mapInner).toEqual({ width: 1, height: 1 });
    expect(layout.bodyHeight).toBe(0);
  });
});
