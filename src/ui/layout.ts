export const HEADER_HEIGHT = 3;
export const TABLE_SHARE = 0.4;
// Border top and bottom plus the title line.
const PANEL_CHROME_ROWS = 3;
const PANEL_CHROME_COLS = 2;

export interface FrameLayout {
  columns: number;
  headerHeight: number;
  bodyHeight: number;
  tableWidth: number;
  mapWidth: number;
  /** Cells available to the orbit grid inside the map panel. */
  mapInner: { width: number; height: number };
}

/**
 * Splits the terminal into a header and two side-by-side panels. One row
 * is held back because Ink redraws the whole screen when output fills it.
 */
export function computeLayout(columns: number, rows: number): FrameLayout {
  const cols = Math.max(1, Math.floor(columns || 0));
  const usableRows = Math.max(1, Math.floor(rows || 0) - 1);
  const bodyHeight = Math.max(0, usableRows - HEADER_HEIGHT);
  const tableWidth = Math.floor(cols * TABLE_SHARE);
  const mapWidth = cols - tableWidth;

  return {
    columns: cols,
    headerHeight: HEADER_HEIGHT,
    bodyHeight,
    tableWidth,
    mapWidth,
    mapInner: {
      width: Math.max(1, mapWidth - PANEL_CHROME_COLS),
      height: Math.max(1, bodyHeight - PANEL_CHROME_ROWS)
    }
  };
}
