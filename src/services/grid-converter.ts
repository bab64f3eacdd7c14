/**
 * Grid Coordinate Converter
 *
 * The Layout Service places elements on a 24-column x 14-row CSS grid
 * ("start/end" lines, 1-indexed). Backends size content in their own units:
 *
 *   12x8 family  (chart, text, table, image)   width = cols/2,     height = rows*8/14
 *   32x18 family (infographic)                 width = cols*32/24, height = rows*18/14
 *   pixel family (diagram)                     cols*pxPerCol, rows*pxPerRow
 *
 * All functions here are pure.
 */

import type { GridPosition } from '../schemas/elements';

// ============================================================================
// Types
// ============================================================================

export const LAYOUT_GRID = { columns: 24, rows: 14 } as const;

export interface GridRange {
  start: number;
  end: number;
}

export interface GridSpan {
  columns: number;
  rows: number;
}

export interface GridUnits {
  gridWidth: number;
  gridHeight: number;
}

export interface PixelBox {
  maxWidth: number;
  maxHeight: number;
}

export interface PixelScale {
  pxPerCol: number;
  pxPerRow: number;
}

export interface ConvertedConstraints {
  span: GridSpan;
  /** 12x8 grid */
  standard: GridUnits;
  /** 32x18 grid */
  infographic: GridUnits;
  /** Pixel budget */
  diagram: PixelBox;
}

export type GridParseResult =
  | { ok: true; row: GridRange; column: GridRange; span: GridSpan }
  | { ok: false; field: 'grid_row' | 'grid_column'; message: string };

// ============================================================================
// Parsing
// ============================================================================

const GRID_VALUE_PATTERN = /^\s*(\d+)\s*\/\s*(\d+)\s*$/;

/**
 * Parse "4/12" or "4 / 12". Returns null when the value is malformed or end <= start.
 * Layout bounds are checked by parseGridPosition.
 */
export function parseGridRange(value: string): GridRange | null {
  const match = GRID_VALUE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const start = Number.parseInt(match[1], 10);
  const end = Number.parseInt(match[2], 10);
  if (start < 1 || end <= start) {
    return null;
  }
  return { start, end };
}

export function parseGridPosition(position: GridPosition): GridParseResult {
  const row = parseGridRange(position.grid_row);
  if (!row) {
    return {
      ok: false,
      field: 'grid_row',
      message: `Invalid grid_row "${position.grid_row}": expected "start/end" with end greater than start`,
    };
  }
  if (row.end > LAYOUT_GRID.rows + 1) {
    return {
      ok: false,
      field: 'grid_row',
      message: `Invalid grid_row "${position.grid_row}": end line must not exceed ${LAYOUT_GRID.rows + 1}`,
    };
  }
  const column = parseGridRange(position.grid_column);
  if (!column) {
    return {
      ok: false,
      field: 'grid_column',
      message: `Invalid grid_column "${position.grid_column}": expected "start/end" with end greater than start`,
    };
  }
  if (column.end > LAYOUT_GRID.columns + 1) {
    return {
      ok: false,
      field: 'grid_column',
      message: `Invalid grid_column "${position.grid_column}": end line must not exceed ${LAYOUT_GRID.columns + 1}`,
    };
  }
  return {
    ok: true,
    row,
    column,
    span: { columns: column.end - column.start, rows: row.end - row.start },
  };
}

// ============================================================================
// Conversion
// ============================================================================

/** Round half up (2.5 -> 3), independent of banker's rounding */
export function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5);
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function toStandardGrid(span: GridSpan): GridUnits {
  return {
    gridWidth: clamp(roundHalfUp(span.columns / 2), 1, 12),
    gridHeight: clamp(roundHalfUp((span.rows * 8) / LAYOUT_GRID.rows), 1, 8),
  };
}

export function toInfographicGrid(span: GridSpan): GridUnits {
  return {
    gridWidth: clamp(roundHalfUp((span.columns * 32) / LAYOUT_GRID.columns), 1, 32),
    gridHeight: clamp(roundHalfUp((span.rows * 18) / LAYOUT_GRID.rows), 1, 18),
  };
}

export function toPixelBox(span: GridSpan, scale: PixelScale): PixelBox {
  return {
    maxWidth: span.columns * Math.max(1, scale.pxPerCol),
    maxHeight: span.rows * Math.max(1, scale.pxPerRow),
  };
}

export function convertGridSpan(span: GridSpan, scale: PixelScale): ConvertedConstraints {
  return {
    span,
    standard: toStandardGrid(span),
    infographic: toInfographicGrid(span),
    diagram: toPixelBox(span, scale),
  };
}
