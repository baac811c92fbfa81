/**
 * Layout types: geometry produced by the LayoutEngine and consumed by renderers.
 *
 * Coordinates are in output units (pixels for PNG, points for PDF) with the
 * origin at the top-left corner of the unit.
 */

import type { ColumnStyle } from '../table/types.js';

export interface TextMetrics {
  width: number;
  height: number;
}

/** Font-metrics provider. Each renderer supplies one for its backend. */
export interface TextMeasurer {
  measure(text: string, fontSize: number): TextMetrics;
}

export interface CellBox {
  column: number;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Left edge of the text run. */
  textX: number;
  /** Vertical centre of the text run. */
  textY: number;
  /** Verbatim cell text; backends escape it as they need. */
  text: string;
}

export interface LayoutRow {
  /** Row.index from the source table. */
  index: number;
  cells: CellBox[];
}

/** A page (PDF) or a vertical strip (PNG). */
export interface LayoutUnit {
  index: number;
  width: number;
  height: number;
  header: CellBox[];
  rows: LayoutRow[];
}

export interface LayoutColumn {
  name: string;
  style: ColumnStyle;
  width: number;
}

export interface LayoutPlan {
  fontSize: number;
  margin: number;
  rowHeight: number;
  columns: LayoutColumn[];
  units: LayoutUnit[];
  /** Width of every unit; all units share the column widths. */
  width: number;
  /** Sum of unit heights. */
  height: number;
  rowCount: number;
}
