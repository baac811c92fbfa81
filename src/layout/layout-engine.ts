/**
 * Layout Engine
 *
 * Sizes columns and rows from measured text and splits rows into units of
 * at most `maxRowsPerUnit`, repeating the header at the top of each unit.
 */

import { ConfigurationError, EmptyDataError } from '../errors/index.js';
import type { ColumnStyle, Row, Table } from '../table/types.js';
import type { CellBox, LayoutColumn, LayoutPlan, LayoutRow, LayoutUnit, TextMeasurer } from './types.js';

// Spacing as multiples of the font size
export const PADDING_X_RATIO = 0.75;
export const PADDING_Y_RATIO = 0.5;
export const MARGIN_RATIO = 1;

/** Split rows into consecutive groups of at most `size`, keeping order. */
export function chunkRows(rows: readonly Row[], size?: number): Row[][] {
  if (size === undefined) return [rows.slice()];
  const groups: Row[][] = [];
  for (let start = 0; start < rows.length; start += size) {
    groups.push(rows.slice(start, start + size));
  }
  return groups;
}

export class LayoutEngine {
  constructor(private readonly measurer: TextMeasurer) {}

  layout(
    table: Table,
    styles: readonly ColumnStyle[],
    fontSize: number,
    maxRowsPerUnit?: number
  ): LayoutPlan {
    const { columns, rows } = table;
    if (columns.length === 0 || rows.length === 0) {
      throw new EmptyDataError(undefined, { columns: columns.length, rows: rows.length });
    }
    if (!Number.isFinite(fontSize) || fontSize <= 0) {
      throw new ConfigurationError(`fontSize must be a positive number, got: ${fontSize}`);
    }
    if (maxRowsPerUnit !== undefined && (!Number.isInteger(maxRowsPerUnit) || maxRowsPerUnit < 1)) {
      throw new ConfigurationError(`maxRowsPerUnit must be a positive integer, got: ${maxRowsPerUnit}`);
    }
    if (styles.length < columns.length) {
      throw new ConfigurationError(
        `Expected ${columns.length} column styles, got ${styles.length}`
      );
    }

    const paddingX = fontSize * PADDING_X_RATIO;
    const paddingY = fontSize * PADDING_Y_RATIO;
    const margin = fontSize * MARGIN_RATIO;

    const cache = new Map<string, { width: number; height: number }>();
    const measure = (text: string) => {
      let metrics = cache.get(text);
      if (!metrics) {
        metrics = this.measurer.measure(text, fontSize);
        cache.set(text, metrics);
      }
      return metrics;
    };

    let lineHeight = fontSize;
    const layoutColumns: LayoutColumn[] = columns.map((column, c) => {
      let widest = 0;
      for (const text of [column.name, ...rows.map((row) => cellText(row, c))]) {
        const metrics = measure(text);
        widest = Math.max(widest, metrics.width);
        lineHeight = Math.max(lineHeight, metrics.height);
      }
      return { name: column.name, style: styles[c], width: widest + paddingX * 2 };
    });

    const rowHeight = lineHeight + paddingY * 2;
    const offsets: number[] = [];
    let tableWidth = 0;
    for (const column of layoutColumns) {
      offsets.push(margin + tableWidth);
      tableWidth += column.width;
    }
    const unitWidth = tableWidth + margin * 2;

    const lineOf = (y: number, texts: string[]): CellBox[] =>
      layoutColumns.map((column, c) => ({
        column: c,
        x: offsets[c],
        y,
        width: column.width,
        height: rowHeight,
        textX: offsets[c] + paddingX,
        textY: y + rowHeight / 2,
        text: texts[c],
      }));

    const headerTexts = layoutColumns.map((column) => column.name);
    const units: LayoutUnit[] = chunkRows(rows, maxRowsPerUnit).map((group, u) => {
      const layoutRows: LayoutRow[] = group.map((row, r) => ({
        index: row.index,
        cells: lineOf(
          margin + rowHeight * (r + 1),
          layoutColumns.map((_, c) => cellText(row, c))
        ),
      }));
      return {
        index: u,
        width: unitWidth,
        height: margin * 2 + rowHeight * (group.length + 1),
        header: lineOf(margin, headerTexts),
        rows: layoutRows,
      };
    });

    return {
      fontSize,
      margin,
      rowHeight,
      columns: layoutColumns,
      units,
      width: unitWidth,
      height: units.reduce((sum, unit) => sum + unit.height, 0),
      rowCount: rows.length,
    };
  }
}

/** Missing values render empty; values past the last column are ignored. */
function cellText(row: Row, column: number): string {
  return row.values[column] ?? '';
}
