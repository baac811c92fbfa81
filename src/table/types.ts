/**
 * Table model shared by the builder, layout engine and renderers.
 */

/** Visual treatment of a column. Colours are `#rrggbb` hex strings. */
export interface ColumnStyle {
  name: string;
  background: string;
  text: string;
  border: string;
}

export interface Column {
  name: string;
  style: ColumnStyle;
}

export interface Row {
  /** 1-based line position in the source; the header is line 0. */
  index: number;
  values: string[];
}

export interface Table {
  separator: string;
  columns: Column[];
  rows: Row[];
}

/** Seed for style assignment: a fixed number, or `'random'` for an unseeded draw. */
export type StyleSeed = number | 'random';

export interface BuildTableOptions {
  /** Data fields longer than this many characters are cut and suffixed with `...` */
  maxFieldLength?: number;
  /** Defaults to a seed derived from the column names. */
  styleSeed?: StyleSeed;
}
