export { buildTable, splitLines, truncateField, ELLIPSIS } from './table-builder.js';
export { assignStyles, createSeededRandom, seedFromNames, STYLE_PALETTE } from './style-assigner.js';
export type { AssignStylesOptions } from './style-assigner.js';
export type { Column, ColumnStyle, Row, Table, StyleSeed, BuildTableOptions } from './types.js';
