export { LayoutEngine, chunkRows, PADDING_X_RATIO, PADDING_Y_RATIO, MARGIN_RATIO } from './layout-engine.js';
export type {
  CellBox,
  LayoutColumn,
  LayoutPlan,
  LayoutRow,
  LayoutUnit,
  TextMeasurer,
  TextMetrics,
} from './types.js';
