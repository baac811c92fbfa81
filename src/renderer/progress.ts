/**
 * Progress accounting shared by both renderers.
 *
 * Multi-unit plans advance once per unit; a single-unit plan advances once
 * per row so that long single images still report intermediate progress.
 * The final call always reports exactly 1.
 */

import type { LayoutPlan } from '../layout/types.js';
import type { ProgressCallback } from './types.js';

export class RenderProgress {
  private completed = 0;
  private readonly total: number;
  private readonly perRow: boolean;

  constructor(plan: LayoutPlan, private readonly onProgress: ProgressCallback) {
    this.perRow = plan.units.length === 1;
    this.total = this.perRow ? plan.units[0].rows.length : plan.units.length;
  }

  rowDone(): void {
    if (this.perRow) this.advance();
  }

  unitDone(): void {
    if (!this.perRow) this.advance();
  }

  private advance(): void {
    this.completed = Math.min(this.total, this.completed + 1);
    this.onProgress(this.completed === this.total ? 1 : this.completed / this.total);
  }
}
