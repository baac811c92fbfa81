/**
 * Image Renderer
 *
 * Draws every unit of a layout plan onto one canvas, stacked vertically,
 * and encodes the result as PNG using @napi-rs/canvas.
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';
import type { CellBox, LayoutPlan, LayoutUnit, TextMeasurer, TextMetrics } from '../layout/types.js';
import { RenderProgress } from './progress.js';
import type { ImageArtifact, ProgressCallback, RendererOptions, TableRenderer } from './types.js';

const DEFAULT_FONT_FAMILY = 'sans-serif';
// Line box height relative to the font size
const LINE_HEIGHT_RATIO = 1.2;

function cssFont(fontSize: number, fontFamily: string): string {
  return `${fontSize}px ${fontFamily}`;
}

// ─── CanvasTextMeasurer ───────────────────────────────────────────────────────

export class CanvasTextMeasurer implements TextMeasurer {
  private ctx?: SKRSContext2D;

  constructor(private readonly fontFamily: string = DEFAULT_FONT_FAMILY) {}

  measure(text: string, fontSize: number): TextMetrics {
    if (!this.ctx) {
      this.ctx = createCanvas(1, 1).getContext('2d');
    }
    this.ctx.font = cssFont(fontSize, this.fontFamily);
    return {
      width: this.ctx.measureText(text).width,
      height: fontSize * LINE_HEIGHT_RATIO,
    };
  }
}

// ─── ImageRenderer ────────────────────────────────────────────────────────────

export interface ImageRendererOptions extends RendererOptions {
  /** CSS font family. Default: 'sans-serif' */
  fontFamily?: string;
}

export class ImageRenderer implements TableRenderer<ImageArtifact> {
  readonly target = 'png' as const;
  private options: Required<Omit<ImageRendererOptions, 'maxRowsPerUnit'>> & { maxRowsPerUnit?: number };

  constructor(options: ImageRendererOptions = {}) {
    this.options = {
      fontSize: options.fontSize ?? 12,
      maxRowsPerUnit: options.maxRowsPerUnit,
      backgroundColor: options.backgroundColor ?? '#ffffff',
      gridColor: options.gridColor ?? '#9ca3af',
      fontFamily: options.fontFamily ?? DEFAULT_FONT_FAMILY,
    };
  }

  get fontSize(): number {
    return this.options.fontSize;
  }

  get maxRowsPerUnit(): number | undefined {
    return this.options.maxRowsPerUnit;
  }

  setFontSize(fontSize: number): void {
    this.options.fontSize = fontSize;
  }

  async createMeasurer(): Promise<TextMeasurer> {
    return new CanvasTextMeasurer(this.options.fontFamily);
  }

  async render(plan: LayoutPlan, onProgress: ProgressCallback): Promise<ImageArtifact> {
    const width = Math.ceil(plan.width);
    const height = Math.ceil(plan.height);
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');
    const progress = new RenderProgress(plan, onProgress);

    ctx.fillStyle = this.options.backgroundColor;
    ctx.fillRect(0, 0, width, height);
    ctx.font = cssFont(plan.fontSize, this.options.fontFamily);
    ctx.textBaseline = 'middle';
    ctx.lineWidth = 1;

    let offsetY = 0;
    for (const unit of plan.units) {
      this._renderUnit(ctx, plan, unit, offsetY, progress);
      offsetY += unit.height;
      progress.unitDone();
      await yieldToEventLoop();
    }

    return {
      target: 'png',
      png: canvas.toBuffer('image/png'),
      width,
      height,
      unitCount: plan.units.length,
    };
  }

  // ─── Private helpers ────────────────────────────────────────────────────────

  private _renderUnit(
    ctx: SKRSContext2D,
    plan: LayoutPlan,
    unit: LayoutUnit,
    offsetY: number,
    progress: RenderProgress
  ): void {
    for (const cell of unit.header) {
      const style = plan.columns[cell.column].style;
      this._renderCell(ctx, cell, offsetY, style.border, style.text);
    }
    for (const row of unit.rows) {
      for (const cell of row.cells) {
        const style = plan.columns[cell.column].style;
        this._renderCell(ctx, cell, offsetY, style.background, style.text);
      }
      progress.rowDone();
    }
  }

  private _renderCell(
    ctx: SKRSContext2D,
    cell: CellBox,
    offsetY: number,
    background: string,
    textColor: string
  ): void {
    const y = cell.y + offsetY;
    ctx.fillStyle = background;
    ctx.fillRect(cell.x, y, cell.width, cell.height);
    ctx.strokeStyle = this.options.gridColor;
    ctx.strokeRect(cell.x, y, cell.width, cell.height);
    ctx.fillStyle = textColor;
    ctx.fillText(cell.text, cell.textX, cell.textY + offsetY);
  }
}
