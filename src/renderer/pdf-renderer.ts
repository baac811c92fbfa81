/**
 * PDF Renderer
 *
 * Emits one page per layout unit with pdf-lib. Page sizes follow the unit
 * geometry (points), so a unit of N rows gives a page exactly tall enough
 * for its header plus N rows.
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage, type Color } from 'pdf-lib';
import type { CellBox, LayoutPlan, LayoutUnit, TextMeasurer, TextMetrics } from '../layout/types.js';
import { parseHexColor } from './colors.js';
import { RenderProgress } from './progress.js';
import type { PdfArtifact, PdfMetadata, ProgressCallback, RendererOptions, TableRenderer } from './types.js';

// Distance from the vertical centre of a line down to its baseline
const BASELINE_OFFSET_RATIO = 0.35;
const REPLACEMENT_CHAR = '?';

function toPdfColor(hex: string): Color {
  const { r, g, b } = parseHexColor(hex);
  return rgb(r / 255, g / 255, b / 255);
}

/**
 * Replace characters the font cannot encode. Standard PDF fonts only cover
 * WinAnsi, and pdf-lib throws on anything outside it.
 */
export function toEncodableText(text: string, charset: ReadonlySet<number>): string {
  let out = '';
  for (const ch of text) {
    const code = ch.codePointAt(0);
    out += code !== undefined && charset.has(code) ? ch : REPLACEMENT_CHAR;
  }
  return out;
}

// ─── PdfFontMeasurer ──────────────────────────────────────────────────────────

export class PdfFontMeasurer implements TextMeasurer {
  private readonly charset: ReadonlySet<number>;

  constructor(private readonly font: PDFFont) {
    this.charset = new Set(font.getCharacterSet());
  }

  /** Embed a standard font into a scratch document to read its metrics. */
  static async create(fontName: StandardFonts = StandardFonts.Helvetica): Promise<PdfFontMeasurer> {
    const scratch = await PDFDocument.create();
    return new PdfFontMeasurer(await scratch.embedFont(fontName));
  }

  measure(text: string, fontSize: number): TextMetrics {
    return {
      width: this.font.widthOfTextAtSize(toEncodableText(text, this.charset), fontSize),
      height: this.font.heightAtSize(fontSize),
    };
  }
}

// ─── PdfRenderer ──────────────────────────────────────────────────────────────

export interface PdfRendererOptions extends RendererOptions {
  /** Default: Helvetica */
  font?: StandardFonts;
  /** Default: { author: 'Author', title: 'Title' } */
  metadata?: PdfMetadata;
}

interface DrawContext {
  page: PDFPage;
  font: PDFFont;
  charset: ReadonlySet<number>;
  fontSize: number;
  unitHeight: number;
}

export class PdfRenderer implements TableRenderer<PdfArtifact> {
  readonly target = 'pdf' as const;
  private options: Required<Omit<PdfRendererOptions, 'maxRowsPerUnit'>> & { maxRowsPerUnit?: number };

  constructor(options: PdfRendererOptions = {}) {
    this.options = {
      fontSize: options.fontSize ?? 12,
      maxRowsPerUnit: options.maxRowsPerUnit,
      backgroundColor: options.backgroundColor ?? '#ffffff',
      gridColor: options.gridColor ?? '#9ca3af',
      font: options.font ?? StandardFonts.Helvetica,
      metadata: options.metadata ?? { author: 'Author', title: 'Title' },
    };
  }

  get fontSize(): number {
    return this.options.fontSize;
  }

  get maxRowsPerUnit(): number | undefined {
    return this.options.maxRowsPerUnit;
  }

  get metadata(): PdfMetadata {
    return { ...this.options.metadata };
  }

  setFontSize(fontSize: number): void {
    this.options.fontSize = fontSize;
  }

  setMetadata(metadata: PdfMetadata): void {
    this.options.metadata = { ...metadata };
  }

  createMeasurer(): Promise<TextMeasurer> {
    return PdfFontMeasurer.create(this.options.font);
  }

  async render(plan: LayoutPlan, onProgress: ProgressCallback): Promise<PdfArtifact> {
    const document = await PDFDocument.create();
    document.setAuthor(this.options.metadata.author);
    document.setTitle(this.options.metadata.title);
    document.setCreator('tablesmith');

    const font = await document.embedFont(this.options.font);
    const charset: ReadonlySet<number> = new Set(font.getCharacterSet());
    const progress = new RenderProgress(plan, onProgress);

    for (const unit of plan.units) {
      const page = document.addPage([unit.width, unit.height]);
      page.drawRectangle({
        x: 0,
        y: 0,
        width: unit.width,
        height: unit.height,
        color: toPdfColor(this.options.backgroundColor),
      });
      this._renderUnit(
        { page, font, charset, fontSize: plan.fontSize, unitHeight: unit.height },
        plan,
        unit,
        progress
      );
      progress.unitDone();
      await yieldToEventLoop();
    }

    return {
      target: 'pdf',
      document,
      pageCount: document.getPageCount(),
      width: plan.width,
      height: plan.height,
    };
  }

  // ─── Private helpers ────────────────────────────────────────────────────────

  private _renderUnit(
    draw: DrawContext,
    plan: LayoutPlan,
    unit: LayoutUnit,
    progress: RenderProgress
  ): void {
    for (const cell of unit.header) {
      const style = plan.columns[cell.column].style;
      this._renderCell(draw, cell, style.border, style.text);
    }
    for (const row of unit.rows) {
      for (const cell of row.cells) {
        const style = plan.columns[cell.column].style;
        this._renderCell(draw, cell, style.background, style.text);
      }
      progress.rowDone();
    }
  }

  /** PDF space has its origin bottom-left, so every y is flipped. */
  private _renderCell(draw: DrawContext, cell: CellBox, background: string, textColor: string): void {
    draw.page.drawRectangle({
      x: cell.x,
      y: draw.unitHeight - cell.y - cell.height,
      width: cell.width,
      height: cell.height,
      color: toPdfColor(background),
      borderColor: toPdfColor(this.options.gridColor),
      borderWidth: 0.5,
    });
    const text = toEncodableText(cell.text, draw.charset);
    if (text.length === 0) return;
    draw.page.drawText(text, {
      x: cell.textX,
      y: draw.unitHeight - cell.textY - draw.fontSize * BASELINE_OFFSET_RATIO,
      size: draw.fontSize,
      font: draw.font,
      color: toPdfColor(textColor),
    });
  }
}
