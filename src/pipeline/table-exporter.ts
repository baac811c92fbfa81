/**
 * Table Exporter
 *
 * Owns a parsed table and turns it into PNG or PDF artifacts.
 *
 * ```ts
 * const exporter = TableExporter.fromString('a,b,c\n1,2,3\n4,5,6');
 * exporter.state.onProgress((p) => console.log(p));
 * await exporter.generate({ target: 'pdf' });
 * await exporter.write('/tmp/table.pdf');
 * ```
 *
 * Only one generation may run at a time per instance; a second call while
 * one is in flight fails with GenerationInProgressError instead of queuing.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import {
  ConfigurationError,
  EmptyDataError,
  GenerationInProgressError,
  RenderError,
  StorageError,
  TablesmithError,
  UnsupportedExportTargetError,
} from '../errors/index.js';
import { LayoutEngine } from '../layout/layout-engine.js';
import { ImageRenderer } from '../renderer/image-renderer.js';
import { PdfRenderer } from '../renderer/pdf-renderer.js';
import type {
  Artifact,
  ExportTarget,
  ImageArtifact,
  PdfArtifact,
  PdfMetadata,
  ProgressCallback,
  TableRenderer,
} from '../renderer/types.js';
import { loadTextFromFile, loadTextFromUrl } from '../source/text-source.js';
import { buildTable } from '../table/table-builder.js';
import type { Column, Row, StyleSeed, Table } from '../table/types.js';
import { GenerationState, type ReadonlyGenerationState } from './generation-state.js';
import { RenderQueue } from './render-queue.js';

export interface RendererSet {
  png: TableRenderer<ImageArtifact>;
  pdf: TableRenderer<PdfArtifact>;
}

export interface TableExporterOptions {
  /** Default: ',' */
  separator?: string;
  /** Original text the table was parsed from, if any. */
  rawText?: string;
  columns?: Column[];
  rows?: Row[];
  /** Default: 'png' */
  exportTarget?: ExportTarget;
  /** Default: 12 */
  fontSize?: number;
  /** Rows per page/strip. Unset puts every row in one unit. */
  maxRowsPerUnit?: number;
  /** PDF author/title. Default: { author: 'Author', title: 'Title' } */
  metadata?: PdfMetadata;
  /** Render queue capacity (default: 4) */
  queueCapacity?: number;
  /** Replace the default renderers, e.g. with differently configured ones. */
  renderers?: Partial<RendererSet>;
}

export interface LoadOptions extends Omit<TableExporterOptions, 'columns' | 'rows' | 'rawText'> {
  maxFieldLength?: number;
  styleSeed?: StyleSeed;
}

export interface GenerateOptions {
  /** Overrides the renderer's font size for this and later runs. */
  fontSize?: number;
  /** Default: the exporter's current export target */
  target?: ExportTarget;
}

export class TableExporter {
  private _separator: string;
  private _columns: Column[];
  private _rows: Row[];
  private _exportTarget: ExportTarget;
  readonly rawText?: string;

  private readonly renderers: RendererSet;
  private readonly queue: RenderQueue;
  private readonly generationState = new GenerationState();
  private readonly latest: { png?: ImageArtifact; pdf?: PdfArtifact } = {};

  constructor(options: TableExporterOptions = {}) {
    this._separator = options.separator ?? ',';
    this._columns = options.columns ?? [];
    this._rows = options.rows ?? [];
    this._exportTarget = options.exportTarget ?? 'png';
    this.rawText = options.rawText;

    const rendererOptions = {
      fontSize: options.fontSize ?? 12,
      maxRowsPerUnit: options.maxRowsPerUnit,
    };
    this.renderers = {
      png: options.renderers?.png ?? new ImageRenderer(rendererOptions),
      pdf: options.renderers?.pdf ?? new PdfRenderer({ ...rendererOptions, metadata: options.metadata }),
    };
    this.queue = new RenderQueue({ capacity: options.queueCapacity });
  }

  // ─── Factories ─────────────────────────────────────────────────────────────

  /** Parse raw delimited text; the first non-empty line becomes the header. */
  static fromString(rawText: string, options: LoadOptions = {}): TableExporter {
    const { maxFieldLength, styleSeed, ...rest } = options;
    const separator = options.separator ?? ',';
    const table = buildTable(rawText, separator, { maxFieldLength, styleSeed });
    return new TableExporter({ ...rest, separator, rawText, columns: table.columns, rows: table.rows });
  }

  static async fromFile(filePath: string, options: LoadOptions = {}): Promise<TableExporter> {
    const { text } = await loadTextFromFile(filePath);
    return TableExporter.fromString(text, options);
  }

  static async fromUrl(url: string, options: LoadOptions = {}): Promise<TableExporter> {
    const { text } = await loadTextFromUrl(url);
    return TableExporter.fromString(text, options);
  }

  // ─── Accessors ─────────────────────────────────────────────────────────────

  get separator(): string {
    return this._separator;
  }

  get columns(): readonly Column[] {
    return this._columns;
  }

  get rows(): readonly Row[] {
    return this._rows;
  }

  get table(): Table {
    return { separator: this._separator, columns: [...this._columns], rows: [...this._rows] };
  }

  /** Target used by `write`; set by the last successful `generate`. */
  get exportTarget(): ExportTarget {
    return this._exportTarget;
  }

  get state(): ReadonlyGenerationState {
    return this.generationState;
  }

  /** Latest artifact generated for `target`, if any. */
  latestOutput(target: ExportTarget = this._exportTarget): Artifact | undefined {
    return this.latest[target];
  }

  /** Replace every row. Call only while no generation is running. */
  updateRows(rows: Row[]): void {
    this._rows = rows;
  }

  /** Replace every column. Call only while no generation is running. */
  updateColumns(columns: Column[]): void {
    this._columns = columns;
  }

  // ─── Generation ────────────────────────────────────────────────────────────

  async generate(options: GenerateOptions = {}): Promise<Artifact> {
    if (this.generationState.isLoading) {
      throw new GenerationInProgressError();
    }

    // Progress from this run is dropped once the call has settled.
    let settled = false;
    const state = this.generationState;
    const onProgress: ProgressCallback = (fraction) => {
      if (!settled) state.report(fraction);
    };

    const target = options.target ?? this._exportTarget;
    try {
      // Inside the try: a throwing subscriber must still reach finish().
      state.begin();
      const { fontSize } = options;
      if (fontSize !== undefined && (!Number.isFinite(fontSize) || fontSize <= 0)) {
        throw new ConfigurationError(`fontSize must be a positive number, got: ${fontSize}`);
      }
      if (this._columns.length === 0 || this._rows.length === 0) {
        throw new EmptyDataError(undefined, {
          columns: this._columns.length,
          rows: this._rows.length,
        });
      }

      const artifact = await this.renderWith(target, options.fontSize, onProgress);
      this._exportTarget = target;
      return artifact;
    } catch (err) {
      if (err instanceof TablesmithError) throw err;
      throw new RenderError(`Failed to render ${target} table`, err, { target });
    } finally {
      settled = true;
      state.finish();
    }
  }

  /**
   * Resolve the renderer once, then run layout + render on the queue.
   * The job closes over snapshots of the table, never over `this`.
   */
  private async renderWith(
    target: ExportTarget,
    fontSize: number | undefined,
    onProgress: ProgressCallback
  ): Promise<Artifact> {
    const table: Table = {
      separator: this._separator,
      columns: this._columns.map((column) => ({ ...column })),
      rows: this._rows.map((row) => ({ index: row.index, values: [...row.values] })),
    };

    switch (target) {
      case 'png': {
        const artifact = await this.enqueueRender(this.renderers.png, table, fontSize, onProgress);
        this.latest.png = artifact;
        return artifact;
      }
      case 'pdf': {
        const artifact = await this.enqueueRender(this.renderers.pdf, table, fontSize, onProgress);
        this.latest.pdf = artifact;
        return artifact;
      }
      default: {
        const unknown: never = target;
        throw new UnsupportedExportTargetError(String(unknown));
      }
    }
  }

  private enqueueRender<A extends Artifact>(
    renderer: TableRenderer<A>,
    table: Table,
    fontSize: number | undefined,
    onProgress: ProgressCallback
  ): Promise<A> {
    if (fontSize !== undefined) renderer.setFontSize(fontSize);
    return this.queue.enqueue(async () => {
      const engine = new LayoutEngine(await renderer.createMeasurer());
      const styles = table.columns.map((column) => column.style);
      const plan = engine.layout(table, styles, renderer.fontSize, renderer.maxRowsPerUnit);
      return renderer.render(plan, onProgress);
    });
  }

  // ─── Persistence ───────────────────────────────────────────────────────────

  /**
   * Write the latest artifact for the current export target to `destination`,
   * creating parent directories as needed and overwriting an existing file.
   *
   * Returns the written bytes, or undefined when nothing has been generated
   * for the current target yet.
   */
  async write(destination: string): Promise<Buffer | undefined> {
    const artifact = this.latest[this._exportTarget];
    if (!artifact) return undefined;

    const data = await serializeArtifact(artifact);
    try {
      await mkdir(dirname(destination), { recursive: true });
      await writeFile(destination, data);
    } catch (err) {
      throw new StorageError(
        `Failed to write ${destination}: ${err instanceof Error ? err.message : String(err)}`,
        { destination, target: artifact.target },
        { cause: err }
      );
    }
    return data;
  }
}

/** Encoded bytes of an artifact: the PNG as-is, or the saved PDF. */
export async function serializeArtifact(artifact: Artifact): Promise<Buffer> {
  switch (artifact.target) {
    case 'png':
      return artifact.png;
    case 'pdf':
      return Buffer.from(await artifact.document.save());
  }
}
