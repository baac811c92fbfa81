/**
 * Renderer types: export targets, artifacts and the renderer contract.
 */

import type { PDFDocument } from 'pdf-lib';
import type { LayoutPlan, TextMeasurer } from '../layout/types.js';

export type ExportTarget = 'png' | 'pdf';

export interface ExportTargetInfo {
  fileExtension: string;
  mimeType: string;
}

export const EXPORT_TARGETS: Readonly<Record<ExportTarget, ExportTargetInfo>> = {
  png: { fileExtension: 'png', mimeType: 'image/png' },
  pdf: { fileExtension: 'pdf', mimeType: 'application/pdf' },
};

export function isExportTarget(value: string): value is ExportTarget {
  return Object.prototype.hasOwnProperty.call(EXPORT_TARGETS, value);
}

export interface ImageArtifact {
  target: 'png';
  png: Buffer;
  width: number;
  height: number;
  unitCount: number;
}

export interface PdfArtifact {
  target: 'pdf';
  document: PDFDocument;
  pageCount: number;
  width: number;
  height: number;
}

export type Artifact = ImageArtifact | PdfArtifact;

/** Receives the completed fraction, in [0, 1]. */
export type ProgressCallback = (fraction: number) => void;

export interface PdfMetadata {
  author: string;
  title: string;
}

export interface TableRenderer<A extends Artifact = Artifact> {
  readonly target: A['target'];
  readonly fontSize: number;
  readonly maxRowsPerUnit?: number;
  setFontSize(fontSize: number): void;
  /** Font metrics matching what `render` will draw with. */
  createMeasurer(): Promise<TextMeasurer>;
  render(plan: LayoutPlan, onProgress: ProgressCallback): Promise<A>;
}

export interface RendererOptions {
  /** Default: 12 */
  fontSize?: number;
  /** Rows per page/strip. Unset puts every row in one unit. */
  maxRowsPerUnit?: number;
  /** Page / canvas background. Default: '#ffffff' */
  backgroundColor?: string;
  /** Grid line colour. Default: '#9ca3af' */
  gridColor?: string;
}
