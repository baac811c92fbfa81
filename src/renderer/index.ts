/**
 * Renderer module
 *
 * Turns layout plans into PNG images and PDF documents.
 */

export { ImageRenderer, CanvasTextMeasurer } from './image-renderer.js';
export type { ImageRendererOptions } from './image-renderer.js';
export { PdfRenderer, PdfFontMeasurer, toEncodableText } from './pdf-renderer.js';
export type { PdfRendererOptions } from './pdf-renderer.js';
export { RenderProgress } from './progress.js';
export { parseHexColor } from './colors.js';
export { EXPORT_TARGETS, isExportTarget } from './types.js';
export type {
  Artifact,
  ExportTarget,
  ExportTargetInfo,
  ImageArtifact,
  PdfArtifact,
  PdfMetadata,
  ProgressCallback,
  RendererOptions,
  TableRenderer,
} from './types.js';
