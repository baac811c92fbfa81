export { TableExporter, serializeArtifact } from './table-exporter.js';
export type { GenerateOptions, LoadOptions, RendererSet, TableExporterOptions } from './table-exporter.js';
export { GenerationState } from './generation-state.js';
export type { ReadonlyGenerationState, Unsubscribe } from './generation-state.js';
export { RenderQueue } from './render-queue.js';
export type { RenderQueueOptions } from './render-queue.js';
