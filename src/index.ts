/**
 * Tablesmith - render delimited text tables to PNG images and PDF documents
 *
 * Main entry point for the library.
 */

// Table model: parsing and column styles
export * from './table/index.js';

// Layout: column widths, row heights, pagination
export * from './layout/index.js';

// Renderers: PNG (@napi-rs/canvas) and PDF (pdf-lib)
export * from './renderer/index.js';

// Export pipeline: single-flight generation, progress, persistence
export * from './pipeline/index.js';

// Text sources: local files and HTTP(S)
export * from './source/index.js';

// Errors
export * from './errors/index.js';

// Config
export * from './config/index.js';

// CLI utilities
export { ProgressReporter } from './cli/progress.js';

/**
 * Library version
 */
export const VERSION = '0.1.0';
