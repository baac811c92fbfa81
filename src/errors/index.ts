/**
 * Tablesmith Errors
 *
 * Barrel export for typed error hierarchy and error handler.
 */

export {
  TablesmithError,
  EmptyDataError,
  GenerationInProgressError,
  UnsupportedExportTargetError,
  SourceAccessError,
  RenderError,
  NothingToPersistError,
  ConfigurationError,
  StorageError,
} from './tablesmith-error.js';
export type { TablesmithErrorOptions } from './tablesmith-error.js';

export { ErrorHandler } from './error-handler.js';
