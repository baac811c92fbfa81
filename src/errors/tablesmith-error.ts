/**
 * Tablesmith Typed Error Hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 */

export interface TablesmithErrorOptions {
  cause?: unknown;
}

export class TablesmithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: TablesmithErrorOptions
  ) {
    super(message, options);
    this.name = 'TablesmithError';
    // Keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The table has no columns or no rows at generation time. */
export class EmptyDataError extends TablesmithError {
  constructor(message = 'Table has no columns or no rows', context?: Record<string, unknown>) {
    super(message, 'EMPTY_DATA', context);
    this.name = 'EmptyDataError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class GenerationInProgressError extends TablesmithError {
  constructor(message = 'Generation already in progress', context?: Record<string, unknown>) {
    super(message, 'GENERATION_IN_PROGRESS', context);
    this.name = 'GenerationInProgressError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedExportTargetError extends TablesmithError {
  constructor(public readonly target: string) {
    super(`Unsupported export target: ${target}`, 'UNSUPPORTED_EXPORT_TARGET', { target });
    this.name = 'UnsupportedExportTargetError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A source could not be read (`unreadable`) or none of the supported
 * encodings could decode its bytes (`undecodable`).
 */
export class SourceAccessError extends TablesmithError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly reason: 'unreadable' | 'undecodable',
    public readonly data?: Uint8Array,
    options?: TablesmithErrorOptions
  ) {
    super(message, 'SOURCE_ACCESS', { source, reason, byteLength: data?.byteLength }, options);
    this.name = 'SourceAccessError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RenderError extends TablesmithError {
  constructor(message: string, cause: unknown, context?: Record<string, unknown>) {
    super(message, 'RENDER_ERROR', context, { cause });
    this.name = 'RenderError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NothingToPersistError extends TablesmithError {
  constructor(message = 'Nothing has been generated for the current export target', context?: Record<string, unknown>) {
    super(message, 'NOTHING_TO_PERSIST', context);
    this.name = 'NothingToPersistError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends TablesmithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StorageError extends TablesmithError {
  constructor(message: string, context?: Record<string, unknown>, options?: TablesmithErrorOptions) {
    super(message, 'STORAGE_ERROR', context, options);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
