/**
 * Tablesmith Error Handler
 *
 * Converts thrown values to user-facing messages, determines retryability,
 * and wraps async functions with structured error handling.
 */

import {
  TablesmithError,
  EmptyDataError,
  GenerationInProgressError,
  SourceAccessError,
  RenderError,
  NothingToPersistError,
} from './tablesmith-error.js';

export class ErrorHandler {
  /**
   * Convert any thrown value to a friendly user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof EmptyDataError) {
      return 'The table is empty. Provide a header line and at least one data line.';
    }
    if (err instanceof GenerationInProgressError) {
      return 'A table is already being generated. Retry once it has finished.';
    }
    if (err instanceof SourceAccessError) {
      return err.reason === 'undecodable'
        ? `Could not decode ${err.source} as UTF-8, UTF-16, UTF-32 or ASCII.`
        : `Could not read ${err.source}.`;
    }
    if (err instanceof NothingToPersistError) {
      return 'Nothing to write yet. Generate a table first.';
    }
    if (err instanceof RenderError) {
      const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
      return `${err.message}${cause}`;
    }
    if (err instanceof TablesmithError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Returns true if retrying the same call later may succeed.
   */
  static isRetryable(err: unknown): boolean {
    return err instanceof GenerationInProgressError;
  }

  /**
   * Wrap an async function with structured error handling.
   * Never throws; failures are returned as { error }.
   */
  static async wrap<T>(
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<{ data?: T; error?: TablesmithError }> {
    try {
      const data = await fn();
      return { data };
    } catch (err) {
      if (err instanceof TablesmithError) {
        return { error: err };
      }
      const wrapped = new TablesmithError(
        err instanceof Error ? err.message : String(err),
        'UNKNOWN_ERROR',
        context,
        { cause: err }
      );
      return { error: wrapped };
    }
  }
}
