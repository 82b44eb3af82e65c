/**
 * Sync Error Taxonomy
 * Layer: Shared
 *
 * Each error records the scope it is fatal to, and a `context` with the
 * window bounds, table name or record id needed to re-run just that piece.
 *
 *   AuthError              run      401/403 from the source API
 *   InvalidRangeError      run      planning rejected the requested dates
 *   TransientExtractError  retried  network, timeout, 429, 5xx
 *   SourceRequestError     window   any other non-2xx from the source API
 *   WindowExtractFailure   window   retries exhausted while extracting
 *   RecordTransformError   record   skipped and counted, never thrown
 *   SchemaMismatchError    table    declared schema and sink disagree
 *   LoadBatchError         batch    one sink write failed
 *   WindowLoadFailure      window   a batch failed after its retry
 */
import { AppError } from './AppError';

export type ErrorContext = Record<string, string | number | boolean | null | undefined>;

export class SyncError extends AppError {
  constructor(
    message: string,
    public readonly context: ErrorContext = {},
    statusCode = 500,
    cause?: unknown,
  ) {
    super(message, statusCode);
    if (cause !== undefined) this.cause = cause;
  }
}

export class AuthError extends SyncError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 502);
  }
}

export class InvalidRangeError extends SyncError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 400);
  }
}

export class TransientExtractError extends SyncError {
  constructor(
    message: string,
    context: ErrorContext = {},
    public readonly retryDelayMs?: number,
  ) {
    super(message, context, 503);
  }
}

export class SourceRequestError extends SyncError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 502);
  }
}

export class WindowExtractFailure extends SyncError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, context, 502, cause);
  }
}

export type RecordErrorReason = 'invalid_field' | 'missing_key' | 'unresolved_fk';

export class RecordTransformError extends SyncError {
  constructor(
    message: string,
    public readonly table: string,
    public readonly reason: RecordErrorReason,
    context: ErrorContext = {},
  ) {
    super(message, { table, reason, ...context }, 422);
  }
}

export class SchemaMismatchError extends SyncError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 500);
  }
}

export class LoadBatchError extends SyncError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, context, 500, cause);
  }
}

export class WindowLoadFailure extends SyncError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, context, 500, cause);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
