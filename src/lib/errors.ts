/**
 * Error classes shared by the catalog and download code.
 *
 * Lookup and selection errors stop the current selection before any work is
 * done. Record and transfer errors stop a single crawled file or task; callers
 * log them and carry on with the rest of the batch.
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code = 'APP_ERROR', context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
  }
}

/** Unknown product, variable, model, index type or metadata key. */
export class LookupError extends AppError {
  constructor(kind: string, key: string, context?: Record<string, unknown>) {
    super(`Unknown ${kind}: '${key}'`, 'LOOKUP_ERROR', { kind, key, ...context });
  }
}

/** Invalid combination of selection arguments (format, timestep, index). */
export class SelectionError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SELECTION_ERROR', context);
  }
}

/** A file on disk that cannot be turned into a catalog record. */
export class RecordError extends AppError {
  constructor(message: string, filePath: string) {
    super(message, 'RECORD_ERROR', { path: filePath });
  }
}

export class TransferError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TRANSFER_ERROR', context);
  }
}

/** HTTP-level failure talking to the data store API. */
export class ProviderError extends AppError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, 'PROVIDER_ERROR', statusCode === undefined ? undefined : { statusCode });
    this.statusCode = statusCode;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
