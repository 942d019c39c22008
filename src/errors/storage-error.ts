export type StorageErrorKind = 'not_found' | 'already_exists' | 'transaction' | 'backend';

/**
 * Error raised at the storage boundary. Backend specific failures are
 * wrapped with kind 'backend'.
 */
export class StorageError extends Error {
  public readonly kind: StorageErrorKind;

  constructor(message: string, options?: { kind?: StorageErrorKind; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'StorageError';
    this.kind = options?.kind ?? 'backend';

    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends StorageError {
  constructor(entity: string, id: string) {
    super(`${entity} "${id}": not found`, { kind: 'not_found' });
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends StorageError {
  constructor(entity: string, id: string, cause?: unknown) {
    super(`${entity} "${id}": already exists`, { kind: 'already_exists', cause });
    this.name = 'AlreadyExistsError';
  }
}

/**
 * Rolling back a failed transaction failed too. The message keeps the
 * original error; the rollback failure is the cause.
 */
export class TransactionError extends StorageError {
  public readonly original: unknown;

  constructor(operation: string, original: unknown, rollbackError: unknown) {
    super(`${operation}: rollback failed after: ${describe(original)}`, {
      kind: 'transaction',
      cause: rollbackError,
    });
    this.name = 'TransactionError';
    this.original = original;
  }
}

export function isNotFound(err: unknown): err is NotFoundError {
  return err instanceof StorageError && err.kind === 'not_found';
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
