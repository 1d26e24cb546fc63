// src/errors.ts
// What: Error taxonomy for the vault.
// How: Every error raised on purpose derives from VaultError and carries a stable code plus the HTTP status
//      the API maps it to. Configuration errors are fatal and never retried.

export enum ErrorCode {
  CONFIGURATION = 'CONFIGURATION',
  WRONG_PASSPHRASE = 'WRONG_PASSPHRASE',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  INDEX_UNAVAILABLE = 'INDEX_UNAVAILABLE',
  STORE_CLOSED = 'STORE_CLOSED',
  MODEL_NOT_LOADED = 'MODEL_NOT_LOADED',
  NOT_FOUND = 'NOT_FOUND',
  DOCUMENT_EXISTS = 'DOCUMENT_EXISTS',
  VALIDATION = 'VALIDATION',
}

export class VaultError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly status = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.CONFIGURATION, message, 500, options);
  }
}

/** The vault file exists but its key check does not open with the supplied passphrase. */
export class WrongPassphraseError extends VaultError {
  constructor(path: string) {
    super(ErrorCode.WRONG_PASSPHRASE, `Cannot unlock vault at ${path}: wrong passphrase`, 401);
  }
}

export class DimensionMismatchError extends VaultError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context: string,
  ) {
    super(
      ErrorCode.DIMENSION_MISMATCH,
      `Embedding dimension mismatch (${context}): expected ${expected}, got ${actual}. ` +
        'All vectors in a vault must share one dimension; use a new vault when switching embedding models.',
      422,
    );
  }
}

export class IndexUnavailableError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.INDEX_UNAVAILABLE, message, 503, options);
  }
}

export class StoreClosedError extends VaultError {
  constructor() {
    super(ErrorCode.STORE_CLOSED, 'Document store is closed', 503);
  }
}

/** Raised by gateways when no model is configured or the server does not know the model. */
export class ModelNotLoadedError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.MODEL_NOT_LOADED, message, 503, options);
  }
}

export class NotFoundError extends VaultError {
  constructor(entity: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${entity} ${id} not found`, 404);
  }
}

export class DocumentExistsError extends VaultError {
  constructor(id: string) {
    super(ErrorCode.DOCUMENT_EXISTS, `Document ${id} already exists; use replaceDocument`, 409);
  }
}

export class ValidationError extends VaultError {
  constructor(message: string) {
    super(ErrorCode.VALIDATION, message, 400);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
