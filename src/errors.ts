// Typed ledger failures. Callers branch on `kind` instead of parsing messages.

export type LedgerErrorKind =
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'parse'
  | 'io'
  | 'merge';

export abstract class LedgerError extends Error {
  abstract readonly kind: LedgerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  abstract get context(): Record<string, unknown>;
}

export class ValidationError extends LedgerError {
  readonly kind = 'validation' as const;

  constructor(
    readonly field: string,
    message: string,
    readonly value?: unknown
  ) {
    super(message);
  }

  get context(): Record<string, unknown> {
    return { field: this.field, value: this.value };
  }
}

export class NotFoundError extends LedgerError {
  readonly kind = 'not_found' as const;

  constructor(readonly id: string, message = `Record ${id} not found`) {
    super(message);
  }

  get context(): Record<string, unknown> {
    return { id: this.id };
  }
}

export class ConflictError extends LedgerError {
  readonly kind = 'conflict' as const;

  constructor(
    readonly key: string,
    readonly reason: 'category in use' | 'protected category',
    message: string
  ) {
    super(message);
  }

  get context(): Record<string, unknown> {
    return { key: this.key, reason: this.reason };
  }
}

export class ParseError extends LedgerError {
  readonly kind = 'parse' as const;

  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  get context(): Record<string, unknown> {
    return { path: this.path };
  }
}

export interface IOErrorDetails {
  path: string;
  operation: 'read' | 'write';
  // True when the in-memory mutation was applied and only the save failed
  committed?: boolean;
  recordId?: string;
  cause?: unknown;
}

export class IOError extends LedgerError {
  readonly kind = 'io' as const;
  readonly path: string;
  readonly operation: 'read' | 'write';
  readonly committed: boolean;
  readonly recordId?: string;

  constructor(message: string, details: IOErrorDetails) {
    super(message, { cause: details.cause });
    this.path = details.path;
    this.operation = details.operation;
    this.committed = details.committed ?? false;
    this.recordId = details.recordId;
  }

  // Same failure, flagged as happening after an in-memory mutation
  asCommitted(recordId?: string): IOError {
    return new IOError(this.message, {
      path: this.path,
      operation: this.operation,
      committed: true,
      recordId: recordId ?? this.recordId,
      cause: this.cause
    });
  }

  get context(): Record<string, unknown> {
    const context: Record<string, unknown> = {
      path: this.path,
      operation: this.operation,
      committed: this.committed
    };
    if (this.recordId !== undefined) context.recordId = this.recordId;
    return context;
  }
}

export class MergeError extends LedgerError {
  readonly kind = 'merge' as const;

  constructor(readonly path: string, cause: unknown) {
    super(
      `Could not merge data from ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }

  get context(): Record<string, unknown> {
    return { path: this.path };
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
