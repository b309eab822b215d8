import { ComparisonErrorKind } from '../types/comparison.js';
import { Side } from '../types/index.js';

export abstract class ComparisonError extends Error {
  abstract readonly kind: ComparisonErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SchemaLookupError extends ComparisonError {
  readonly kind = 'SchemaLookupError';

  constructor(
    public readonly table: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class KeyColumnMissingError extends ComparisonError {
  readonly kind = 'KeyColumnMissing';

  constructor(
    public readonly table: string,
    public readonly missing: { side: Side; column: string }[]
  ) {
    super(
      missing.length > 0
        ? `Key columns missing for "${table}": ${missing.map(m => `${m.column} (${m.side})`).join(', ')}`
        : `No key columns declared or discoverable for "${table}"`
    );
  }
}

export class RowExtractionError extends ComparisonError {
  readonly kind = 'RowExtractionError';

  constructor(
    public readonly table: string,
    public readonly offset: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConnectionError extends ComparisonError {
  readonly kind = 'ConnectionError';
}

export class ComparisonCancelledError extends ComparisonError {
  readonly kind = 'Cancelled';

  constructor(public readonly table: string) {
    super(`Comparison of "${table}" was cancelled`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function throwIfCancelled(signal: AbortSignal | undefined, table: string): void {
  if (signal?.aborted) {
    throw new ComparisonCancelledError(table);
  }
}
