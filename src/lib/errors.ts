// Error taxonomy for the acquisition pipeline and the query layer
import type { NppErrorKind } from '../types';

export abstract class NppError extends Error {
  abstract readonly kind: NppErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown variant code. A usage error, never retried. */
export class InvalidVariantError extends NppError {
  readonly kind = 'invalid_variant';

  constructor(readonly variant: string) {
    super(`invalid variant name: ${variant}`);
  }
}

/** Malformed query arguments (geography, ranges, grouping fields). */
export class InvalidQueryError extends NppError {
  readonly kind = 'invalid_query';
}

export class FetchError extends NppError {
  readonly kind = 'fetch';

  constructor(readonly url: string, options?: { cause?: unknown }) {
    super(`failed to fetch ${url}: ${describeCause(options?.cause)}`, options);
  }
}

/** The archive is unreadable or lacks the expected document. */
export class ExtractError extends NppError {
  readonly kind = 'extract';
}

/** Worksheet absent, or its rows do not fit the expected layout. */
export class ParseError extends NppError {
  readonly kind = 'parse';
}

export function isNppError(error: unknown): error is NppError {
  return error instanceof NppError;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
