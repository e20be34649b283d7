/**
 * Chain Errors
 *
 * Every failure in the engine is a ChainError carrying one of a fixed set of
 * kinds, so callers can branch on `kind` instead of parsing messages.
 */

export type ChainErrorKind =
  | 'InvalidArgument'
  | 'InvalidConfiguration'
  | 'EmptyChain'
  | 'InsufficientLength'
  | 'DuplicateWindow';

export class ChainError extends Error {
  readonly kind: ChainErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ChainErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ChainError';
    this.kind = kind;
    this.details = details;
  }
}

/**
 * Check whether a value is a ChainError, optionally of a given kind
 */
export function isChainError(value: unknown, kind?: ChainErrorKind): value is ChainError {
  if (!(value instanceof ChainError)) return false;
  return kind === undefined || value.kind === kind;
}

/**
 * Assert a count is a non-negative integer that arithmetic can represent exactly
 */
export function assertCount(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ChainError('InvalidArgument', `${label} must be a non-negative safe integer, got ${value}`, {
      [label]: value,
    });
  }
}

/**
 * Assert a half-open range has integer bounds with 0 <= begin <= end
 */
export function assertRange(begin: number, end: number, label: string): void {
  assertCount(begin, `${label}.begin`);
  assertCount(end, `${label}.end`);
  if (begin > end) {
    throw new ChainError('InvalidArgument', `${label} is reversed: [${begin}, ${end})`, {
      begin,
      end,
    });
  }
}
