/**
 * Ledger abort codes.
 *
 * Every failure inside a ledger operation is a synchronous abort: the host
 * discards the transaction's working state and rethrows the error to the caller.
 */

// ---------------------------------------------------------------------------
// Codes and categories
// ---------------------------------------------------------------------------

export type LedgerErrorCategory =
  | 'not-found'
  | 'already-exists'
  | 'limit-exceeded'
  | 'authorization'
  | 'value-integrity'
  | 'validation'

export const LEDGER_ERROR_CATEGORIES = {
  RegistryNotPublished: 'not-found',
  StoreNotPublished: 'not-found',
  CollectionNotPublished: 'not-found',
  TokenNotPublished: 'not-found',
  BalanceNotPublished: 'not-found',
  AlreadyHasBalance: 'already-exists',
  CollectionAlreadyExists: 'already-exists',
  TokenAlreadyExists: 'already-exists',
  ResourceAlreadyPublished: 'already-exists',
  CollectionLimitExceeded: 'limit-exceeded',
  MintLimitExceeded: 'limit-exceeded',
  NoMintCapability: 'authorization',
  NoBurnCapability: 'authorization',
  InvalidMerge: 'value-integrity',
  SplitAmountExceedsBalance: 'value-integrity',
  ConsumedValue: 'value-integrity',
  DanglingValue: 'value-integrity',
  InvalidArgument: 'validation'
} as const satisfies Record<string, LedgerErrorCategory>

export type LedgerErrorCode = keyof typeof LEDGER_ERROR_CATEGORIES

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class LedgerError extends Error {
  readonly code: LedgerErrorCode
  readonly category: LedgerErrorCategory

  constructor(code: LedgerErrorCode, message?: string) {
    super(message === undefined ? code : `${code}: ${message}`)
    this.name = 'LedgerError'
    this.code = code
    this.category = LEDGER_ERROR_CATEGORIES[code]
  }
}

/**
 * Unsigned arithmetic trap. Raised for withdraw underflow and for balances or
 * supplies that would leave the safe integer range. Carries no ledger code.
 */
export class ArithmeticTrap extends Error {
  readonly kind: 'underflow' | 'overflow'

  constructor(kind: 'underflow' | 'overflow', message: string) {
    super(message)
    this.name = 'ArithmeticTrap'
    this.kind = kind
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  if (!(error instanceof LedgerError)) return false
  return code === undefined || error.code === code
}

/**
 * Short description of an abort for logs.
 */
export function describeAbort(error: unknown): string {
  if (error instanceof LedgerError) return `${error.code} (${error.category})`
  if (error instanceof ArithmeticTrap) return `arithmetic ${error.kind}`
  return error instanceof Error ? error.message : 'Unknown error'
}
