/**
 * Argument validation and checked arithmetic for ledger operations
 */

import { LedgerError, ArithmeticTrap } from './errors.js'
import { MAX_TOKEN_AMOUNT, ROYALTY_DENOMINATOR } from './constants.js'
import type { AccountAddress, LedgerLimits } from './types.js'

const ADDRESS_PATTERN = /^0x[0-9a-f]{1,64}$/

/**
 * Normalize an account address to lower-case `0x` hex.
 *
 * @throws LedgerError InvalidArgument if the address is not hex
 */
export function normalizeAddress(address: string): AccountAddress {
  const normalized = address.trim().toLowerCase()
  if (!ADDRESS_PATTERN.test(normalized)) {
    throw new LedgerError('InvalidArgument', `Invalid account address: ${address}`)
  }
  return normalized
}

/**
 * Amounts, maximums and supplies are unsigned safe integers.
 */
export function validateAmount(amount: number, label = 'amount'): void {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new LedgerError('InvalidArgument', `${label} must be a non-negative integer, got ${amount}`)
  }
}

export function validateRoyaltyRate(rate: number): void {
  if (!Number.isInteger(rate) || rate < 0 || rate > ROYALTY_DENOMINATOR) {
    throw new LedgerError('InvalidArgument', `royalty rate must be within 0..${ROYALTY_DENOMINATOR}, got ${rate}`)
  }
}

export function validateName(name: string, limits: LedgerLimits, label = 'name'): void {
  if (name.length === 0) {
    throw new LedgerError('InvalidArgument', `${label} must not be empty`)
  }
  if (name.length > limits.maxNameLength) {
    throw new LedgerError('InvalidArgument', `${label} exceeds ${limits.maxNameLength} characters`)
  }
}

export function validateText(
  value: string,
  field: 'description' | 'uri',
  limits: LedgerLimits
): void {
  const limit = field === 'uri' ? limits.maxUriLength : limits.maxDescriptionLength
  if (value.length > limit) {
    throw new LedgerError('InvalidArgument', `${field} exceeds ${limit} characters`)
  }
}

/**
 * Checked unsigned addition.
 */
export function addAmounts(left: number, right: number): number {
  const sum = left + right
  if (sum > MAX_TOKEN_AMOUNT) {
    throw new ArithmeticTrap('overflow', `${left} + ${right} exceeds ${MAX_TOKEN_AMOUNT}`)
  }
  return sum
}

/**
 * Checked unsigned subtraction.
 */
export function subtractAmounts(left: number, right: number): number {
  if (right > left) {
    throw new ArithmeticTrap('underflow', `${left} - ${right} is negative`)
  }
  return left - right
}
