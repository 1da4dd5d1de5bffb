/**
 * ValueUnit - the non-duplicable unit of value moved between inventories
 *
 * A unit is created by mint, withdraw or split, and consumed by merge or burn.
 * Callers only ever see the ValueUnit interface: the implementing class is not
 * exported, so outside this package the only ways to obtain a unit are ledger
 * operations, and the only ways to dispose of one are `merge` and burn.
 *
 * A unit created inside a transaction is tracked under that transaction until
 * it is consumed, and the transaction refuses to commit while any tracked unit
 * is still live. Units resting in inventory slots are untracked and cannot be
 * split; value leaves a slot only through withdraw.
 */

import { AssetId } from './AssetId.js'
import { LedgerError } from './errors.js'
import { addAmounts, subtractAmounts, validateAmount } from './utils.js'
import type { AssetIdentity } from './types.js'

export interface ValueUnit {
  readonly identity: AssetIdentity
  /** @throws LedgerError ConsumedValue once the unit was merged or burned */
  readonly amount: number
  readonly isConsumed: boolean
  /**
   * Take `amount` out of this unit into a new unit of the same identity.
   *
   * @throws LedgerError SplitAmountExceedsBalance if amount > this.amount
   * @throws LedgerError DanglingValue if this unit rests in an inventory slot
   */
  split(amount: number): ValueUnit
  /**
   * Add all of `source` into this unit and consume `source`.
   *
   * @throws LedgerError InvalidMerge if the identities differ or source is this unit
   */
  merge(source: ValueUnit): void
}

// Live units per transaction. Keys are the transaction objects themselves.
const inFlight = new WeakMap<object, Set<Unit>>()

class Unit implements ValueUnit {
  private value: number
  private consumed = false

  constructor(readonly identity: AssetIdentity, value: number, private owner?: object) {
    this.value = value
    if (owner !== undefined) {
      let live = inFlight.get(owner)
      if (live === undefined) {
        live = new Set<Unit>()
        inFlight.set(owner, live)
      }
      live.add(this)
    }
  }

  get amount(): number {
    this.assertLive()
    return this.value
  }

  get isConsumed(): boolean {
    return this.consumed
  }

  split(amount: number): ValueUnit {
    this.assertLive()
    validateAmount(amount)
    if (this.owner === undefined) {
      throw new LedgerError('DanglingValue', `held ${AssetId.format(this.identity)} can only leave its slot through withdraw`)
    }
    if (amount > this.value) {
      throw new LedgerError('SplitAmountExceedsBalance', `cannot split ${amount} from ${this.value}`)
    }
    this.value -= amount
    return new Unit(this.identity, amount, this.owner)
  }

  merge(source: ValueUnit): void {
    this.assertLive()
    if (!(source instanceof Unit)) {
      throw new LedgerError('InvalidMerge', 'source is not a ledger value unit')
    }
    source.assertLive()
    if (source === this || !AssetId.equals(this.identity, source.identity)) {
      throw new LedgerError(
        'InvalidMerge',
        `cannot merge ${AssetId.format(source.identity)} into ${AssetId.format(this.identity)}`
      )
    }
    this.value = addAmounts(this.value, source.value)
    source.consume()
  }

  /**
   * Take `amount` out of a slot as a unit tracked under `owner`.
   */
  draw(amount: number, owner: object): Unit {
    this.assertLive()
    validateAmount(amount)
    this.value = subtractAmounts(this.value, amount)
    return new Unit(this.identity, amount, owner)
  }

  consume(): number {
    this.assertLive()
    const amount = this.value
    this.value = 0
    this.consumed = true
    if (this.owner !== undefined) {
      inFlight.get(this.owner)?.delete(this)
      this.owner = undefined
    }
    return amount
  }

  /** Untracked copy for storage snapshots */
  replicate(): Unit {
    this.assertLive()
    return new Unit(this.identity, this.value)
  }

  private assertLive(): void {
    if (this.consumed) {
      throw new LedgerError('ConsumedValue', `unit of ${AssetId.format(this.identity)} was already consumed`)
    }
  }
}

function own(unit: ValueUnit): Unit {
  if (!(unit instanceof Unit)) {
    throw new LedgerError('InvalidArgument', 'not a ledger value unit')
  }
  return unit
}

// ---------------------------------------------------------------------------
// Package-internal operations (not re-exported from the package entry point)
// ---------------------------------------------------------------------------

/** Empty, untracked unit: a fresh inventory slot */
export function zeroUnit(identity: AssetIdentity): ValueUnit {
  return new Unit(identity, 0)
}

/** New value, tracked under `owner`. Only mint calls this. */
export function issueUnit(identity: AssetIdentity, amount: number, owner: object): ValueUnit {
  validateAmount(amount)
  return new Unit(identity, amount, owner)
}

/**
 * @throws ArithmeticTrap if the slot holds less than amount
 */
export function drawUnit(slot: ValueUnit, amount: number, owner: object): ValueUnit {
  return own(slot).draw(amount, owner)
}

/** Destroy a unit and return the amount it carried. Only burn calls this. */
export function consumeUnit(unit: ValueUnit): number {
  return own(unit).consume()
}

export function replicateUnit(unit: ValueUnit): ValueUnit {
  return own(unit).replicate()
}

/**
 * @throws LedgerError DanglingValue if any unit tracked under `owner` is still live
 */
export function sealUnits(owner: object): void {
  const live = Array.from(inFlight.get(owner) ?? [])
  if (live.length > 0) {
    const total = live.reduce((sum, unit) => sum + unit.amount, 0)
    throw new LedgerError(
      'DanglingValue',
      `${live.length} value unit(s) carrying ${total} were neither deposited, merged nor burned`
    )
  }
  inFlight.delete(owner)
}

/**
 * Consume every unit still tracked under `owner` so nothing escapes an aborted
 * operation.
 */
export function discardUnits(owner: object): void {
  for (const unit of Array.from(inFlight.get(owner) ?? [])) {
    unit.consume()
  }
  inFlight.delete(owner)
}

/**
 * Run `fn` for the transaction `owner`: on success every unit it created must
 * have been consumed; on failure the live ones are discarded.
 */
export function runTracked<T>(owner: object, fn: () => T): T {
  try {
    const result = fn()
    sealUnits(owner)
    return result
  } catch (error) {
    discardUnits(owner)
    throw error
  }
}
