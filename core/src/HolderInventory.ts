/**
 * HolderInventory - per-account balances and the operations that move value
 * between them.
 */

import { AssetId } from './AssetId.js'
import { EventHandle } from './EventHandle.js'
import { LedgerError } from './errors.js'
import { Table } from './Table.js'
import { drawUnit, replicateUnit, zeroUnit } from './ValueUnit.js'
import type { ValueUnit } from './ValueUnit.js'
import { normalizeAddress, validateAmount } from './utils.js'
import type { LedgerTransaction } from './host.js'
import type {
  AccountAddress,
  AssetIdentity,
  BalanceEntry,
  DepositedEvent,
  WithdrawnEvent
} from './types.js'

// ---------------------------------------------------------------------------
// Resource
// ---------------------------------------------------------------------------

// Slot tables, reachable only through the operations in this module
const slotTables = new WeakMap<HolderInventory, Table<AssetIdentity, ValueUnit>>()

function slotsOf(inventory: HolderInventory): Table<AssetIdentity, ValueUnit> {
  const slots = slotTables.get(inventory)
  if (slots === undefined) {
    throw new Error('HolderInventory was not created by HolderInventory.create')
  }
  return slots
}

function findSlot(inventory: HolderInventory, identity: AssetIdentity): ValueUnit | undefined {
  return slotsOf(inventory).get(identity)
}

function openSlot(inventory: HolderInventory, identity: AssetIdentity): ValueUnit {
  const slot = zeroUnit(identity)
  slotsOf(inventory).add(identity, slot, () => new LedgerError(
    'AlreadyHasBalance',
    `slot for ${AssetId.format(identity)} already exists`
  ))
  return slot
}

/**
 * Account-addressed resource holding one ValueUnit slot per identity. Only
 * amounts are readable from outside; value moves through Inventories.
 */
export class HolderInventory {
  private constructor(
    slots: Table<AssetIdentity, ValueUnit>,
    readonly depositEvents: EventHandle<DepositedEvent>,
    readonly withdrawEvents: EventHandle<WithdrawnEvent>
  ) {
    slotTables.set(this, slots)
  }

  static create(account: AccountAddress): HolderInventory {
    return new HolderInventory(
      new Table<AssetIdentity, ValueUnit>(AssetId.key),
      EventHandle.open(account, 'deposit'),
      EventHandle.open(account, 'withdraw')
    )
  }

  hasSlot(identity: AssetIdentity): boolean {
    return slotsOf(this).contains(identity)
  }

  /** Held amount, or undefined when no slot exists */
  amountOf(identity: AssetIdentity): number | undefined {
    return findSlot(this, identity)?.amount
  }

  balances(): BalanceEntry[] {
    return slotsOf(this).entries().map(([identity, unit]) => ({ identity, amount: unit.amount }))
  }

  clone(): HolderInventory {
    return new HolderInventory(
      slotsOf(this).clone(replicateUnit),
      this.depositEvents.clone(),
      this.withdrawEvents.clone()
    )
  }
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * Inventory operations. Every method runs inside the caller's transaction.
 */
export class Inventories {
  /**
   * Create an empty inventory for `account` if it has none. Idempotent.
   */
  ensureInitialized(tx: LedgerTransaction, account: AccountAddress): HolderInventory {
    const address = normalizeAddress(account)
    const existing = tx.inventoryOf(address)
    if (existing !== undefined) {
      return existing
    }
    const inventory = HolderInventory.create(address)
    tx.publishInventory(address, inventory)
    return inventory
  }

  /**
   * Create a zero-amount slot for `identity`.
   *
   * @throws LedgerError StoreNotPublished if the account has no inventory
   * @throws LedgerError AlreadyHasBalance if the slot exists
   */
  initializeSlot(tx: LedgerTransaction, account: AccountAddress, identity: AssetIdentity): void {
    openSlot(this.borrowInventory(tx, account), identity)
  }

  /**
   * Merge `unit` into the account's slot, creating inventory and slot as
   * needed, and emit a Deposited event.
   */
  deposit(tx: LedgerTransaction, account: AccountAddress, unit: ValueUnit): void {
    const address = normalizeAddress(account)
    const { identity } = unit
    const { inventory, amount } = this.merge(tx, address, unit)
    tx.emit(address, 'deposit', inventory.depositEvents, { type: 'Deposited', identity, amount })
  }

  /**
   * Same merge as deposit, without the event.
   */
  depositWithoutEvent(tx: LedgerTransaction, account: AccountAddress, unit: ValueUnit): void {
    this.merge(tx, normalizeAddress(account), unit)
  }

  /**
   * Take `amount` out of the account's slot as a new in-flight unit.
   *
   * @throws LedgerError StoreNotPublished if the account has no inventory
   * @throws LedgerError BalanceNotPublished if there is no slot for identity
   * @throws ArithmeticTrap if the slot holds less than amount
   */
  withdraw(tx: LedgerTransaction, account: AccountAddress, identity: AssetIdentity, amount: number): ValueUnit {
    const address = normalizeAddress(account)
    const inventory = this.borrowInventory(tx, address)
    const slot = findSlot(inventory, identity)
    if (slot === undefined) {
      throw new LedgerError('BalanceNotPublished', `${address} holds no ${AssetId.format(identity)}`)
    }
    const unit = drawUnit(slot, amount, tx)
    tx.emit(address, 'withdraw', inventory.withdrawEvents, { type: 'Withdrawn', identity, amount })
    return unit
  }

  /**
   * Held amount; 0 when the account has no inventory or no slot.
   */
  balanceOf(tx: LedgerTransaction, account: AccountAddress, identity: AssetIdentity): number {
    return tx.inventoryOf(normalizeAddress(account))?.amountOf(identity) ?? 0
  }

  balancesOf(tx: LedgerTransaction, account: AccountAddress): BalanceEntry[] {
    return tx.inventoryOf(normalizeAddress(account))?.balances() ?? []
  }

  transfer(
    tx: LedgerTransaction,
    from: AccountAddress,
    to: AccountAddress,
    identity: AssetIdentity,
    amount: number
  ): void {
    validateAmount(amount)
    const unit = this.withdraw(tx, from, identity, amount)
    this.deposit(tx, to, unit)
  }

  directTransfer(
    tx: LedgerTransaction,
    sender: AccountAddress,
    receiver: AccountAddress,
    identity: AssetIdentity,
    amount: number
  ): void {
    this.transfer(tx, sender, receiver, identity, amount)
  }

  private borrowInventory(tx: LedgerTransaction, account: AccountAddress): HolderInventory {
    const address = normalizeAddress(account)
    const inventory = tx.inventoryOf(address)
    if (inventory === undefined) {
      throw new LedgerError('StoreNotPublished', `${address} has no inventory`)
    }
    return inventory
  }

  private merge(
    tx: LedgerTransaction,
    address: AccountAddress,
    unit: ValueUnit
  ): { inventory: HolderInventory, amount: number } {
    const amount = unit.amount
    const inventory = this.ensureInitialized(tx, address)
    const slot = findSlot(inventory, unit.identity) ?? openSlot(inventory, unit.identity)
    slot.merge(unit)
    return { inventory, amount }
  }
}
