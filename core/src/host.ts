/**
 * Host abstraction: account-addressed resource storage and atomic execution.
 *
 * The ledger never stores anything itself. Each entry operation runs inside a
 * LedgerTransaction supplied by a LedgerHost, which commits every mutation the
 * operation made or none of them.
 */

import { LedgerError } from './errors.js'
import { log } from './logging.js'
import { discardUnits, runTracked } from './ValueUnit.js'
import type { CollectionRegistry } from './CollectionRegistry.js'
import type { EventHandle } from './EventHandle.js'
import type { HolderInventory } from './HolderInventory.js'
import type { EventStream } from './constants.js'
import type {
  AccountAddress,
  CommittedTransaction,
  EmittedEvent,
  LedgerEvent,
  TransactionListener
} from './types.js'

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * "Get or create resource R for account A"
 */
export interface ResourceStore {
  registryOf(address: AccountAddress): CollectionRegistry | undefined
  /** @throws LedgerError ResourceAlreadyPublished */
  publishRegistry(address: AccountAddress, registry: CollectionRegistry): void
  inventoryOf(address: AccountAddress): HolderInventory | undefined
  /** @throws LedgerError ResourceAlreadyPublished */
  publishInventory(address: AccountAddress, inventory: HolderInventory): void
}

/**
 * Storage view and event sink for one atomic operation. ValueUnits created
 * during the operation are tracked under the transaction object.
 */
export interface LedgerTransaction extends ResourceStore {
  emit<E extends LedgerEvent>(
    account: AccountAddress,
    stream: EventStream,
    handle: EventHandle<E>,
    data: E
  ): void
}

export interface LedgerHost {
  /** Number of committed transactions */
  readonly version: number
  /**
   * Run `fn` atomically. If it throws, nothing it did is kept and the error is
   * rethrown; otherwise its mutations are committed and its events published.
   */
  execute<T>(fn: (tx: LedgerTransaction) => T): T
  /** Run `fn` against current state and discard any mutation */
  view<T>(fn: (tx: LedgerTransaction) => T): T
  /** @returns unsubscribe */
  subscribe(listener: TransactionListener): () => void
}

// ---------------------------------------------------------------------------
// In-memory host
// ---------------------------------------------------------------------------

interface AccountResources {
  registry?: CollectionRegistry
  inventory?: HolderInventory
}

/**
 * Copy-on-write working set over the committed accounts
 */
class WorkingTransaction implements LedgerTransaction {
  private readonly touched = new Map<AccountAddress, AccountResources>()
  readonly events: EmittedEvent[] = []

  constructor(private readonly committed: ReadonlyMap<AccountAddress, AccountResources>) { }

  registryOf(address: AccountAddress): CollectionRegistry | undefined {
    return this.account(address).registry
  }

  publishRegistry(address: AccountAddress, registry: CollectionRegistry): void {
    const resources = this.account(address)
    if (resources.registry !== undefined) {
      throw new LedgerError('ResourceAlreadyPublished', `${address} already has a collection registry`)
    }
    resources.registry = registry
  }

  inventoryOf(address: AccountAddress): HolderInventory | undefined {
    return this.account(address).inventory
  }

  publishInventory(address: AccountAddress, inventory: HolderInventory): void {
    const resources = this.account(address)
    if (resources.inventory !== undefined) {
      throw new LedgerError('ResourceAlreadyPublished', `${address} already has an inventory`)
    }
    resources.inventory = inventory
  }

  emit<E extends LedgerEvent>(account: AccountAddress, stream: EventStream, handle: EventHandle<E>, data: E): void {
    const record = handle.append(data)
    this.events.push({ ...record, account, stream })
  }

  changes(): Array<[AccountAddress, AccountResources]> {
    return Array.from(this.touched.entries())
  }

  private account(address: AccountAddress): AccountResources {
    let resources = this.touched.get(address)
    if (resources === undefined) {
      const base = this.committed.get(address)
      resources = {
        registry: base?.registry?.clone(),
        inventory: base?.inventory?.clone()
      }
      this.touched.set(address, resources)
    }
    return resources
  }
}

/**
 * Single-process host. Operations are serialized; nested execution is refused.
 * A commit made by a listener is published after every listener has seen the
 * commit that triggered it.
 */
export class InMemoryHost implements LedgerHost {
  private readonly accounts = new Map<AccountAddress, AccountResources>()
  private readonly listeners = new Set<TransactionListener>()
  private readonly outbox: CommittedTransaction[] = []
  private active = false
  private publishing = false
  private committedVersion = 0

  get version(): number {
    return this.committedVersion
  }

  execute<T>(fn: (tx: LedgerTransaction) => T): T {
    const tx = this.begin()
    const result = this.run(tx, fn)

    for (const [address, resources] of tx.changes()) {
      this.accounts.set(address, resources)
    }
    this.committedVersion += 1
    this.publish({ version: this.committedVersion, events: tx.events })
    return result
  }

  view<T>(fn: (tx: LedgerTransaction) => T): T {
    const tx = this.begin()
    try {
      return fn(tx)
    } finally {
      discardUnits(tx)
      this.active = false
    }
  }

  subscribe(listener: TransactionListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private begin(): WorkingTransaction {
    if (this.active) {
      throw new Error('InMemoryHost does not support nested transactions')
    }
    this.active = true
    return new WorkingTransaction(this.accounts)
  }

  private run<T>(tx: WorkingTransaction, fn: (tx: LedgerTransaction) => T): T {
    try {
      return runTracked(tx, () => fn(tx))
    } finally {
      this.active = false
    }
  }

  private publish(committed: CommittedTransaction): void {
    this.outbox.push(committed)
    if (this.publishing) {
      return
    }
    this.publishing = true
    try {
      let next = this.outbox.shift()
      while (next !== undefined) {
        this.deliver(next)
        next = this.outbox.shift()
      }
    } finally {
      this.publishing = false
    }
  }

  private deliver(committed: CommittedTransaction): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(committed)
      } catch (error) {
        // already committed
        log.error(`[InMemoryHost] listener failed for version ${committed.version}:`, error)
      }
    }
  }
}
