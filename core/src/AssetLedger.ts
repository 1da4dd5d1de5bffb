/**
 * AssetLedger - entry operations for the asset ledger
 *
 * Each public mutating method maps to one host-invocable transaction: it runs
 * atomically through the configured host and either commits in full or throws
 * and leaves no trace.
 */

import { AssetId } from './AssetId.js'
import { Collections } from './CollectionRegistry.js'
import type { CreateTokenTypeParams } from './CollectionRegistry.js'
import { Inventories } from './HolderInventory.js'
import { InMemoryHost } from './host.js'
import type { LedgerTransaction } from './host.js'
import { describeAbort } from './errors.js'
import { runTracked } from './ValueUnit.js'
import { logWithTimestamp } from './logging.js'
import { normalizeAddress } from './utils.js'
import {
  DEFAULT_LOG_TAG,
  DEFAULT_MAX_DESCRIPTION_LENGTH,
  DEFAULT_MAX_NAME_LENGTH,
  DEFAULT_MAX_URI_LENGTH
} from './constants.js'
import type { EventStream } from './constants.js'
import type {
  AccountAddress,
  AssetIdentity,
  BalanceEntry,
  CollectionMeta,
  EventRecord,
  LedgerConfig,
  ResolvedLedgerConfig,
  TokenTypeMeta,
  TransactionListener
} from './types.js'

/**
 * AssetLedger
 *
 * @example
 * ```typescript
 * const ledger = new AssetLedger()
 *
 * ledger.createLimitedCollection('0xc0ffee', 'Sets', 'Card sets', 'https://example.com/sets', 2)
 * const id = ledger.createUnlimitedToken('0xc0ffee', 'Sets', 'Gold', 'Gold card', true, 10, '', 0)
 *
 * ledger.directTransfer('0xc0ffee', '0xbeef', '0xc0ffee', 'Sets', 'Gold', 3)
 * ledger.balanceOf('0xbeef', id) // 3
 * ledger.supplyOf(id)            // 10
 * ```
 */
export class AssetLedger {
  private config: ResolvedLedgerConfig
  readonly inventories: Inventories
  readonly collections: Collections

  constructor(config: LedgerConfig = {}) {
    this.config = this.resolveConfig(config)
    this.inventories = new Inventories()
    this.collections = new Collections(this.inventories, this.config.limits)
  }

  // ---------------------------------------------------------------------------
  // Collections
  // ---------------------------------------------------------------------------

  createLimitedCollection(
    creator: AccountAddress,
    name: string,
    description: string,
    uri: string,
    maximum: number
  ): void {
    this.submit('createLimitedCollection', tx => {
      this.collections.createCollection(tx, creator, { name, description, uri, maximum })
    })
  }

  createUnlimitedCollection(creator: AccountAddress, name: string, description: string, uri: string): void {
    this.submit('createUnlimitedCollection', tx => {
      this.collections.createCollection(tx, creator, { name, description, uri })
    })
  }

  // ---------------------------------------------------------------------------
  // Token types
  // ---------------------------------------------------------------------------

  createLimitedToken(
    creator: AccountAddress,
    collection: string,
    name: string,
    description: string,
    monitorSupply: boolean,
    initialAmount: number,
    maximum: number,
    uri: string,
    royaltyRate: number
  ): AssetIdentity {
    return this.createToken('createLimitedToken', creator, {
      collection, name, description, monitorSupply, initialAmount, maximum, uri, royaltyRate
    })
  }

  createUnlimitedToken(
    creator: AccountAddress,
    collection: string,
    name: string,
    description: string,
    monitorSupply: boolean,
    initialAmount: number,
    uri: string,
    royaltyRate: number
  ): AssetIdentity {
    return this.createToken('createUnlimitedToken', creator, {
      collection, name, description, monitorSupply, initialAmount, uri, royaltyRate
    })
  }

  mint(
    authorizer: AccountAddress,
    destination: AccountAddress,
    creatorAddress: AccountAddress,
    collection: string,
    name: string,
    amount: number
  ): void {
    this.submit('mint', tx => {
      const identity = AssetId.create(creatorAddress, collection, name)
      this.collections.mint(tx, authorizer, destination, identity, amount)
    })
  }

  /**
   * Withdraw `amount` from the owner's inventory and burn it.
   */
  burn(
    owner: AccountAddress,
    creatorAddress: AccountAddress,
    collection: string,
    name: string,
    amount: number
  ): void {
    this.submit('burn', tx => {
      const identity = AssetId.create(creatorAddress, collection, name)
      const unit = this.inventories.withdraw(tx, owner, identity, amount)
      this.collections.burn(tx, owner, unit)
    })
  }

  // ---------------------------------------------------------------------------
  // Holdings
  // ---------------------------------------------------------------------------

  initializeInventory(account: AccountAddress): void {
    this.submit('initializeInventory', tx => {
      this.inventories.ensureInitialized(tx, account)
    })
  }

  initializeSlotFor(account: AccountAddress, creatorAddress: AccountAddress, collection: string, name: string): void {
    this.submit('initializeSlotFor', tx => {
      const identity = AssetId.create(creatorAddress, collection, name)
      this.inventories.ensureInitialized(tx, account)
      this.inventories.initializeSlot(tx, account, identity)
    })
  }

  transfer(
    from: AccountAddress,
    to: AccountAddress,
    creatorAddress: AccountAddress,
    collection: string,
    name: string,
    amount: number
  ): void {
    this.submit('transfer', tx => {
      const identity = AssetId.create(creatorAddress, collection, name)
      this.inventories.transfer(tx, from, to, identity, amount)
    })
  }

  directTransfer(
    sender: AccountAddress,
    receiver: AccountAddress,
    creatorAddress: AccountAddress,
    collection: string,
    name: string,
    amount: number
  ): void {
    this.submit('directTransfer', tx => {
      const identity = AssetId.create(creatorAddress, collection, name)
      this.inventories.directTransfer(tx, sender, receiver, identity, amount)
    })
  }

  /**
   * Compose module operations into one atomic transaction.
   *
   * @example
   * ```typescript
   * ledger.execute(tx => {
   *   const unit = ledger.inventories.withdraw(tx, alice, id, 5)
   *   ledger.inventories.deposit(tx, bob, unit.split(2))
   *   ledger.inventories.deposit(tx, carol, unit)
   * })
   * ```
   */
  execute<T>(fn: (tx: LedgerTransaction) => T): T {
    return this.submit('execute', fn)
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  balanceOf(account: AccountAddress, identity: AssetIdentity): number {
    return this.config.host.view(tx => this.inventories.balanceOf(tx, account, identity))
  }

  balancesOf(account: AccountAddress): BalanceEntry[] {
    return this.config.host.view(tx => this.inventories.balancesOf(tx, account))
  }

  getCollection(creator: AccountAddress, name: string): CollectionMeta | undefined {
    return this.config.host.view(tx => this.collections.getCollection(tx, creator, name))
  }

  getTokenType(identity: AssetIdentity): TokenTypeMeta | undefined {
    return this.config.host.view(tx => this.collections.getTokenType(tx, identity))
  }

  supplyOf(identity: AssetIdentity): number | undefined {
    return this.config.host.view(tx => this.collections.supplyOf(tx, identity))
  }

  /**
   * Events appended so far to one of an account's streams.
   */
  eventsOf(account: AccountAddress, stream: EventStream): EventRecord[] {
    const address = normalizeAddress(account)
    return this.config.host.view((tx): EventRecord[] => {
      switch (stream) {
        case 'creation':
          return [...(tx.registryOf(address)?.creationEvents.list() ?? [])]
        case 'mint':
          return [...(tx.registryOf(address)?.mintEvents.list() ?? [])]
        case 'burn':
          return [...(tx.registryOf(address)?.burnEvents.list() ?? [])]
        case 'deposit':
          return [...(tx.inventoryOf(address)?.depositEvents.list() ?? [])]
        case 'withdraw':
          return [...(tx.inventoryOf(address)?.withdrawEvents.list() ?? [])]
      }
    })
  }

  subscribe(listener: TransactionListener): () => void {
    return this.config.host.subscribe(listener)
  }

  /** Number of committed transactions */
  get version(): number {
    return this.config.host.version
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private createToken(operation: string, creator: AccountAddress, params: CreateTokenTypeParams): AssetIdentity {
    return this.submit(operation, tx => this.collections.createTokenType(tx, creator, params))
  }

  private submit<T>(operation: string, fn: (tx: LedgerTransaction) => T): T {
    const { host, logTag } = this.config
    try {
      // units are tracked here too so hosts other than InMemoryHost get the same checks
      const result = host.execute(tx => runTracked(tx, () => fn(tx)))
      logWithTimestamp(logTag, `${operation} committed at version ${host.version}`)
      return result
    } catch (error) {
      logWithTimestamp(logTag, `${operation} aborted: ${describeAbort(error)}`)
      throw error
    }
  }

  private resolveConfig(config: LedgerConfig): ResolvedLedgerConfig {
    return {
      host: config.host ?? new InMemoryHost(),
      limits: {
        maxNameLength: config.limits?.maxNameLength ?? DEFAULT_MAX_NAME_LENGTH,
        maxDescriptionLength: config.limits?.maxDescriptionLength ?? DEFAULT_MAX_DESCRIPTION_LENGTH,
        maxUriLength: config.limits?.maxUriLength ?? DEFAULT_MAX_URI_LENGTH
      },
      logTag: config.logTag ?? DEFAULT_LOG_TAG
    }
  }
}
