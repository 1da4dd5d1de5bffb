/**
 * CollectionRegistry - per-creator collections, token type metadata and the
 * capabilities that gate mint and burn.
 */

import { AssetId } from './AssetId.js'
import { authorizes, grantCapabilities } from './Capability.js'
import type { BurnCapability, MintCapability } from './Capability.js'
import { EventHandle } from './EventHandle.js'
import { LedgerError } from './errors.js'
import { Inventories } from './HolderInventory.js'
import { Table } from './Table.js'
import { consumeUnit, issueUnit } from './ValueUnit.js'
import type { ValueUnit } from './ValueUnit.js'
import {
  addAmounts,
  normalizeAddress,
  subtractAmounts,
  validateAmount,
  validateName,
  validateRoyaltyRate,
  validateText
} from './utils.js'
import type { LedgerTransaction } from './host.js'
import type {
  AccountAddress,
  AssetIdentity,
  BurnedEvent,
  CollectionMeta,
  LedgerLimits,
  MintNotificationEvent,
  RegistryCreationEvent,
  TokenTypeMeta
} from './types.js'

// ---------------------------------------------------------------------------
// Resource
// ---------------------------------------------------------------------------

/**
 * Account-addressed resource, published the first time an account creates a
 * collection.
 */
export class CollectionRegistry {
  private constructor(
    readonly collections: Table<string, CollectionMeta>,
    readonly tokenTypes: Table<AssetIdentity, TokenTypeMeta>,
    readonly mintCapabilities: Table<AssetIdentity, MintCapability>,
    readonly burnCapabilities: Table<AssetIdentity, BurnCapability>,
    readonly creationEvents: EventHandle<RegistryCreationEvent>,
    readonly mintEvents: EventHandle<MintNotificationEvent>,
    readonly burnEvents: EventHandle<BurnedEvent>
  ) { }

  static create(creator: AccountAddress): CollectionRegistry {
    return new CollectionRegistry(
      new Table<string, CollectionMeta>(name => name),
      new Table<AssetIdentity, TokenTypeMeta>(AssetId.key),
      new Table<AssetIdentity, MintCapability>(AssetId.key),
      new Table<AssetIdentity, BurnCapability>(AssetId.key),
      EventHandle.open(creator, 'creation'),
      EventHandle.open(creator, 'mint'),
      EventHandle.open(creator, 'burn')
    )
  }

  clone(): CollectionRegistry {
    return new CollectionRegistry(
      this.collections.clone(meta => ({ ...meta })),
      this.tokenTypes.clone(copyTokenMeta),
      // capabilities are immutable
      this.mintCapabilities.clone(capability => capability),
      this.burnCapabilities.clone(capability => capability),
      this.creationEvents.clone(),
      this.mintEvents.clone(),
      this.burnEvents.clone()
    )
  }
}

function copyTokenMeta(meta: TokenTypeMeta): TokenTypeMeta {
  return { ...meta, royalty: { ...meta.royalty } }
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

export interface CreateCollectionParams {
  name: string
  description: string
  uri: string
  maximum?: number
}

export interface CreateTokenTypeParams {
  collection: string
  name: string
  description: string
  monitorSupply: boolean
  initialAmount: number
  maximum?: number
  uri: string
  /** Points per million */
  royaltyRate: number
}

/**
 * Registry operations. Every method runs inside the caller's transaction.
 */
export class Collections {
  constructor(
    private readonly inventories: Inventories,
    private readonly limits: LedgerLimits
  ) { }

  /**
   * Define a collection, publishing the creator's registry on first use.
   *
   * @throws LedgerError CollectionAlreadyExists if the creator already has `name`
   */
  createCollection(tx: LedgerTransaction, creator: AccountAddress, params: CreateCollectionParams): void {
    const address = normalizeAddress(creator)
    const { name, description, uri, maximum } = params
    validateName(name, this.limits)
    validateText(description, 'description', this.limits)
    validateText(uri, 'uri', this.limits)
    if (maximum !== undefined) validateAmount(maximum, 'maximum')

    let registry = tx.registryOf(address)
    if (registry === undefined) {
      registry = CollectionRegistry.create(address)
      tx.publishRegistry(address, registry)
    }

    const meta: CollectionMeta = { name, description, uri, count: 0 }
    if (maximum !== undefined) meta.maximum = maximum
    registry.collections.add(name, meta, () => new LedgerError(
      'CollectionAlreadyExists',
      `${address} already has collection ${name}`
    ))

    tx.emit(address, 'creation', registry.creationEvents, {
      type: 'CollectionCreated',
      creator: address,
      name,
      uri,
      description,
      ...(maximum !== undefined ? { maximum } : {})
    })
  }

  /**
   * Define a token type inside one of the creator's collections, grant its
   * capabilities to the creator, and mint `initialAmount` to the creator.
   *
   * @returns The identity of the new token type
   * @throws LedgerError RegistryNotPublished, CollectionNotPublished,
   *   TokenAlreadyExists, CollectionLimitExceeded, MintLimitExceeded
   */
  createTokenType(tx: LedgerTransaction, creator: AccountAddress, params: CreateTokenTypeParams): AssetIdentity {
    const address = normalizeAddress(creator)
    const { collection, name, description, monitorSupply, initialAmount, maximum, uri, royaltyRate } = params
    validateName(name, this.limits)
    validateText(description, 'description', this.limits)
    validateText(uri, 'uri', this.limits)
    validateAmount(initialAmount, 'initialAmount')
    if (maximum !== undefined) validateAmount(maximum, 'maximum')
    validateRoyaltyRate(royaltyRate)

    const registry = this.borrowRegistry(tx, address)
    const collectionMeta = registry.collections.borrow(collection, () => new LedgerError(
      'CollectionNotPublished',
      `${address} has no collection ${collection}`
    ))

    const identity = AssetId.create(address, collection, name)
    if (registry.tokenTypes.contains(identity)) {
      throw new LedgerError('TokenAlreadyExists', AssetId.format(identity))
    }

    const count = addAmounts(collectionMeta.count, 1)
    if (collectionMeta.maximum !== undefined && count > collectionMeta.maximum) {
      throw new LedgerError(
        'CollectionLimitExceeded',
        `collection ${collection} is limited to ${collectionMeta.maximum} token types`
      )
    }
    collectionMeta.count = count

    const meta: TokenTypeMeta = {
      collection,
      name,
      description,
      uri,
      royalty: { rate: royaltyRate, payee: address }
    }
    if (maximum !== undefined) meta.maximum = maximum
    if (monitorSupply) meta.supply = 0
    registry.tokenTypes.add(identity, meta, () => new LedgerError('TokenAlreadyExists', AssetId.format(identity)))

    const { mint, burn } = grantCapabilities(identity)
    registry.mintCapabilities.set(identity, mint)
    registry.burnCapabilities.set(identity, burn)

    if (initialAmount > 0) {
      this.mint(tx, address, address, identity, initialAmount)
    }

    tx.emit(address, 'creation', registry.creationEvents, {
      type: 'TokenTypeCreated',
      identity,
      metadata: copyTokenMeta(meta),
      initialAmount
    })
    return identity
  }

  /**
   * Mint `amount` of `identity` into `destination`.
   *
   * Authorization is looked up in the authorizer's own registry; the supply
   * counter lives in the token creator's registry.
   *
   * @throws LedgerError RegistryNotPublished, NoMintCapability,
   *   TokenNotPublished, MintLimitExceeded
   */
  mint(
    tx: LedgerTransaction,
    authorizer: AccountAddress,
    destination: AccountAddress,
    identity: AssetIdentity,
    amount: number
  ): void {
    const authorizerAddress = normalizeAddress(authorizer)
    validateAmount(amount)

    const authorizerRegistry = this.borrowRegistry(tx, authorizerAddress)
    if (!authorizes(authorizerRegistry.mintCapabilities.get(identity), 'mint', identity)) {
      throw new LedgerError('NoMintCapability', `${authorizerAddress} cannot mint ${AssetId.format(identity)}`)
    }

    const creatorRegistry = this.borrowRegistry(tx, identity.creator)
    const meta = this.borrowTokenMeta(creatorRegistry, identity)
    if (meta.supply !== undefined) {
      const supply = addAmounts(meta.supply, amount)
      if (meta.maximum !== undefined && supply > meta.maximum) {
        throw new LedgerError(
          'MintLimitExceeded',
          `${AssetId.format(identity)} is limited to ${meta.maximum}, minting ${amount} would reach ${supply}`
        )
      }
      meta.supply = supply
    }

    const unit = issueUnit(identity, amount, tx)
    this.inventories.deposit(tx, destination, unit)
    tx.emit(identity.creator, 'mint', creatorRegistry.mintEvents, { type: 'MintNotification', identity, amount })
  }

  /**
   * Destroy `unit` under the owner's burn capability, reducing tracked supply.
   *
   * @throws LedgerError RegistryNotPublished, NoBurnCapability, TokenNotPublished
   */
  burn(tx: LedgerTransaction, owner: AccountAddress, unit: ValueUnit): void {
    const ownerAddress = normalizeAddress(owner)
    const { identity } = unit

    const ownerRegistry = this.borrowRegistry(tx, ownerAddress)
    if (!authorizes(ownerRegistry.burnCapabilities.get(identity), 'burn', identity)) {
      throw new LedgerError('NoBurnCapability', `${ownerAddress} cannot burn ${AssetId.format(identity)}`)
    }

    const creatorRegistry = this.borrowRegistry(tx, identity.creator)
    const meta = this.borrowTokenMeta(creatorRegistry, identity)
    const amount = consumeUnit(unit)
    if (meta.supply !== undefined) {
      meta.supply = subtractAmounts(meta.supply, amount)
    }
    tx.emit(identity.creator, 'burn', creatorRegistry.burnEvents, { type: 'Burned', identity, amount })
  }

  getCollection(tx: LedgerTransaction, creator: AccountAddress, name: string): CollectionMeta | undefined {
    const meta = tx.registryOf(normalizeAddress(creator))?.collections.get(name)
    return meta === undefined ? undefined : { ...meta }
  }

  getTokenType(tx: LedgerTransaction, identity: AssetIdentity): TokenTypeMeta | undefined {
    const meta = tx.registryOf(identity.creator)?.tokenTypes.get(identity)
    return meta === undefined ? undefined : copyTokenMeta(meta)
  }

  /**
   * Tracked supply, or undefined when the token type does not monitor supply.
   *
   * @throws LedgerError RegistryNotPublished, TokenNotPublished
   */
  supplyOf(tx: LedgerTransaction, identity: AssetIdentity): number | undefined {
    return this.borrowTokenMeta(this.borrowRegistry(tx, identity.creator), identity).supply
  }

  private borrowRegistry(tx: LedgerTransaction, address: AccountAddress): CollectionRegistry {
    const registry = tx.registryOf(address)
    if (registry === undefined) {
      throw new LedgerError('RegistryNotPublished', `${address} has no collection registry`)
    }
    return registry
  }

  private borrowTokenMeta(registry: CollectionRegistry, identity: AssetIdentity): TokenTypeMeta {
    return registry.tokenTypes.borrow(identity, () => new LedgerError(
      'TokenNotPublished',
      AssetId.format(identity)
    ))
  }
}
