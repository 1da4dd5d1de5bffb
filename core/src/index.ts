/**
 * @assetledger/core - on-ledger digital asset standard
 *
 * Any account can define named collections (optionally capped), define
 * fungible or unique token types inside them, and move value between
 * accounts. Value is never duplicated or silently destroyed: it only enters
 * through capability-gated mint and leaves through capability-gated burn.
 *
 * @example
 * ```typescript
 * import { AssetLedger, AssetId } from '@assetledger/core'
 *
 * const ledger = new AssetLedger()
 * ledger.createUnlimitedCollection('0xc', 'Sets', 'Card sets', '')
 * const id = ledger.createUnlimitedToken('0xc', 'Sets', 'X', '', true, 5, '', 0)
 *
 * ledger.directTransfer('0xc', '0xb0b', '0xc', 'Sets', 'X', 2)
 * ledger.balanceOf('0xb0b', id) // 2
 * ```
 *
 * @packageDocumentation
 */

// Main class
export { AssetLedger } from './AssetLedger.js'

// Modules
export { AssetId } from './AssetId.js'
export { CollectionRegistry, Collections } from './CollectionRegistry.js'
export type { CreateCollectionParams, CreateTokenTypeParams } from './CollectionRegistry.js'
export { HolderInventory, Inventories } from './HolderInventory.js'
export type { ValueUnit } from './ValueUnit.js'
export type { Capability, CapabilityKind, MintCapability, BurnCapability } from './Capability.js'
export { Table } from './Table.js'
export { EventHandle, deriveEventKey } from './EventHandle.js'
export { normalizeAddress } from './utils.js'

// Host
export { InMemoryHost } from './host.js'
export type { LedgerHost, LedgerTransaction, ResourceStore } from './host.js'

// Errors
export {
  LedgerError,
  ArithmeticTrap,
  LEDGER_ERROR_CATEGORIES,
  isLedgerError,
  describeAbort
} from './errors.js'
export type { LedgerErrorCode, LedgerErrorCategory } from './errors.js'

// Logging
export { log, logWithTimestamp, configureLogging, isLoggingEnabled } from './logging.js'
export type { LoggingConfig } from './logging.config.js'

// Types
export type {
  AccountAddress,
  AssetIdentity,
  CollectionMeta,
  TokenTypeMeta,
  Royalty,
  BalanceEntry,

  // Event types
  CollectionCreatedEvent,
  TokenTypeCreatedEvent,
  DepositedEvent,
  WithdrawnEvent,
  MintNotificationEvent,
  BurnedEvent,
  RegistryCreationEvent,
  LedgerEvent,
  EventRecord,
  EmittedEvent,
  CommittedTransaction,
  TransactionListener,

  // Configuration types
  LedgerConfig,
  LedgerLimits,
  ResolvedLedgerConfig
} from './types.js'

// Constants
export {
  MAX_TOKEN_AMOUNT,
  ROYALTY_DENOMINATOR,
  DEFAULT_MAX_NAME_LENGTH,
  DEFAULT_MAX_DESCRIPTION_LENGTH,
  DEFAULT_MAX_URI_LENGTH,
  EVENT_STREAMS
} from './constants.js'
export type { EventStream } from './constants.js'
