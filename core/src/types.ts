/**
 * Asset Ledger Core Type Definitions
 *
 * Metadata records, the event union delivered to indexers, and configuration.
 */

import type { EventStream } from './constants.js'
import type { LedgerHost } from './host.js'

/** Lower-case `0x` hex account address */
export type AccountAddress = string

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/**
 * Global name of a token type. Equality is by value over all three fields.
 */
export interface AssetIdentity {
  /** Account that created the token type */
  readonly creator: AccountAddress
  /** Collection the token type belongs to */
  readonly collection: string
  /** Token name, unique within its collection */
  readonly name: string
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/**
 * One named collection inside a creator's registry
 */
export interface CollectionMeta {
  name: string
  description: string
  uri: string
  /** Number of token types defined so far; never decreases */
  count: number
  /** Upper bound on count; absent for unlimited collections */
  maximum?: number
}

/**
 * Royalty owed to the creator on secondary sales
 */
export interface Royalty {
  /** Points per million */
  rate: number
  payee: AccountAddress
}

/**
 * Metadata for one AssetIdentity
 */
export interface TokenTypeMeta {
  collection: string
  name: string
  description: string
  uri: string
  /** Upper bound on tracked supply */
  maximum?: number
  /** Outstanding amount; present only when the token type monitors supply */
  supply?: number
  royalty: Royalty
}

/**
 * One slot of a holder inventory
 */
export interface BalanceEntry {
  identity: AssetIdentity
  amount: number
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface CollectionCreatedEvent {
  type: 'CollectionCreated'
  creator: AccountAddress
  name: string
  uri: string
  description: string
  maximum?: number
}

export interface TokenTypeCreatedEvent {
  type: 'TokenTypeCreated'
  identity: AssetIdentity
  metadata: TokenTypeMeta
  initialAmount: number
}

export interface DepositedEvent {
  type: 'Deposited'
  identity: AssetIdentity
  amount: number
}

export interface WithdrawnEvent {
  type: 'Withdrawn'
  identity: AssetIdentity
  amount: number
}

export interface MintNotificationEvent {
  type: 'MintNotification'
  identity: AssetIdentity
  amount: number
}

export interface BurnedEvent {
  type: 'Burned'
  identity: AssetIdentity
  amount: number
}

export type RegistryCreationEvent = CollectionCreatedEvent | TokenTypeCreatedEvent

export type LedgerEvent =
  | CollectionCreatedEvent
  | TokenTypeCreatedEvent
  | DepositedEvent
  | WithdrawnEvent
  | MintNotificationEvent
  | BurnedEvent

/**
 * An event as appended to a resource's stream
 */
export interface EventRecord<E extends LedgerEvent = LedgerEvent> {
  /** Stable key of the owning stream */
  key: string
  /** Position within the stream, starting at 0 */
  sequence: number
  data: E
}

/**
 * An event as delivered to subscribers after commit
 */
export interface EmittedEvent extends EventRecord {
  /** Account owning the resource whose stream received the event */
  account: AccountAddress
  stream: EventStream
}

/**
 * Everything one committed transaction emitted, in emission order
 */
export interface CommittedTransaction {
  version: number
  events: EmittedEvent[]
}

export type TransactionListener = (committed: CommittedTransaction) => void

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

export interface LedgerLimits {
  maxNameLength: number
  maxDescriptionLength: number
  maxUriLength: number
}

/**
 * AssetLedger configuration options
 */
export interface LedgerConfig {
  /** Host providing atomic execution and account storage (default: new InMemoryHost()) */
  host?: LedgerHost
  /** String length limits (defaults in constants.ts) */
  limits?: Partial<LedgerLimits>
  /** File tag used for log lines (default: 'AssetLedger') */
  logTag?: string
}

export interface ResolvedLedgerConfig {
  host: LedgerHost
  limits: LedgerLimits
  logTag: string
}
