import type { AccountAddress, AssetIdentity, EventStream, LedgerEvent } from '@assetledger/core'

/**
 * Query for stored ledger events
 */
export interface LedgerEventsQuery {
  kind: 'events'
  /** AssetId.key of the token type */
  identityKey?: string
  account?: AccountAddress
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

/**
 * Query for every holding of one account
 */
export interface LedgerHoldingsQuery {
  kind: 'holdings'
  account: AccountAddress
}

export type LedgerQuery = LedgerEventsQuery | LedgerHoldingsQuery

export interface LookupQuestion {
  service: string
  query: unknown
}

/**
 * An event as stored in the lookup database
 */
export interface LedgerEventRecord {
  /** Stream key of the resource that emitted the event */
  eventKey: string
  sequence: number
  /** Ledger version of the committing transaction */
  version: number
  account: AccountAddress
  stream: EventStream
  type: LedgerEvent['type']
  /** Absent for CollectionCreated */
  identityKey?: string
  data: LedgerEvent
  createdAt: Date
}

/**
 * Indexed balance of one token type held by one account
 */
export interface HoldingRecord {
  account: AccountAddress
  identityKey: string
  identity: AssetIdentity
  amount: number
}

export interface EventLookupResult {
  version: number
  account: AccountAddress
  stream: EventStream
  sequence: number
  data: LedgerEvent
}

export interface HoldingLookupResult {
  identity: AssetIdentity
  amount: number
}

export type LedgerLookupResult = EventLookupResult[] | HoldingLookupResult[]

/**
 * Storage the lookup service writes to and queries
 */
export interface LedgerEventStore {
  storeEvent(record: Omit<LedgerEventRecord, 'createdAt'>): Promise<void>
  applyHoldingDelta(account: AccountAddress, identity: AssetIdentity, delta: number): Promise<void>
  findEventsWithFilters(
    filters: { identityKey?: string, account?: AccountAddress },
    limit?: number,
    skip?: number,
    sortOrder?: 'asc' | 'desc'
  ): Promise<LedgerEventRecord[]>
  findAllEvents(limit?: number, skip?: number, sortOrder?: 'asc' | 'desc'): Promise<LedgerEventRecord[]>
  findHoldings(account: AccountAddress): Promise<HoldingRecord[]>
}
