import { Collection, Db, Filter } from 'mongodb'
import { AssetId, log } from '@assetledger/core'
import type { AccountAddress, AssetIdentity } from '@assetledger/core'
import type { HoldingRecord, LedgerEventRecord, LedgerEventStore } from './types.js'

export const EVENTS_COLLECTION = 'ledgerEvents'
export const HOLDINGS_COLLECTION = 'holdings'

/**
 * Storage manager for the asset ledger lookup service using MongoDB.
 */
export class LedgerStorageManager implements LedgerEventStore {
  private readonly events: Collection<LedgerEventRecord>
  private readonly holdings: Collection<HoldingRecord>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (db: Db) {
    this.events = db.collection<LedgerEventRecord>(EVENTS_COLLECTION)
    this.holdings = db.collection<HoldingRecord>(HOLDINGS_COLLECTION)

    // Create index on identityKey for efficient lookups
    this.events
      .createIndex({ identityKey: 1 })
      .catch(log.error)

    // Create index on account for efficient lookups
    this.events
      .createIndex({ account: 1 })
      .catch(log.error)

    // A stream position is stored once
    this.events
      .createIndex({ eventKey: 1, sequence: 1 }, { unique: true })
      .catch(log.error)

    this.holdings
      .createIndex({ account: 1, identityKey: 1 }, { unique: true })
      .catch(log.error)
  }

  /**
   * Insert one ledger event.
   */
  async storeEvent (record: Omit<LedgerEventRecord, 'createdAt'>): Promise<void> {
    await this.events.insertOne({ ...record, createdAt: new Date() })
  }

  /**
   * Add `delta` (negative for withdrawals) to an account's indexed holding,
   * creating the holding on first deposit.
   */
  async applyHoldingDelta (account: AccountAddress, identity: AssetIdentity, delta: number): Promise<void> {
    await this.holdings.updateOne(
      { account, identityKey: AssetId.key(identity) },
      { $inc: { amount: delta }, $setOnInsert: { identity } },
      { upsert: true }
    )
  }

  /**
   * Find events with dynamic filter combinations.
   */
  async findEventsWithFilters (
    filters: {
      identityKey?: string
      account?: AccountAddress
    },
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    const query: Filter<LedgerEventRecord> = {}

    if (filters.identityKey !== undefined) {
      query.identityKey = filters.identityKey
    }

    if (filters.account !== undefined) {
      query.account = filters.account
    }

    return await this.findEventsWithQuery(query, limit, skip, sortOrder)
  }

  /**
   * Fetch all events without filtering, with pagination and sorting.
   */
  async findAllEvents (
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    return await this.findEventsWithQuery({}, limit, skip, sortOrder)
  }

  async findHoldings (account: AccountAddress): Promise<HoldingRecord[]> {
    return await this.holdings
      .find({ account })
      .sort({ identityKey: 1 })
      .toArray()
  }

  /**
   * Helper function for querying from the database
   */
  private async findEventsWithQuery (
    query: Filter<LedgerEventRecord>,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    const sortDirection = sortOrder === 'desc' ? -1 : 1

    return await this.events
      .find(query)
      .sort({ version: sortDirection, createdAt: sortDirection })
      .skip(skip)
      .limit(limit)
      .toArray()
  }
}
