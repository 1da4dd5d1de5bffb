import { Db } from 'mongodb'
import { AssetId, log, logWithTimestamp, normalizeAddress } from '@assetledger/core'
import type { AssetIdentity, CommittedTransaction, LedgerEvent } from '@assetledger/core'
import { LedgerStorageManager } from './LedgerStorageManager.js'
import SupplyAuditor from '../topic-managers/SupplyAuditor.js'
import type {
  EventLookupResult,
  LedgerEventRecord,
  LedgerEventStore,
  LedgerLookupResult,
  LedgerQuery,
  LookupQuestion
} from './types.js'
import docs from '../docs/LedgerLookupDocs.js'

const LOG_TAG = 'LedgerLookupService'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(query: Record<string, unknown>, field: string): string | undefined {
  const value = query[field]
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    throw new Error(`${field} must be a string`)
  }
  return value
}

function optionalCount(query: Record<string, unknown>, field: string): number | undefined {
  const value = query[field]
  if (value === undefined) return undefined
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${field} must be a non-negative integer`)
  }
  return value
}

/**
 * Validate a lookup query received from outside the process.
 */
export function parseLedgerQuery(query: unknown): LedgerQuery {
  if (!isRecord(query)) {
    throw new Error('A valid query must be provided')
  }

  if (query.kind === 'holdings') {
    const account = optionalString(query, 'account')
    if (account === undefined) {
      throw new Error('A holdings query requires an account')
    }
    return { kind: 'holdings', account: normalizeAddress(account) }
  }

  if (query.kind === 'events') {
    const account = optionalString(query, 'account')
    const requested = query.sortOrder
    let sortOrder: 'asc' | 'desc' | undefined
    if (requested === 'asc' || requested === 'desc') {
      sortOrder = requested
    } else if (requested !== undefined) {
      throw new Error('sortOrder must be asc or desc')
    }
    return {
      kind: 'events',
      identityKey: optionalString(query, 'identityKey'),
      account: account === undefined ? undefined : normalizeAddress(account),
      limit: optionalCount(query, 'limit'),
      skip: optionalCount(query, 'skip'),
      sortOrder
    }
  }

  throw new Error(`Unsupported query kind: ${String(query.kind)}`)
}

function identityOf(event: LedgerEvent): AssetIdentity | undefined {
  return event.type === 'CollectionCreated' ? undefined : event.identity
}

/**
 * Change to the emitting account's indexed holding, if the event moves value
 */
function holdingDelta(event: LedgerEvent): number | undefined {
  switch (event.type) {
    case 'Deposited':
      return event.amount
    case 'Withdrawn':
      return -event.amount
    default:
      return undefined
  }
}

/**
 * Indexes committed ledger transactions and answers queries over them
 * @public
 */
class LedgerLookupService {
  private static readonly SERVICE_ID = 'ls_assets'

  constructor(
    public storageManager: LedgerEventStore,
    private readonly auditor: SupplyAuditor = new SupplyAuditor()
  ) { }

  /**
   * Store every event of a committed transaction and update holdings. A
   * transaction whose events do not net to zero per asset is logged as a
   * warning and indexed anyway.
   */
  async transactionCommitted(committed: CommittedTransaction): Promise<void> {
    const report = this.auditor.auditTransaction(committed)
    if (!report.balanced) {
      // committed state is authoritative; index it so holdings follow the ledger
      log.warn(`[${LOG_TAG}] transaction ${committed.version} does not net to zero:`, report.assets)
    }

    try {
      for (const event of committed.events) {
        const identity = identityOf(event.data)
        const record: Omit<LedgerEventRecord, 'createdAt'> = {
          eventKey: event.key,
          sequence: event.sequence,
          version: committed.version,
          account: event.account,
          stream: event.stream,
          type: event.data.type,
          data: event.data
        }
        if (identity !== undefined) record.identityKey = AssetId.key(identity)
        await this.storageManager.storeEvent(record)

        const delta = holdingDelta(event.data)
        if (identity !== undefined && delta !== undefined) {
          await this.storageManager.applyHoldingDelta(event.account, identity, delta)
        }
      }
    } catch (error) {
      log.error('Error indexing ledger transaction:', error)
      throw error
    }

    logWithTimestamp(LOG_TAG, `indexed version ${committed.version} (${committed.events.length} events)`)
  }

  async lookup(question: LookupQuestion): Promise<LedgerLookupResult> {
    if (question.query === undefined || question.query === null) {
      throw new Error('A valid query must be provided')
    }
    if (question.service !== LedgerLookupService.SERVICE_ID) {
      throw new Error('Lookup service not supported')
    }

    const query = parseLedgerQuery(question.query)

    if (query.kind === 'holdings') {
      const holdings = await this.storageManager.findHoldings(query.account)
      return holdings.map(({ identity, amount }) => ({ identity, amount }))
    }

    // Check if we have any filters to apply
    const hasFilters = query.identityKey !== undefined || query.account !== undefined

    let results: LedgerEventRecord[]

    if (hasFilters) {
      results = await this.storageManager.findEventsWithFilters(
        {
          identityKey: query.identityKey,
          account: query.account
        },
        query.limit,
        query.skip,
        query.sortOrder
      )
    } else {
      results = await this.storageManager.findAllEvents(
        query.limit,
        query.skip,
        query.sortOrder
      )
    }

    return results.map((result): EventLookupResult => ({
      version: result.version,
      account: result.account,
      stream: result.stream,
      sequence: result.sequence,
      data: result.data
    }))
  }

  async getDocumentation(): Promise<string> {
    return docs
  }

  async getMetaData(): Promise<{
    name: string
    shortDescription: string
    iconURL?: string
    version?: string
    informationURL?: string
  }> {
    return {
      name: 'Asset Ledger Lookup Service',
      shortDescription: 'Find ledger events by token type or account, and account holdings.'
    }
  }
}

// Factory function
export default (db: Db): LedgerLookupService => {
  return new LedgerLookupService(new LedgerStorageManager(db))
}

export { LedgerLookupService }
