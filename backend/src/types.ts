/**
 * Type definitions for asset ledger backend services
 * @module types
 */

// Re-export lookup service types
export type {
  LedgerQuery,
  LedgerEventsQuery,
  LedgerHoldingsQuery,
  LookupQuestion,
  LedgerEventRecord,
  HoldingRecord,
  EventLookupResult,
  HoldingLookupResult,
  LedgerLookupResult,
  LedgerEventStore
} from './lookup-services/types.js'
export type { AssetAudit, AuditReport } from './topic-managers/SupplyAuditor.js'
