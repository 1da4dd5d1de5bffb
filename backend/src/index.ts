/**
 * @assetledger/backend - off-ledger indexing for the asset ledger
 *
 * @packageDocumentation
 */

export { default as SupplyAuditor } from './topic-managers/SupplyAuditor.js'
export { default as createLedgerLookupService, LedgerLookupService, parseLedgerQuery } from './lookup-services/LedgerLookupServiceFactory.js'
export { LedgerStorageManager, EVENTS_COLLECTION, HOLDINGS_COLLECTION } from './lookup-services/LedgerStorageManager.js'
export { attachLookupService } from './lookup-services/attachLookupService.js'
export type { LookupAttachment, TransactionIndexer } from './lookup-services/attachLookupService.js'
export type * from './types.js'
