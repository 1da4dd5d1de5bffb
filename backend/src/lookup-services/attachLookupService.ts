import { log } from '@assetledger/core'
import type { AssetLedger, CommittedTransaction } from '@assetledger/core'

/**
 * Anything that indexes committed transactions
 */
export interface TransactionIndexer {
  transactionCommitted(committed: CommittedTransaction): Promise<void>
}

export interface LookupAttachment {
  /** Stop receiving transactions; already queued ones still complete */
  detach(): void
  /** Resolves once every transaction received so far has been handled */
  settled(): Promise<void>
}

/**
 * Feed every transaction the ledger commits to `service`, one at a time and in
 * version order. Indexing failures are logged; the ledger commit stands.
 */
export function attachLookupService(ledger: AssetLedger, service: TransactionIndexer): LookupAttachment {
  let queue: Promise<void> = Promise.resolve()

  const unsubscribe = ledger.subscribe(committed => {
    queue = queue
      .then(async () => await service.transactionCommitted(committed))
      .catch(error => {
        log.error(`[attachLookupService] failed to index version ${committed.version}:`, error)
      })
  })

  return {
    detach: unsubscribe,
    settled: async () => await queue
  }
}
