import { AssetId } from '@assetledger/core'
import type { AssetIdentity, CommittedTransaction } from '@assetledger/core'
import docs from '../docs/SupplyAuditorDocs.js'

/**
 * Net movement of one token type within a committed transaction
 */
export interface AssetAudit {
  identity: AssetIdentity
  /** Deposited minus withdrawn */
  netHoldings: number
  /** Minted minus burned */
  netSupply: number
}

export interface AuditReport {
  balanced: boolean
  assets: AssetAudit[]
}

/**
 * Checks each committed transaction's events against the conservation law:
 * per token type, value held can only change by what was minted or burned.
 * @public
 */
export default class SupplyAuditor {
  /**
   * Audit one committed transaction. Never throws; imbalance is reported.
   * @param committed - The transaction as delivered to ledger subscribers
   * @returns Per-identity net movements, in order of first appearance
   */
  auditTransaction(committed: CommittedTransaction): AuditReport {
    const assets = new Map<string, AssetAudit>()

    const entryFor = (identity: AssetIdentity): AssetAudit => {
      const key = AssetId.key(identity)
      let entry = assets.get(key)
      if (entry === undefined) {
        entry = { identity, netHoldings: 0, netSupply: 0 }
        assets.set(key, entry)
      }
      return entry
    }

    for (const { data } of committed.events) {
      switch (data.type) {
        case 'Deposited':
          entryFor(data.identity).netHoldings += data.amount
          break
        case 'Withdrawn':
          entryFor(data.identity).netHoldings -= data.amount
          break
        case 'MintNotification':
          entryFor(data.identity).netSupply += data.amount
          break
        case 'Burned':
          entryFor(data.identity).netSupply -= data.amount
          break
        case 'CollectionCreated':
        case 'TokenTypeCreated':
          break
      }
    }

    const audited = Array.from(assets.values())
    return {
      balanced: audited.every(asset => asset.netHoldings === asset.netSupply),
      assets: audited
    }
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
      name: 'Asset Ledger Supply Auditor',
      shortDescription: 'Checks that every committed transaction conserves value.'
    }
  }
}
