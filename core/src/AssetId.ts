/**
 * AssetId - identity scheme for token types
 *
 * An AssetIdentity is a plain (creator, collection, name) triple. Tables and
 * indexers key it by a canonical string so that two identities with equal
 * fields always map to the same entry.
 */

import { LedgerError } from './errors.js'
import { normalizeAddress } from './utils.js'
import type { AccountAddress, AssetIdentity } from './types.js'

export class AssetId {
  /**
   * Build an identity, normalizing the creator address.
   */
  static create(creator: AccountAddress, collection: string, name: string): AssetIdentity {
    return Object.freeze({ creator: normalizeAddress(creator), collection, name })
  }

  /**
   * Canonical key: a JSON array, so separators inside names cannot collide.
   *
   * @example
   * ```typescript
   * AssetId.key({ creator: '0xc', collection: 'Sets', name: 'A' })
   * // '["0xc","Sets","A"]'
   * ```
   */
  static key(identity: AssetIdentity): string {
    return JSON.stringify([identity.creator, identity.collection, identity.name])
  }

  /**
   * Inverse of key().
   *
   * @throws LedgerError InvalidArgument for anything key() could not have produced
   */
  static parse(key: string): AssetIdentity {
    let parsed: unknown
    try {
      parsed = JSON.parse(key)
    } catch {
      throw new LedgerError('InvalidArgument', `Malformed asset key: ${key}`)
    }
    if (
      !Array.isArray(parsed) ||
      parsed.length !== 3 ||
      !parsed.every((part): part is string => typeof part === 'string')
    ) {
      throw new LedgerError('InvalidArgument', `Malformed asset key: ${key}`)
    }
    const [creator, collection, name] = parsed
    return AssetId.create(creator, collection, name)
  }

  static equals(left: AssetIdentity, right: AssetIdentity): boolean {
    return left.creator === right.creator &&
      left.collection === right.collection &&
      left.name === right.name
  }

  /**
   * Human-readable form for logs and messages.
   */
  static format(identity: AssetIdentity): string {
    return `${identity.creator}::${identity.collection}::${identity.name}`
  }
}
