/**
 * Capability objects gating mint and burn for one token type.
 *
 * Capabilities are created once per token type and stored only inside the
 * issuing registry. Possession is checked by looking the identity up in the
 * caller's own registry; the objects are never handed to callers.
 */

import { Random, Utils } from '@bsv/sdk'
import { AssetId } from './AssetId.js'
import type { AssetIdentity } from './types.js'

export type CapabilityKind = 'mint' | 'burn'

export interface Capability<K extends CapabilityKind = CapabilityKind> {
  readonly kind: K
  readonly identity: AssetIdentity
  /** Random serial assigned at grant time */
  readonly serial: string
}

export type MintCapability = Capability<'mint'>
export type BurnCapability = Capability<'burn'>

class IssuedCapability<K extends CapabilityKind> implements Capability<K> {
  readonly serial: string

  constructor(readonly kind: K, readonly identity: AssetIdentity) {
    this.serial = Utils.toHex(Random(16))
    Object.freeze(this)
  }
}

/**
 * Grant the mint and burn capabilities for a freshly created token type.
 */
export function grantCapabilities(identity: AssetIdentity): { mint: MintCapability, burn: BurnCapability } {
  return {
    mint: new IssuedCapability('mint', identity),
    burn: new IssuedCapability('burn', identity)
  }
}

/**
 * True if `capability` was granted by this module, is of `kind`, and names `identity`.
 */
export function authorizes(
  capability: Capability | undefined,
  kind: CapabilityKind,
  identity: AssetIdentity
): boolean {
  return capability instanceof IssuedCapability &&
    capability.kind === kind &&
    AssetId.equals(capability.identity, identity)
}
