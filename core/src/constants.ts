/**
 * Ledger Constants
 *
 * Limits and stream names shared by the core modules and the backend indexer.
 */

// ---------------------------------------------------------------------------
// Amount Constants
// ---------------------------------------------------------------------------

/** Largest representable balance, supply or maximum */
export const MAX_TOKEN_AMOUNT = Number.MAX_SAFE_INTEGER

/** Royalty rates are expressed in points per million */
export const ROYALTY_DENOMINATOR = 1_000_000

// ---------------------------------------------------------------------------
// Validation Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_NAME_LENGTH = 128

export const DEFAULT_MAX_DESCRIPTION_LENGTH = 512

export const DEFAULT_MAX_URI_LENGTH = 512

// ---------------------------------------------------------------------------
// Event Streams
// ---------------------------------------------------------------------------

/**
 * Each account-addressed resource owns a fixed set of append-only streams.
 * - creation, mint, burn: CollectionRegistry
 * - deposit, withdraw: HolderInventory
 */
export const EVENT_STREAMS = ['creation', 'mint', 'burn', 'deposit', 'withdraw'] as const

export type EventStream = typeof EVENT_STREAMS[number]

/** Tag used in log lines written by the entry class */
export const DEFAULT_LOG_TAG = 'AssetLedger'
