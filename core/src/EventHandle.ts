/**
 * EventHandle - append-only per-resource event stream
 */

import { Hash, Utils } from '@bsv/sdk'
import type { EventStream } from './constants.js'
import type { AccountAddress, EventRecord, LedgerEvent } from './types.js'

/**
 * Stable stream key: hex SHA-256 of `<account>/<stream>`.
 */
export function deriveEventKey(account: AccountAddress, stream: EventStream): string {
  return Utils.toHex(Hash.sha256(`${account}/${stream}`, 'utf8'))
}

export class EventHandle<E extends LedgerEvent> {
  private counter: number
  private readonly records: Array<EventRecord<E>>

  constructor(readonly key: string, records: Array<EventRecord<E>> = []) {
    this.records = records
    this.counter = records.length
  }

  static open<E extends LedgerEvent>(account: AccountAddress, stream: EventStream): EventHandle<E> {
    return new EventHandle<E>(deriveEventKey(account, stream))
  }

  /** Number of events appended so far */
  get count(): number {
    return this.counter
  }

  append(data: E): EventRecord<E> {
    const record: EventRecord<E> = { key: this.key, sequence: this.counter, data }
    this.records.push(record)
    this.counter += 1
    return record
  }

  list(): ReadonlyArray<EventRecord<E>> {
    return this.records
  }

  clone(): EventHandle<E> {
    return new EventHandle<E>(this.key, [...this.records])
  }
}
