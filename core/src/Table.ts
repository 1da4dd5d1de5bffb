/**
 * Table - associative container keyed by a structurally comparable key
 *
 * Keys are reduced to strings by `keyOf`, so composite keys (such as an
 * AssetIdentity) compare by value rather than by reference.
 */

interface TableEntry<K, V> {
  key: K
  value: V
}

export class Table<K, V> {
  private readonly entriesByKey = new Map<string, TableEntry<K, V>>()

  constructor(private readonly keyOf: (key: K) => string) { }

  get size(): number {
    return this.entriesByKey.size
  }

  contains(key: K): boolean {
    return this.entriesByKey.has(this.keyOf(key))
  }

  get(key: K): V | undefined {
    return this.entriesByKey.get(this.keyOf(key))?.value
  }

  /**
   * Return the value under key or throw the error built by `missing`.
   */
  borrow(key: K, missing: () => Error): V {
    const entry = this.entriesByKey.get(this.keyOf(key))
    if (entry === undefined) {
      throw missing()
    }
    return entry.value
  }

  /**
   * Insert a new entry; throw the error built by `duplicate` if the key is taken.
   */
  add(key: K, value: V, duplicate: () => Error): void {
    const id = this.keyOf(key)
    if (this.entriesByKey.has(id)) {
      throw duplicate()
    }
    this.entriesByKey.set(id, { key, value })
  }

  set(key: K, value: V): void {
    this.entriesByKey.set(this.keyOf(key), { key, value })
  }

  remove(key: K): V | undefined {
    const id = this.keyOf(key)
    const entry = this.entriesByKey.get(id)
    this.entriesByKey.delete(id)
    return entry?.value
  }

  keys(): K[] {
    return Array.from(this.entriesByKey.values(), entry => entry.key)
  }

  values(): V[] {
    return Array.from(this.entriesByKey.values(), entry => entry.value)
  }

  entries(): Array<[K, V]> {
    return Array.from(this.entriesByKey.values(), (entry): [K, V] => [entry.key, entry.value])
  }

  /**
   * Copy the table, transforming each value with `copy`.
   */
  clone(copy: (value: V) => V): Table<K, V> {
    const cloned = new Table<K, V>(this.keyOf)
    for (const [id, entry] of this.entriesByKey) {
      cloned.entriesByKey.set(id, { key: entry.key, value: copy(entry.value) })
    }
    return cloned
  }
}
