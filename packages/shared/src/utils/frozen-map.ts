/**
 * Read-only view over a map
 * @module @herald/shared/utils/frozen-map
 */

/**
 * A map that exposes no mutating methods. The entries are copied on
 * construction, so later changes to the source map are not seen.
 */
export class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  private readonly source: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    this.source = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.source.size;
  }

  get(key: K): V | undefined {
    return this.source.get(key);
  }

  has(key: K): boolean {
    return this.source.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.source.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.source.entries();
  }

  keys() {
    return this.source.keys();
  }

  values() {
    return this.source.values();
  }

  [Symbol.iterator]() {
    return this.source[Symbol.iterator]();
  }
}
