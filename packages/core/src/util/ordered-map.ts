/**
 * Insertion-ordered associative container.
 *
 * Keys live in an ordered list with a key→index lookup beside it, so
 * re-setting an existing key replaces its value while it keeps the position
 * it was first seen at. Merge output order depends on this.
 */
export class OrderedMap<K, V> implements Iterable<[K, V]> {
  readonly #keys: K[] = [];
  readonly #values: V[] = [];
  readonly #index = new Map<K, number>();

  constructor(entries?: Iterable<readonly [K, V]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  static fromRecord<V>(record: Record<string, V>): OrderedMap<string, V> {
    return new OrderedMap(Object.entries(record));
  }

  get size(): number {
    return this.#keys.length;
  }

  has(key: K): boolean {
    return this.#index.has(key);
  }

  get(key: K): V | undefined {
    const idx = this.#index.get(key);
    return idx === undefined ? undefined : this.#values[idx];
  }

  /**
   * Returns true when an existing entry was overwritten.
   */
  set(key: K, value: V): boolean {
    const idx = this.#index.get(key);
    if (idx !== undefined) {
      this.#values[idx] = value;
      return true;
    }
    this.#index.set(key, this.#keys.length);
    this.#keys.push(key);
    this.#values.push(value);
    return false;
  }

  keys(): K[] {
    return this.#keys.slice();
  }

  values(): V[] {
    return this.#values.slice();
  }

  entries(): Array<[K, V]> {
    return this.#keys.map((key, i): [K, V] => [key, this.#values[i]]);
  }

  map<U>(fn: (value: V, key: K) => U): OrderedMap<K, U> {
    return new OrderedMap(
      this.#keys.map((key, i): [K, U] => [key, fn(this.#values[i], key)])
    );
  }

  clone(): OrderedMap<K, V> {
    return new OrderedMap(this.entries());
  }

  toRecord(this: OrderedMap<string, V>): Record<string, V> {
    const out: Record<string, V> = {};
    for (const [key, value] of this.entries()) {
      out[key] = value;
    }
    return out;
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return this.entries()[Symbol.iterator]();
  }
}
