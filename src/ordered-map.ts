/**
 * Insertion-ordered associative container.
 *
 * Entries live in an array that fixes iteration order; a separate index maps each
 * key to its slot for constant-time lookup. Setting an existing key replaces the
 * value in place and keeps the key's original position.
 */
export class OrderedMap<K, V> implements Iterable<[K, V]> {
  private readonly entryList: Array<[K, V]> = [];
  private readonly slots = new Map<K, number>();

  get size(): number {
    return this.entryList.length;
  }

  has(key: K): boolean {
    return this.slots.has(key);
  }

  get(key: K): V | undefined {
    const slot = this.slots.get(key);
    return slot === undefined ? undefined : this.entryList[slot][1];
  }

  set(key: K, value: V): this {
    const slot = this.slots.get(key);
    if (slot === undefined) {
      this.slots.set(key, this.entryList.length);
      this.entryList.push([key, value]);
    } else {
      this.entryList[slot] = [key, value];
    }
    return this;
  }

  /** Entry at a position in insertion order */
  at(position: number): [K, V] | undefined {
    return this.entryList[position];
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entryList) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entryList) yield value;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.entryList) yield [key, value];
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}
