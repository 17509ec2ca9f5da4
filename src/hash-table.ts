import assert from "node:assert";
import { Key, formatKey, freezeKey, hashKey, keysEqual } from "./hash.js";

export const DEFAULT_CAPACITY = 20;
export const LOAD_FACTOR = 0.7;

export interface HashTableOptions {
  /**
   * Number of slots the table starts with. Defaults to `DEFAULT_CAPACITY`.
   */
  capacity?: number;
  /**
   * Highest fraction of occupied slots tolerated before the table doubles.
   * Must lie strictly between 0 and 1. Defaults to `LOAD_FACTOR`.
   */
  loadFactor?: number;
}

type Entry<K, V> = { key: K; value: V };

type Slots<K, V> = (Entry<K, V> | undefined)[];

function emptySlots<K, V>(capacity: number): Slots<K, V> {
  return new Array<Entry<K, V> | undefined>(capacity).fill(undefined);
}

/**
 * Thrown by {@link HashTable.getOrThrow} when the key is not in the table.
 */
export class KeyNotFoundError extends Error {
  key: Key;

  constructor(key: Key) {
    super(`key not found: ${formatKey(key)}`);
    this.name = "KeyNotFoundError";
    this.key = key;
  }
}

/**
 * Open-addressing hash table with linear probing.
 *
 * The table grows before an insert would push it past its load factor, so
 * there is always at least one empty slot and every probe terminates.
 */
export class HashTable<K extends Key, V> {
  protected slots: Slots<K, V>;
  private count = 0;
  private readonly loadFactor: number;

  constructor(options: HashTableOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    const loadFactor = options.loadFactor ?? LOAD_FACTOR;

    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `capacity must be a positive integer, got ${capacity}`
      );
    }
    if (!(loadFactor > 0 && loadFactor < 1)) {
      throw new RangeError(
        `loadFactor must lie between 0 and 1 exclusive, got ${loadFactor}`
      );
    }

    this.slots = emptySlots(capacity);
    this.loadFactor = loadFactor;
  }

  /**
   * Build a table by inserting each pair in order; later duplicates win.
   */
  static from<K extends Key, V>(
    entries: Iterable<readonly [K, V]>,
    options?: HashTableOptions
  ) {
    const table = new HashTable<K, V>(options);
    for (const [k, v] of entries) {
      table.insert(k, v);
    }
    return table;
  }

  get size() {
    return this.count;
  }

  get capacity() {
    return this.slots.length;
  }

  private home(key: K) {
    return hashKey(key) % this.slots.length;
  }

  private next(i: number) {
    return (i + 1) % this.slots.length;
  }

  // slot holding `key`, or the empty slot where the probe for it stopped
  private probe(key: K) {
    const capacity = this.slots.length;
    let i = this.home(key);
    for (let step = 0; step < capacity; step++) {
      const entry = this.slots[i];
      if (entry === undefined || keysEqual(entry.key, key)) return i;
      i = this.next(i);
    }
    return assert.fail(
      `probed all ${capacity} slots without finding the key or an empty slot`
    );
  }

  private growIfNeeded() {
    let capacity = this.slots.length;
    while ((this.count + 1) / capacity > this.loadFactor) {
      capacity *= 2;
    }
    if (capacity === this.slots.length) return;

    const old = this.slots;
    this.slots = emptySlots(capacity);
    for (const entry of old) {
      if (entry === undefined) continue;
      // keys are already distinct, so only the first empty slot matters
      let i = this.home(entry.key);
      while (this.slots[i] !== undefined) {
        i = this.next(i);
      }
      this.slots[i] = entry;
    }
  }

  /**
   * @returns The value previously stored under `key`, if any.
   */
  insert(key: K, value: V): V | undefined {
    this.growIfNeeded();

    const i = this.probe(key);
    const entry = this.slots[i];
    if (entry === undefined) {
      this.slots[i] = { key: freezeKey(key), value };
      this.count++;
      return undefined;
    }

    const previous = entry.value;
    entry.value = value;
    return previous;
  }

  get(key: K): V | undefined {
    return this.slots[this.probe(key)]?.value;
  }

  /**
   * Like `get`, but a missing key throws {@link KeyNotFoundError}.
   */
  getOrThrow(key: K): V {
    const entry = this.slots[this.probe(key)];
    if (entry === undefined) throw new KeyNotFoundError(key);
    return entry.value;
  }

  containsKey(key: K): boolean {
    return this.slots[this.probe(key)] !== undefined;
  }

  /**
   * Remove `key` and close the gap it leaves by shifting later members of
   * its probe cluster back, so keys that were displaced past it stay
   * reachable.
   * @returns The removed value, if the key was present.
   */
  remove(key: K): V | undefined {
    let hole = this.probe(key);
    const removed = this.slots[hole];
    if (removed === undefined) return undefined;

    this.slots[hole] = undefined;
    this.count--;

    for (let i = this.next(hole); ; i = this.next(i)) {
      const entry = this.slots[i];
      if (entry === undefined) break;

      // an entry whose home lies cyclically in (hole, i] must stay put
      const home = this.home(entry.key);
      const stays =
        hole <= i ? hole < home && home <= i : hole < home || home <= i;
      if (stays) continue;

      this.slots[hole] = entry;
      this.slots[i] = undefined;
      hole = i;
    }

    return removed.value;
  }

  *entries(): Generator<[K, V]> {
    for (const entry of this.slots) {
      if (entry !== undefined) yield [entry.key, entry.value];
    }
  }

  // array keys come back frozen
  *keys(): Generator<K> {
    for (const [k] of this.entries()) yield k;
  }

  *values(): Generator<V> {
    for (const [, v] of this.entries()) yield v;
  }

  [Symbol.iterator]() {
    return this.entries();
  }

  toString() {
    const pairs: string[] = [];
    for (const [k, v] of this.entries()) {
      const value = typeof v === "string" ? JSON.stringify(v) : String(v);
      pairs.push(formatKey(k) + ": " + value);
    }
    return "{" + pairs.join(", ") + "}";
  }
}
