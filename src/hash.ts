/**
 * Keys the table knows how to hash. Arrays compare element-wise, so tuples
 * work as composite keys.
 */
export type Key = string | number | bigint | boolean | readonly Key[];

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function mix(hash: number, str: string) {
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash;
}

// each kind of key gets its own tag so that 1, 1n, "1" and [1] spread apart
function feed(hash: number, key: Key): number {
  switch (typeof key) {
    case "string":
      return mix(mix(hash, `s${key.length}:`), key);
    case "number":
      // String(-0) is "0", which keeps 0 and -0 on the same hash
      return mix(hash, `n${key};`);
    case "bigint":
      return mix(hash, `b${key};`);
    case "boolean":
      return mix(hash, key ? "T" : "F");
    default: {
      let h = mix(hash, `a${key.length}[`);
      for (const k of key) {
        h = feed(h, k);
      }
      return mix(h, "]");
    }
  }
}

/**
 * 32-bit FNV-1a over a tagged encoding of the key.
 * @returns An unsigned 32-bit integer.
 */
export function hashKey(key: Key): number {
  return feed(FNV_OFFSET_BASIS, key) >>> 0;
}

/**
 * SameValueZero for primitives, element-wise for arrays. Keys that compare
 * equal here always share a hash.
 */
export function keysEqual(a: Key, b: Key): boolean {
  if (typeof a === "object" || typeof b === "object") {
    if (typeof a !== "object" || typeof b !== "object") return false;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!keysEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (typeof a === "number" && typeof b === "number") {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
  }

  return a === b;
}

/**
 * Deep-frozen copy of an array key, so the stored key can't drift away from
 * its hash. Primitives come back unchanged.
 */
export function freezeKey<K extends Key>(key: K): K;
export function freezeKey(key: Key): Key {
  if (typeof key !== "object") return key;
  return Object.freeze(key.map((k) => freezeKey(k)));
}

/**
 * Render a key so that distinct keys print distinctly: strings are quoted,
 * bigints carry their `n` suffix and arrays are bracketed.
 */
export function formatKey(key: Key): string {
  switch (typeof key) {
    case "string":
      return JSON.stringify(key);
    case "bigint":
      return `${key}n`;
    case "number":
    case "boolean":
      return String(key);
    default:
      return "[" + key.map((k) => formatKey(k)).join(", ") + "]";
  }
}
