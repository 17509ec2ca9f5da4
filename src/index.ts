export {
  HashTable,
  HashTableOptions,
  KeyNotFoundError,
  DEFAULT_CAPACITY,
  LOAD_FACTOR,
} from "./hash-table.js";

export { Key } from "./hash.js";
