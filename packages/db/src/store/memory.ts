/**
 * Memory Store
 * In-process EntityStore with emulated secondary indexes
 */

import { ConflictError, StoreUnavailableError } from "@blogstore/core";
import { keyToString } from "../keys.js";
import type {
  AttributeMap,
  EntityStore,
  ItemKey,
  PutOptions,
  QueryRequest,
  SortKeyCondition,
  StoreCallOptions,
} from "./types.js";

function checkSignal(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new StoreUnavailableError("Store call aborted", signal.reason);
  }
}

function matchesSortKey(value: unknown, condition?: SortKeyCondition): boolean {
  if (!condition) return true;
  if (typeof value !== "string") return false;
  if ("eq" in condition) return value === condition.eq;
  return value.startsWith(condition.beginsWith);
}

function matchesFilter(item: AttributeMap, filter?: QueryRequest["filter"]): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([name, value]) => item[name] === value);
}

/**
 * Map-backed store. Items are copied on the way in and out.
 */
export class MemoryEntityStore implements EntityStore {
  private readonly items = new Map<string, AttributeMap>();

  constructor(seed: Array<AttributeMap & ItemKey> = []) {
    for (const item of seed) {
      this.items.set(keyToString(item), structuredClone(item));
    }
  }

  get size(): number {
    return this.items.size;
  }

  async get(key: ItemKey, options?: StoreCallOptions): Promise<AttributeMap | null> {
    checkSignal(options?.signal);
    const item = this.items.get(keyToString(key));
    return item ? structuredClone(item) : null;
  }

  async put(item: AttributeMap & ItemKey, options?: PutOptions): Promise<void> {
    checkSignal(options?.signal);
    const id = keyToString(item);
    const exists = this.items.has(id);

    if (options?.condition === "absent" && exists) {
      throw new ConflictError(`Item already exists: ${id}`, id);
    }
    if (options?.condition === "present" && !exists) {
      throw new ConflictError(`Item does not exist: ${id}`, id);
    }

    this.items.set(id, structuredClone(item));
  }

  async delete(key: ItemKey, options?: StoreCallOptions): Promise<boolean> {
    checkSignal(options?.signal);
    return this.items.delete(keyToString(key));
  }

  async query(request: QueryRequest, options?: StoreCallOptions): Promise<AttributeMap[]> {
    checkSignal(options?.signal);
    const pkName = request.index ? `${request.index}PK` : "PK";
    const skName = request.index ? `${request.index}SK` : "SK";

    const matched = [...this.items.values()].filter(
      (item) =>
        item[pkName] === request.partition &&
        matchesSortKey(item[skName], request.sortKey) &&
        matchesFilter(item, request.filter)
    );

    // UTF-16 code unit order; matches the table's UTF-8 byte order within the BMP
    matched.sort((a, b) => {
      const left = String(a[skName]);
      const right = String(b[skName]);
      return left < right ? -1 : left > right ? 1 : 0;
    });
    return matched.map((item) => structuredClone(item));
  }

  /**
   * Every stored item, for assertions in tests
   */
  dump(): AttributeMap[] {
    return [...this.items.values()].map((item) => structuredClone(item));
  }
}
