/**
 * Store Types
 * Capability interface the repositories depend on
 */

/**
 * Generic attribute map as held by the store
 */
export type AttributeMap = Record<string, unknown>;

/**
 * Primary key of an item
 */
export interface ItemKey {
  PK: string;
  SK: string;
}

export interface StoreCallOptions {
  /** Aborts the call. An aborted call throws StoreUnavailableError. */
  signal?: AbortSignal;
}

export interface PutOptions extends StoreCallOptions {
  /**
   * "absent": fail with ConflictError if an item with this key exists.
   * "present": fail with ConflictError if it does not.
   */
  condition?: "absent" | "present";
}

export type SortKeyCondition = { eq: string } | { beginsWith: string };

export interface QueryRequest {
  /** Secondary index to query; the table itself when omitted */
  index?: IndexName;
  /** Partition key value on the table or index */
  partition: string;
  sortKey?: SortKeyCondition;
  /** Attribute equality filter applied to matched items */
  filter?: Record<string, string | number>;
}

export type IndexName = "GSI1" | "GSI2";

/**
 * Store interface - abstracts the single-table key-value store
 */
export interface EntityStore {
  /**
   * Read one item by exact key, or null when absent
   */
  get(key: ItemKey, options?: StoreCallOptions): Promise<AttributeMap | null>;

  /**
   * Write an item, honouring the optional existence condition
   */
  put(item: AttributeMap & ItemKey, options?: PutOptions): Promise<void>;

  /**
   * Remove an item. Resolves false when nothing was there.
   */
  delete(key: ItemKey, options?: StoreCallOptions): Promise<boolean>;

  /**
   * One logical index (or table) query. Never a scan.
   */
  query(request: QueryRequest, options?: StoreCallOptions): Promise<AttributeMap[]>;
}
