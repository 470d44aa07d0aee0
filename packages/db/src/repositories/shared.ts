/**
 * Repository plumbing shared by the entity repositories
 */

import { randomUUID } from "crypto";
import { z } from "zod";
import {
  ForeignKeyError,
  StoreUnavailableError,
  ValidationError,
  logger as rootLogger,
  type Logger,
} from "@blogstore/core";
import type { AttributeMap, EntityStore, ItemKey, QueryRequest } from "../store/types.js";

export interface RepositoryDeps {
  store: EntityStore;
  logger?: Logger;
  /** Source of created_date values */
  clock?: () => Date;
  generateId?: () => string;
}

export interface ResolvedDeps {
  store: EntityStore;
  logger: Logger;
  clock: () => Date;
  generateId: () => string;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export function resolveDeps(deps: RepositoryDeps): ResolvedDeps {
  return {
    store: deps.store,
    logger: deps.logger ?? rootLogger.child({ component: "repository" }),
    clock: deps.clock ?? (() => new Date()),
    generateId: deps.generateId ?? randomUUID,
  };
}

/**
 * Validate caller input, turning schema issues into a ValidationError
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
    );
    const field = result.error.issues[0]?.path.join(".");
    throw new ValidationError(`Invalid ${label}`, {
      field: field || undefined,
      issues,
    });
  }
  return result.data;
}

const uuid = z.string().uuid();

export function requireId(id: string, field: string): string {
  if (!uuid.safeParse(id).success) {
    throw new ValidationError(`${field} must be a UUID`, {
      field,
      issues: [`${field}: Invalid uuid`],
    });
  }
  return id;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new StoreUnavailableError("Operation aborted", signal.reason);
  }
}

/**
 * Run one store query and decode every item
 */
export async function queryEntities<T>(
  store: EntityStore,
  request: QueryRequest,
  decode: (item: AttributeMap) => T,
  options?: OperationOptions
): Promise<T[]> {
  throwIfAborted(options?.signal);
  const items = await store.query(request, { signal: options?.signal });
  return items.map(decode);
}

/**
 * Drop filter entries left undefined by optional input fields
 */
export function definedFilter(
  filter: Record<string, string | number | undefined>
): Record<string, string | number> | undefined {
  const entries = Object.entries(filter).filter(
    (entry): entry is [string, string | number] => entry[1] !== undefined
  );
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/**
 * Fail with ForeignKeyError unless the referenced item exists
 */
export async function requireReference(
  store: EntityStore,
  key: ItemKey,
  ref: { entityType: string; id: string; referencedBy: string },
  options?: OperationOptions
): Promise<void> {
  throwIfAborted(options?.signal);
  const item = await store.get(key, { signal: options?.signal });
  if (!item) {
    throw new ForeignKeyError(ref.entityType, ref.id, ref.referencedBy);
  }
}
