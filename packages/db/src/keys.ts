/**
 * Key Builder
 * Single-table key layout for users, blogs and comments
 *
 *   entity    PK            SK               GSI1 (type index)            GSI2 (owner index)
 *   User      USER#<uid>    USER#<uid>       USER    / USER#<uid>         -
 *   Blog      BLOG#<bid>    BLOG#<bid>       BLOG    / BLOG#<bid>         USER#<uid> / BLOG#<bid>
 *   Comment   BLOG#<bid>    COMMENT#<uid>    COMMENT / COMMENT#<bid>#<uid> USER#<uid> / COMMENT#<bid>
 *
 * Comments share their blog's partition, so a blog and its comments are one query away.
 * Ids are validated by callers before they reach these functions.
 */

import type { IndexName, ItemKey } from "./store/types.js";

export const ENTITY_TYPE = {
  USER: "USER",
  BLOG: "BLOG",
  COMMENT: "COMMENT",
} as const;

export type EntityType = (typeof ENTITY_TYPE)[keyof typeof ENTITY_TYPE];

export const PREFIX = {
  USER: "USER#",
  BLOG: "BLOG#",
  COMMENT: "COMMENT#",
} as const;

export const GSI = {
  /** Every item of one entity type */
  TYPE: "GSI1",
  /** Items owned by one user */
  OWNER: "GSI2",
} as const satisfies Record<string, IndexName>;

export interface IndexKey {
  pk: string;
  sk: string;
}

export function userKey(userId: string): ItemKey {
  return { PK: `${PREFIX.USER}${userId}`, SK: `${PREFIX.USER}${userId}` };
}

export function blogKey(blogId: string): ItemKey {
  return { PK: `${PREFIX.BLOG}${blogId}`, SK: `${PREFIX.BLOG}${blogId}` };
}

export function commentKey(blogId: string, userId: string): ItemKey {
  return { PK: `${PREFIX.BLOG}${blogId}`, SK: `${PREFIX.COMMENT}${userId}` };
}

/**
 * GSI1 key placing an item in its type-scoped listing
 */
export function typeIndexKey(type: EntityType, ...ids: string[]): IndexKey {
  return { pk: type, sk: `${PREFIX[type]}${ids.join("#")}` };
}

/**
 * GSI2 key listing a user's blogs
 */
export function indexKeyForUserBlogs(userId: string, blogId: string): IndexKey {
  return { pk: `${PREFIX.USER}${userId}`, sk: `${PREFIX.BLOG}${blogId}` };
}

/**
 * GSI2 key listing a user's comments across all blogs
 */
export function indexKeyForUserComments(userId: string, blogId: string): IndexKey {
  return { pk: `${PREFIX.USER}${userId}`, sk: `${PREFIX.COMMENT}${blogId}` };
}

/**
 * Partition holding everything a user owns on GSI2
 */
export function ownerPartition(userId: string): string {
  return `${PREFIX.USER}${userId}`;
}

/**
 * Partition holding a blog and its comments on the table
 */
export function blogPartition(blogId: string): string {
  return `${PREFIX.BLOG}${blogId}`;
}

export function keyToString(key: ItemKey): string {
  return `${key.PK}|${key.SK}`;
}
