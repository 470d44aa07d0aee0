/**
 * Entity Codec
 * Converts between domain entities and stored attribute maps
 */

import type { z } from "zod";
import { DecodeError } from "@blogstore/core";
import {
  ENTITY_TYPE,
  blogKey,
  commentKey,
  indexKeyForUserBlogs,
  indexKeyForUserComments,
  typeIndexKey,
  userKey,
  type EntityType,
} from "./keys.js";
import type { AttributeMap, ItemKey } from "./store/types.js";
import {
  BlogSchema,
  CommentSchema,
  UserSchema,
  type Blog,
  type Comment,
  type User,
} from "./types.js";

/**
 * A stored item: entity attributes plus its table and index keys
 */
export type StoredItem = AttributeMap &
  ItemKey & {
    entity_type: EntityType;
    GSI1PK: string;
    GSI1SK: string;
    GSI2PK?: string;
    GSI2SK?: string;
  };

export function encodeUser(user: User): StoredItem {
  const gsi1 = typeIndexKey(ENTITY_TYPE.USER, user.user_id);
  return {
    ...userKey(user.user_id),
    entity_type: ENTITY_TYPE.USER,
    GSI1PK: gsi1.pk,
    GSI1SK: gsi1.sk,
    user_id: user.user_id,
    name: user.name,
    email: user.email,
    password: user.password,
  };
}

export function encodeBlog(blog: Blog): StoredItem {
  const gsi1 = typeIndexKey(ENTITY_TYPE.BLOG, blog.blog_id);
  const gsi2 = indexKeyForUserBlogs(blog.user_id, blog.blog_id);
  return {
    ...blogKey(blog.blog_id),
    entity_type: ENTITY_TYPE.BLOG,
    GSI1PK: gsi1.pk,
    GSI1SK: gsi1.sk,
    GSI2PK: gsi2.pk,
    GSI2SK: gsi2.sk,
    blog_id: blog.blog_id,
    title: blog.title,
    score: blog.score,
    created_date: blog.created_date,
    user_id: blog.user_id,
  };
}

export function encodeComment(comment: Comment): StoredItem {
  const gsi1 = typeIndexKey(ENTITY_TYPE.COMMENT, comment.blog_id, comment.user_id);
  const gsi2 = indexKeyForUserComments(comment.user_id, comment.blog_id);
  return {
    ...commentKey(comment.blog_id, comment.user_id),
    entity_type: ENTITY_TYPE.COMMENT,
    GSI1PK: gsi1.pk,
    GSI1SK: gsi1.sk,
    GSI2PK: gsi2.pk,
    GSI2SK: gsi2.sk,
    blog_id: comment.blog_id,
    user_id: comment.user_id,
    created_date: comment.created_date,
    message: comment.message,
  };
}

function decode<T>(type: EntityType, schema: z.ZodType<T>, item: AttributeMap): T {
  const context = { PK: item.PK, SK: item.SK, expectedType: type };

  if (item.entity_type !== type) {
    throw new DecodeError(
      `Stored item is not a ${type}`,
      [`entity_type: expected ${type}, received ${String(item.entity_type)}`],
      context
    );
  }

  const result = schema.safeParse(item);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new DecodeError(`Malformed ${type} item`, issues, context);
  }

  return result.data;
}

export function decodeUser(item: AttributeMap): User {
  return decode(ENTITY_TYPE.USER, UserSchema, item);
}

export function decodeBlog(item: AttributeMap): Blog {
  return decode(ENTITY_TYPE.BLOG, BlogSchema, item);
}

export function decodeComment(item: AttributeMap): Comment {
  return decode(ENTITY_TYPE.COMMENT, CommentSchema, item);
}
