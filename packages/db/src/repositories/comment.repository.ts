/**
 * Comment Repository
 * One comment per (blog, user) pair, stored in the blog's partition
 */

import { ConflictError, NotFoundError, isErrorKind, type Logger } from "@blogstore/core";
import { decodeComment, encodeComment } from "../codec.js";
import {
  ENTITY_TYPE,
  GSI,
  PREFIX,
  blogKey,
  blogPartition,
  commentKey,
  ownerPartition,
  userKey,
} from "../keys.js";
import type { QueryRequest } from "../store/types.js";
import {
  CommentCreateSchema,
  CommentFilterSchema,
  CommentPatchSchema,
  type Comment,
  type CommentCreate,
  type CommentFilter,
  type CommentPatch,
} from "../types.js";
import {
  parseInput,
  queryEntities,
  requireId,
  requireReference,
  throwIfAborted,
  type OperationOptions,
  type ResolvedDeps,
} from "./shared.js";

function commentId(blogId: string, userId: string): string {
  return `${blogId}/${userId}`;
}

export class CommentRepository {
  private readonly log: Logger;

  constructor(private readonly deps: ResolvedDeps) {
    this.log = deps.logger.child({ entityType: "Comment" });
  }

  async create(input: CommentCreate, options?: OperationOptions): Promise<Comment> {
    const data = parseInput(CommentCreateSchema, input, "comment");
    await requireReference(
      this.deps.store,
      blogKey(data.blog_id),
      { entityType: "Blog", id: data.blog_id, referencedBy: "Comment" },
      options
    );
    await requireReference(
      this.deps.store,
      userKey(data.user_id),
      { entityType: "User", id: data.user_id, referencedBy: "Comment" },
      options
    );

    const comment: Comment = {
      blog_id: data.blog_id,
      user_id: data.user_id,
      created_date: this.deps.clock().toISOString(),
      message: data.message,
    };

    throwIfAborted(options?.signal);
    try {
      await this.deps.store.put(encodeComment(comment), {
        condition: "absent",
        signal: options?.signal,
      });
    } catch (error) {
      if (isErrorKind(error, "Conflict")) {
        throw new ConflictError(
          `User ${data.user_id} already commented on blog ${data.blog_id}`,
          commentId(data.blog_id, data.user_id),
          error
        );
      }
      throw error;
    }

    this.log.debug("Created", {
      operation: "create",
      entityId: commentId(comment.blog_id, comment.user_id),
    });
    return comment;
  }

  async get(blogId: string, userId: string, options?: OperationOptions): Promise<Comment> {
    requireId(blogId, "blog_id");
    requireId(userId, "user_id");
    throwIfAborted(options?.signal);
    const item = await this.deps.store.get(commentKey(blogId, userId), {
      signal: options?.signal,
    });
    if (!item) throw new NotFoundError("Comment", commentId(blogId, userId));
    return decodeComment(item);
  }

  async update(
    blogId: string,
    userId: string,
    patch: CommentPatch,
    options?: OperationOptions
  ): Promise<Comment> {
    requireId(blogId, "blog_id");
    requireId(userId, "user_id");
    const changes = parseInput(CommentPatchSchema, patch, "comment patch");
    const current = await this.get(blogId, userId, options);
    const next: Comment = { ...current, message: changes.message };

    throwIfAborted(options?.signal);
    try {
      await this.deps.store.put(encodeComment(next), {
        condition: "present",
        signal: options?.signal,
      });
    } catch (error) {
      if (isErrorKind(error, "Conflict")) {
        throw new NotFoundError("Comment", commentId(blogId, userId));
      }
      throw error;
    }

    return next;
  }

  /**
   * Comments have no dependents; this removes the one record
   */
  async delete(blogId: string, userId: string, options?: OperationOptions): Promise<void> {
    requireId(blogId, "blog_id");
    requireId(userId, "user_id");
    throwIfAborted(options?.signal);
    const removed = await this.deps.store.delete(commentKey(blogId, userId), {
      signal: options?.signal,
    });
    if (!removed) throw new NotFoundError("Comment", commentId(blogId, userId));
    this.log.debug("Deleted", { operation: "delete", entityId: commentId(blogId, userId) });
  }

  /**
   * blog_id reads the blog's partition, user_id alone the owner index,
   * neither the type index. Always a single query.
   */
  async list(filter: CommentFilter = {}, options?: OperationOptions): Promise<Comment[]> {
    const { blog_id, user_id } = parseInput(CommentFilterSchema, filter, "comment filter");

    let request: QueryRequest;
    if (blog_id) {
      request = {
        partition: blogPartition(blog_id),
        sortKey: user_id
          ? { eq: commentKey(blog_id, user_id).SK }
          : { beginsWith: PREFIX.COMMENT },
      };
    } else if (user_id) {
      request = {
        index: GSI.OWNER,
        partition: ownerPartition(user_id),
        sortKey: { beginsWith: PREFIX.COMMENT },
      };
    } else {
      request = { index: GSI.TYPE, partition: ENTITY_TYPE.COMMENT };
    }

    return queryEntities(this.deps.store, request, decodeComment, options);
  }
}
