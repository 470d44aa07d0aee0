/**
 * Blog Repository
 * CRUD and listing for blogs. Every blog belongs to an existing user.
 */

import { NotFoundError, isErrorKind, type Logger } from "@blogstore/core";
import type { CascadeCoordinator, CascadeResult } from "../cascade.js";
import { decodeBlog, encodeBlog } from "../codec.js";
import { ENTITY_TYPE, GSI, PREFIX, blogKey, ownerPartition, userKey } from "../keys.js";
import type { QueryRequest } from "../store/types.js";
import {
  BlogCreateSchema,
  BlogFilterSchema,
  BlogPatchSchema,
  type Blog,
  type BlogCreate,
  type BlogFilter,
  type BlogPatch,
} from "../types.js";
import {
  definedFilter,
  parseInput,
  queryEntities,
  requireId,
  requireReference,
  throwIfAborted,
  type OperationOptions,
  type ResolvedDeps,
} from "./shared.js";

export class BlogRepository {
  private readonly log: Logger;

  constructor(
    private readonly deps: ResolvedDeps,
    private readonly cascade: CascadeCoordinator
  ) {
    this.log = deps.logger.child({ entityType: "Blog" });
  }

  async create(input: BlogCreate, options?: OperationOptions): Promise<Blog> {
    const data = parseInput(BlogCreateSchema, input, "blog");
    await requireReference(
      this.deps.store,
      userKey(data.user_id),
      { entityType: "User", id: data.user_id, referencedBy: "Blog" },
      options
    );

    const blog: Blog = {
      blog_id: this.deps.generateId(),
      title: data.title,
      score: data.score,
      created_date: this.deps.clock().toISOString(),
      user_id: data.user_id,
    };

    throwIfAborted(options?.signal);
    await this.deps.store.put(encodeBlog(blog), {
      condition: "absent",
      signal: options?.signal,
    });

    this.log.debug("Created", { operation: "create", entityId: blog.blog_id, userId: blog.user_id });
    return blog;
  }

  async get(blogId: string, options?: OperationOptions): Promise<Blog> {
    requireId(blogId, "blog_id");
    throwIfAborted(options?.signal);
    const item = await this.deps.store.get(blogKey(blogId), { signal: options?.signal });
    if (!item) throw new NotFoundError("Blog", blogId);
    return decodeBlog(item);
  }

  /**
   * Read-merge-write; last write wins under concurrency
   */
  async update(blogId: string, patch: BlogPatch, options?: OperationOptions): Promise<Blog> {
    requireId(blogId, "blog_id");
    const changes = parseInput(BlogPatchSchema, patch, "blog patch");
    const current = await this.get(blogId, options);

    const next: Blog = { ...current };
    if (changes.title !== undefined) next.title = changes.title;
    if (changes.score !== undefined) next.score = changes.score;

    throwIfAborted(options?.signal);
    try {
      await this.deps.store.put(encodeBlog(next), {
        condition: "present",
        signal: options?.signal,
      });
    } catch (error) {
      if (isErrorKind(error, "Conflict")) throw new NotFoundError("Blog", blogId);
      throw error;
    }

    this.log.debug("Updated", { operation: "update", entityId: blogId, fields: Object.keys(changes) });
    return next;
  }

  /**
   * Delete the blog and its comments
   */
  async delete(blogId: string, options?: OperationOptions): Promise<CascadeResult> {
    requireId(blogId, "blog_id");
    return this.cascade.deleteBlog(blogId, options);
  }

  /**
   * A user_id filter reads the owner index; otherwise the type index
   */
  async list(filter: BlogFilter = {}, options?: OperationOptions): Promise<Blog[]> {
    const { user_id, title } = parseInput(BlogFilterSchema, filter, "blog filter");

    const request: QueryRequest = user_id
      ? {
          index: GSI.OWNER,
          partition: ownerPartition(user_id),
          sortKey: { beginsWith: PREFIX.BLOG },
          filter: definedFilter({ title }),
        }
      : {
          index: GSI.TYPE,
          partition: ENTITY_TYPE.BLOG,
          filter: definedFilter({ title }),
        };

    return queryEntities(this.deps.store, request, decodeBlog, options);
  }
}
