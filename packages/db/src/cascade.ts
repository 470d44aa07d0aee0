/**
 * Cascade Coordinator
 * Deletes a user or blog together with everything that depends on it
 *
 * FLOW (children before parent):
 * ==============================
 * deleteUser(u)
 *   ├─ read user              (NotFoundError when absent, nothing removed)
 *   ├─ plan: u's blogs (GSI2 USER#u / BLOG#...), each blog's comments
 *   │        (table BLOG#b / COMMENT#...), u's comments (GSI2 USER#u / COMMENT#...)
 *   ├─ for each blog of u
 *   │   ├─ delete its comments
 *   │   └─ delete the blog
 *   ├─ delete u's remaining comments on other blogs
 *   └─ delete the user
 *
 * deleteBlog(b)
 *   ├─ read blog, plan its comments
 *   ├─ delete the comments
 *   └─ delete the blog
 *
 * Everything is enumerated before the first delete, so a failing step stops
 * the run with a CascadeError listing what was and was not removed. Nothing already deleted is restored. A child that is already
 * gone when its delete runs counts as done.
 */

import {
  CascadeError,
  NotFoundError,
  type CascadeRef,
  type Logger,
} from "@blogstore/core";
import { decodeBlog, decodeComment, decodeUser } from "./codec.js";
import {
  GSI,
  PREFIX,
  blogKey,
  blogPartition,
  commentKey,
  ownerPartition,
  userKey,
} from "./keys.js";
import type { EntityStore, ItemKey } from "./store/types.js";
import { throwIfAborted, type OperationOptions } from "./repositories/shared.js";
import type { Blog, Comment } from "./types.js";

export interface CascadeResult {
  root: CascadeRef;
  /** Records removed, in deletion order, root last */
  deleted: CascadeRef[];
}

export function userRef(userId: string): CascadeRef {
  return { entityType: "User", id: userId };
}

export function blogRef(blogId: string): CascadeRef {
  return { entityType: "Blog", id: blogId };
}

export function commentRef(blogId: string, userId: string): CascadeRef {
  return { entityType: "Comment", id: `${blogId}/${userId}` };
}

/**
 * Bookkeeping for a single cascade run
 */
class CascadeRun {
  readonly deleted: CascadeRef[] = [];
  private readonly planned: CascadeRef[] = [];
  private readonly done = new Set<string>();

  constructor(
    readonly root: CascadeRef,
    private readonly store: EntityStore,
    private readonly log: Logger,
    private readonly options?: OperationOptions
  ) {}

  plan(ref: CascadeRef): void {
    if (this.planned.some((planned) => refId(planned) === refId(ref))) return;
    this.planned.push(ref);
  }

  isDone(ref: CascadeRef): boolean {
    return this.done.has(refId(ref));
  }

  async remove(ref: CascadeRef, key: ItemKey): Promise<void> {
    throwIfAborted(this.options?.signal);
    const removed = await this.store.delete(key, { signal: this.options?.signal });
    this.done.add(refId(ref));
    if (removed) {
      this.deleted.push(ref);
      this.log.debug("Deleted", { entityType: ref.entityType, entityId: ref.id });
    } else {
      this.log.debug("Already absent", { entityType: ref.entityType, entityId: ref.id });
    }
  }

  pending(): CascadeRef[] {
    const pending = this.planned.filter((ref) => !this.isDone(ref));
    if (!this.isDone(this.root)) pending.push(this.root);
    return pending;
  }

  succeed(): CascadeResult {
    this.log.info("Cascade delete completed", { deleted: this.deleted.length });
    this.log.metric("cascade_deleted_items", this.deleted.length);
    return { root: this.root, deleted: this.deleted };
  }

  fail(cause: unknown): CascadeError {
    const error = new CascadeError(this.root, [...this.deleted], this.pending(), cause);
    this.log.error("Cascade delete failed", error, {
      deleted: error.deleted.length,
      pending: error.pending.length,
    });
    return error;
  }
}

function refId(ref: CascadeRef): string {
  return `${ref.entityType}:${ref.id}`;
}

interface BlogTree {
  blog: Blog;
  comments: Comment[];
}

export class CascadeCoordinator {
  constructor(
    private readonly store: EntityStore,
    private readonly log: Logger
  ) {}

  async deleteUser(userId: string, options?: OperationOptions): Promise<CascadeResult> {
    throwIfAborted(options?.signal);
    const item = await this.store.get(userKey(userId), { signal: options?.signal });
    if (!item) throw new NotFoundError("User", userId);
    decodeUser(item);

    const root = userRef(userId);
    const run = new CascadeRun(
      root,
      this.store,
      this.log.child({ operation: "deleteUser", entityType: "User", entityId: userId }),
      options
    );

    try {
      throwIfAborted(options?.signal);
      const blogs = (
        await this.store.query(
          { index: GSI.OWNER, partition: ownerPartition(userId), sortKey: { beginsWith: PREFIX.BLOG } },
          { signal: options?.signal }
        )
      ).map(decodeBlog);

      const trees: BlogTree[] = [];
      for (const blog of blogs) {
        trees.push(await this.collectBlogTree(blog, options));
      }

      throwIfAborted(options?.signal);
      const comments = (
        await this.store.query(
          { index: GSI.OWNER, partition: ownerPartition(userId), sortKey: { beginsWith: PREFIX.COMMENT } },
          { signal: options?.signal }
        )
      ).map(decodeComment);

      for (const tree of trees) planBlogTree(run, tree);
      for (const comment of comments) {
        run.plan(commentRef(comment.blog_id, comment.user_id));
      }

      for (const tree of trees) {
        await this.removeBlogTree(run, tree);
      }
      for (const comment of comments) {
        const ref = commentRef(comment.blog_id, comment.user_id);
        // Comments on the user's own blogs went with those blogs
        if (run.isDone(ref)) continue;
        await run.remove(ref, commentKey(comment.blog_id, comment.user_id));
      }

      await run.remove(root, userKey(userId));
    } catch (error) {
      throw run.fail(error);
    }

    return run.succeed();
  }

  async deleteBlog(blogId: string, options?: OperationOptions): Promise<CascadeResult> {
    throwIfAborted(options?.signal);
    const item = await this.store.get(blogKey(blogId), { signal: options?.signal });
    if (!item) throw new NotFoundError("Blog", blogId);
    const blog = decodeBlog(item);

    const run = new CascadeRun(
      blogRef(blogId),
      this.store,
      this.log.child({ operation: "deleteBlog", entityType: "Blog", entityId: blogId }),
      options
    );

    try {
      const tree = await this.collectBlogTree(blog, options);
      planBlogTree(run, tree);
      await this.removeBlogTree(run, tree);
    } catch (error) {
      throw run.fail(error);
    }

    return run.succeed();
  }

  private async collectBlogTree(blog: Blog, options?: OperationOptions): Promise<BlogTree> {
    throwIfAborted(options?.signal);
    const comments = (
      await this.store.query(
        { partition: blogPartition(blog.blog_id), sortKey: { beginsWith: PREFIX.COMMENT } },
        { signal: options?.signal }
      )
    ).map(decodeComment);
    return { blog, comments };
  }

  private async removeBlogTree(run: CascadeRun, tree: BlogTree): Promise<void> {
    for (const comment of tree.comments) {
      await run.remove(
        commentRef(comment.blog_id, comment.user_id),
        commentKey(comment.blog_id, comment.user_id)
      );
    }
    await run.remove(blogRef(tree.blog.blog_id), blogKey(tree.blog.blog_id));
  }
}

function planBlogTree(run: CascadeRun, tree: BlogTree): void {
  for (const comment of tree.comments) {
    run.plan(commentRef(comment.blog_id, comment.user_id));
  }
  run.plan(blogRef(tree.blog.blog_id));
}
