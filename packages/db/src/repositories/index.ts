/**
 * Repository Exports
 */

import { CascadeCoordinator } from "../cascade.js";
import { BlogRepository } from "./blog.repository.js";
import { CommentRepository } from "./comment.repository.js";
import { resolveDeps, type RepositoryDeps } from "./shared.js";
import { UserRepository } from "./user.repository.js";

export { UserRepository, toPublicUser } from "./user.repository.js";
export { BlogRepository } from "./blog.repository.js";
export { CommentRepository } from "./comment.repository.js";
export type { RepositoryDeps, OperationOptions } from "./shared.js";

export interface Repositories {
  users: UserRepository;
  blogs: BlogRepository;
  comments: CommentRepository;
  cascade: CascadeCoordinator;
}

/**
 * Build every repository around one shared store
 */
export function createRepositories(deps: RepositoryDeps): Repositories {
  const resolved = resolveDeps(deps);
  const cascade = new CascadeCoordinator(
    resolved.store,
    resolved.logger.child({ component: "cascade" })
  );

  return {
    users: new UserRepository(resolved, cascade),
    blogs: new BlogRepository(resolved, cascade),
    comments: new CommentRepository(resolved),
    cascade,
  };
}
