/**
 * User Repository
 * CRUD and listing for users
 */

import { NotFoundError, isErrorKind, type Logger } from "@blogstore/core";
import type { CascadeCoordinator, CascadeResult } from "../cascade.js";
import { decodeUser, encodeUser } from "../codec.js";
import { ENTITY_TYPE, GSI, userKey } from "../keys.js";
import { hashPassword, verifyPassword } from "../password.js";
import {
  UserCreateSchema,
  UserFilterSchema,
  UserPatchSchema,
  type PublicUser,
  type User,
  type UserCreate,
  type UserFilter,
  type UserPatch,
} from "../types.js";
import {
  definedFilter,
  parseInput,
  queryEntities,
  requireId,
  throwIfAborted,
  type OperationOptions,
  type ResolvedDeps,
} from "./shared.js";

export function toPublicUser(user: User): PublicUser {
  const { password: _password, ...rest } = user;
  return rest;
}

export class UserRepository {
  private readonly log: Logger;

  constructor(
    private readonly deps: ResolvedDeps,
    private readonly cascade: CascadeCoordinator
  ) {
    this.log = deps.logger.child({ entityType: "User" });
  }

  async create(input: UserCreate, options?: OperationOptions): Promise<User> {
    const data = parseInput(UserCreateSchema, input, "user");
    const user: User = {
      user_id: this.deps.generateId(),
      name: data.name,
      email: data.email,
      password: await hashPassword(data.password),
    };

    throwIfAborted(options?.signal);
    await this.deps.store.put(encodeUser(user), {
      condition: "absent",
      signal: options?.signal,
    });

    this.log.debug("Created", { operation: "create", entityId: user.user_id });
    return user;
  }

  async get(userId: string, options?: OperationOptions): Promise<User> {
    requireId(userId, "user_id");
    throwIfAborted(options?.signal);
    const item = await this.deps.store.get(userKey(userId), { signal: options?.signal });
    if (!item) throw new NotFoundError("User", userId);
    return decodeUser(item);
  }

  /**
   * Read-merge-write. Concurrent updates of the same user are last-write-wins.
   */
  async update(userId: string, patch: UserPatch, options?: OperationOptions): Promise<User> {
    requireId(userId, "user_id");
    const changes = parseInput(UserPatchSchema, patch, "user patch");
    const current = await this.get(userId, options);

    const next: User = { ...current };
    if (changes.name !== undefined) next.name = changes.name;
    if (changes.email !== undefined) next.email = changes.email;
    if (changes.password !== undefined) {
      next.password = await hashPassword(changes.password);
    }

    throwIfAborted(options?.signal);
    try {
      await this.deps.store.put(encodeUser(next), {
        condition: "present",
        signal: options?.signal,
      });
    } catch (error) {
      // Removed between our read and write
      if (isErrorKind(error, "Conflict")) throw new NotFoundError("User", userId);
      throw error;
    }

    this.log.debug("Updated", { operation: "update", entityId: userId, fields: Object.keys(changes) });
    return next;
  }

  /**
   * Delete the user with all of their blogs and comments
   */
  async delete(userId: string, options?: OperationOptions): Promise<CascadeResult> {
    requireId(userId, "user_id");
    return this.cascade.deleteUser(userId, options);
  }

  async list(filter: UserFilter = {}, options?: OperationOptions): Promise<User[]> {
    const { name, email } = parseInput(UserFilterSchema, filter, "user filter");
    return queryEntities(
      this.deps.store,
      {
        index: GSI.TYPE,
        partition: ENTITY_TYPE.USER,
        filter: definedFilter({ name, email }),
      },
      decodeUser,
      options
    );
  }

  /**
   * Check a plain password against the stored hash
   */
  async checkPassword(userId: string, password: string, options?: OperationOptions): Promise<boolean> {
    const user = await this.get(userId, options);
    return verifyPassword(password, user.password);
  }
}
