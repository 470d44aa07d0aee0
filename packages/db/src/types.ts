/**
 * Entity Types
 * Domain entities and the validated input models that create and patch them
 */

import { z } from "zod";

// ============================================================
// ENTITIES (what you get from a repository)
// ============================================================

export const UserSchema = z.object({
  user_id: z.string().uuid(),
  name: z.string(),
  email: z.string(),
  /** scrypt hash, never the plain password */
  password: z.string(),
});

export const BlogSchema = z.object({
  blog_id: z.string().uuid(),
  title: z.string(),
  score: z.number().finite(),
  created_date: z.string().datetime(),
  user_id: z.string().uuid(),
});

export const CommentSchema = z.object({
  blog_id: z.string().uuid(),
  user_id: z.string().uuid(),
  created_date: z.string().datetime(),
  message: z.string(),
});

export type User = z.infer<typeof UserSchema>;
export type Blog = z.infer<typeof BlogSchema>;
export type Comment = z.infer<typeof CommentSchema>;

/** User as returned outward, without the password hash */
export type PublicUser = Omit<User, "password">;

// ============================================================
// INPUT MODELS (what callers send)
// ============================================================

const name = z.string().trim().min(1).max(100);
const email = z.string().trim().email();
const password = z.string().min(8).max(128);
const title = z.string().trim().min(1).max(200);
const score = z.number().finite();
const message = z.string().trim().min(1).max(2000);

export const UserCreateSchema = z.object({ name, email, password }).strict();

export const UserPatchSchema = z
  .object({ name, email, password })
  .partial()
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, {
    message: "Patch must set at least one field",
  });

export const BlogCreateSchema = z
  .object({
    title,
    score: score.default(0),
    user_id: z.string().uuid(),
  })
  .strict();

// user_id is fixed at creation: a blog cannot move between owners
export const BlogPatchSchema = z
  .object({ title, score })
  .partial()
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, {
    message: "Patch must set at least one field",
  });

export const CommentCreateSchema = z
  .object({
    blog_id: z.string().uuid(),
    user_id: z.string().uuid(),
    message,
  })
  .strict();

export const CommentPatchSchema = z.object({ message }).strict();

export type UserCreate = z.input<typeof UserCreateSchema>;
export type UserPatch = z.input<typeof UserPatchSchema>;
export type BlogCreate = z.input<typeof BlogCreateSchema>;
export type BlogPatch = z.input<typeof BlogPatchSchema>;
export type CommentCreate = z.input<typeof CommentCreateSchema>;
export type CommentPatch = z.input<typeof CommentPatchSchema>;

// ============================================================
// LIST FILTERS
// ============================================================

export const UserFilterSchema = z
  .object({ name: z.string().min(1), email: z.string().min(1) })
  .partial()
  .strict();

export const BlogFilterSchema = z
  .object({ user_id: z.string().uuid(), title: z.string().min(1) })
  .partial()
  .strict();

export const CommentFilterSchema = z
  .object({ blog_id: z.string().uuid(), user_id: z.string().uuid() })
  .partial()
  .strict();

export type UserFilter = z.infer<typeof UserFilterSchema>;
export type BlogFilter = z.infer<typeof BlogFilterSchema>;
export type CommentFilter = z.infer<typeof CommentFilterSchema>;
