import { describe, it, expect } from "vitest";
import {
  blogKey,
  commentKey,
  indexKeyForUserBlogs,
  indexKeyForUserComments,
  typeIndexKey,
  userKey,
} from "../src/index.js";

describe("key builder", () => {
  it("keys a user by its own partition", () => {
    expect(userKey("u1")).toEqual({ PK: "USER#u1", SK: "USER#u1" });
  });

  it("keys a blog by its own partition", () => {
    expect(blogKey("b1")).toEqual({ PK: "BLOG#b1", SK: "BLOG#b1" });
  });

  it("places a comment in its blog's partition", () => {
    expect(commentKey("b1", "u1")).toEqual({ PK: "BLOG#b1", SK: "COMMENT#u1" });
    expect(commentKey("b1", "u1").PK).toBe(blogKey("b1").PK);
  });

  it("re-keys blogs and comments by owner for the owner index", () => {
    expect(indexKeyForUserBlogs("u1", "b1")).toEqual({ pk: "USER#u1", sk: "BLOG#b1" });
    expect(indexKeyForUserComments("u1", "b1")).toEqual({ pk: "USER#u1", sk: "COMMENT#b1" });
  });

  it("joins composite ids in the type index", () => {
    expect(typeIndexKey("COMMENT", "b1", "u1")).toEqual({ pk: "COMMENT", sk: "COMMENT#b1#u1" });
    expect(typeIndexKey("USER", "u1")).toEqual({ pk: "USER", sk: "USER#u1" });
  });

  it("is deterministic", () => {
    expect(commentKey("b1", "u1")).toEqual(commentKey("b1", "u1"));
  });
});
