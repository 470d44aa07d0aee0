import { describe, it, expect } from "vitest";
import {
  BlogStoreError,
  CascadeError,
  ConflictError,
  ForeignKeyError,
  NotFoundError,
  StoreUnavailableError,
  ValidationError,
  isErrorKind,
  isRetryableError,
  toHttpStatus,
  wrapError,
} from "../src/index.js";

describe("error taxonomy", () => {
  it("tags NotFoundError with kind, code and status", () => {
    const error = new NotFoundError("User", "abc");
    expect(error.message).toBe("User not found: abc");
    expect(error.kind).toBe("NotFound");
    expect(error.code).toBe("NOT_FOUND_ERROR");
    expect(error.httpStatus).toBe(404);
    expect(error.retryable).toBe(false);
  });

  it("names the referencing entity in ForeignKeyError", () => {
    const error = new ForeignKeyError("User", "u1", "Blog");
    expect(error.message).toBe("Blog references missing User: u1");
    expect(error.code).toBe("FOREIGN_KEY_ERROR");
    expect(error.httpStatus).toBe(400);
  });

  it("marks StoreUnavailableError retryable", () => {
    const error = new StoreUnavailableError("down");
    expect(error.code).toBe("STORE_UNAVAILABLE_ERROR");
    expect(error.httpStatus).toBe(503);
    expect(isRetryableError(error)).toBe(true);
  });

  it("lists removed and remaining records in CascadeError", () => {
    const error = new CascadeError(
      { entityType: "User", id: "u1" },
      [{ entityType: "Blog", id: "b1" }],
      [
        { entityType: "Comment", id: "b2/u1" },
        { entityType: "User", id: "u1" },
      ],
      new Error("boom")
    );

    expect(error.message).toBe(
      "Cascade delete of User u1 failed after removing Blog b1; not removed: Comment b2/u1, User u1: boom"
    );
    expect(error.httpStatus).toBe(500);
    expect(error.pending).toHaveLength(2);
  });

  it("says nothing was removed when the first step fails", () => {
    const error = new CascadeError({ entityType: "Blog", id: "b1" }, [], [{ entityType: "Blog", id: "b1" }]);
    expect(error.message).toBe("Cascade delete of Blog b1 failed after removing nothing; not removed: Blog b1");
  });
});

describe("isErrorKind", () => {
  it("matches on the kind tag", () => {
    const error = new ConflictError("exists", "k");
    expect(isErrorKind(error, "Conflict")).toBe(true);
    expect(isErrorKind(error, "NotFound")).toBe(false);
  });

  it("rejects plain errors", () => {
    expect(isErrorKind(new Error("x"), "Unknown")).toBe(false);
  });
});

describe("wrapError", () => {
  it("returns blogstore errors unchanged", () => {
    const error = new ValidationError("bad");
    expect(wrapError(error)).toBe(error);
  });

  it("wraps a plain error and keeps it as the cause", () => {
    const cause = new Error("bad");
    const wrapped = wrapError(cause);
    expect(wrapped).toBeInstanceOf(BlogStoreError);
    expect(wrapped.kind).toBe("Unknown");
    expect(wrapped.cause).toBe(cause);
  });

  it("uses a thrown string as the message", () => {
    expect(wrapError("str").message).toBe("str");
  });
});

describe("toHttpStatus", () => {
  it("maps validation errors to 400 and unknown errors to 500", () => {
    expect(toHttpStatus(new ValidationError("x"))).toBe(400);
    expect(toHttpStatus(new Error("x"))).toBe(500);
  });
});

describe("isRetryableError", () => {
  it("treats connection resets as retryable", () => {
    expect(isRetryableError(new Error("read ECONNRESET"))).toBe(true);
    expect(isRetryableError(new Error("bad input"))).toBe(false);
  });
});

describe("toJSON", () => {
  it("includes kind and code", () => {
    const json = new NotFoundError("Blog", "b1").toJSON();
    expect(json.kind).toBe("NotFound");
    expect(json.code).toBe("NOT_FOUND_ERROR");
    expect(json.context).toEqual({ entityType: "Blog", entityId: "b1" });
  });
});
