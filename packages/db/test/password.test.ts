import { describe, it, expect } from "vitest";
import { hashPassword, verifyPassword } from "../src/index.js";

describe("password hashing", () => {
  it("stores a salted scrypt hash", async () => {
    const stored = await hashPassword("test-password");

    expect(stored).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{64}$/);
    expect(await hashPassword("test-password")).not.toBe(stored);
  });

  it("verifies only the original password", async () => {
    const stored = await hashPassword("test-password");

    expect(await verifyPassword("test-password", stored)).toBe(true);
    expect(await verifyPassword("other-password", stored)).toBe(false);
  });

  it("rejects values that are not scrypt hashes", async () => {
    expect(await verifyPassword("test-password", "test-password")).toBe(false);
    expect(await verifyPassword("test-password", "bcrypt$00$11")).toBe(false);
  });
});
