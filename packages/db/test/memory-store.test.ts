import { describe, it, expect, beforeEach } from "vitest";
import { ConflictError, StoreUnavailableError } from "@blogstore/core";
import { MemoryEntityStore } from "../src/index.js";

describe("MemoryEntityStore", () => {
  let store: MemoryEntityStore;

  beforeEach(() => {
    store = new MemoryEntityStore([
      { PK: "BLOG#b1", SK: "BLOG#b1", GSI2PK: "USER#u1", GSI2SK: "BLOG#b1", title: "One" },
      { PK: "BLOG#b2", SK: "BLOG#b2", GSI2PK: "USER#u1", GSI2SK: "BLOG#b2", title: "Two" },
      { PK: "BLOG#b1", SK: "COMMENT#u2", GSI2PK: "USER#u2", GSI2SK: "COMMENT#b1" },
    ]);
  });

  it("reads an item by exact key", async () => {
    expect(await store.get({ PK: "BLOG#b1", SK: "BLOG#b1" })).toMatchObject({ title: "One" });
    expect(await store.get({ PK: "BLOG#b9", SK: "BLOG#b9" })).toBeNull();
  });

  it("refuses to overwrite when the item must be absent", async () => {
    await expect(
      store.put({ PK: "BLOG#b1", SK: "BLOG#b1" }, { condition: "absent" })
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it("refuses to create when the item must be present", async () => {
    await expect(
      store.put({ PK: "BLOG#b9", SK: "BLOG#b9" }, { condition: "present" })
    ).rejects.toBeInstanceOf(ConflictError);
    expect(store.size).toBe(3);
  });

  it("reports whether a delete removed anything", async () => {
    expect(await store.delete({ PK: "BLOG#b2", SK: "BLOG#b2" })).toBe(true);
    expect(await store.delete({ PK: "BLOG#b2", SK: "BLOG#b2" })).toBe(false);
  });

  it("queries an index by partition and sort key prefix", async () => {
    const items = await store.query({
      index: "GSI2",
      partition: "USER#u1",
      sortKey: { beginsWith: "BLOG#" },
    });
    expect(items.map((i) => i.title)).toEqual(["One", "Two"]);
  });

  it("queries the table partition and applies the filter", async () => {
    const comments = await store.query({ partition: "BLOG#b1", sortKey: { beginsWith: "COMMENT#" } });
    expect(comments.map((i) => i.SK)).toEqual(["COMMENT#u2"]);

    const filtered = await store.query({
      index: "GSI2",
      partition: "USER#u1",
      filter: { title: "Two" },
    });
    expect(filtered.map((i) => i.PK)).toEqual(["BLOG#b2"]);
  });

  it("dumps every item, unaffected by later writes", async () => {
    const items = store.dump();
    await store.delete({ PK: "BLOG#b2", SK: "BLOG#b2" });

    expect(items.map((i) => `${String(i.PK)}|${String(i.SK)}`).sort()).toEqual([
      "BLOG#b1|BLOG#b1",
      "BLOG#b1|COMMENT#u2",
      "BLOG#b2|BLOG#b2",
    ]);
    expect(store.dump()).toHaveLength(2);
  });

  it("hands out copies", async () => {
    const item = await store.get({ PK: "BLOG#b1", SK: "BLOG#b1" });
    if (item) item.title = "Changed";
    expect(await store.get({ PK: "BLOG#b1", SK: "BLOG#b1" })).toMatchObject({ title: "One" });
  });

  it("fails an aborted call without touching the data", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      store.delete({ PK: "BLOG#b1", SK: "BLOG#b1" }, { signal: controller.signal })
    ).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(store.size).toBe(3);
  });
});
