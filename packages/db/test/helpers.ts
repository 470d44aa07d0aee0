import { createRepositories, MemoryEntityStore } from "../src/index.js";

export const NOW = "2026-01-02T03:04:05.000Z";

export const U1 = "00000000-0000-4000-8000-000000000001";
export const U2 = "00000000-0000-4000-8000-000000000002";
export const B1 = "00000000-0000-4000-8000-000000000003";
export const B2 = "00000000-0000-4000-8000-000000000004";
export const B3 = "00000000-0000-4000-8000-000000000005";
export const MISSING = "00000000-0000-4000-8000-0000000000ff";

/**
 * Repositories over a fresh memory store, handing out the given ids in order
 */
export function setup(ids: string[] = []) {
  const store = new MemoryEntityStore();
  const queue = [...ids];
  const repos = createRepositories({
    store,
    clock: () => new Date(NOW),
    generateId: () => {
      const id = queue.shift();
      if (!id) throw new Error("test ran out of ids");
      return id;
    },
  });
  return { store, repos };
}

export const ada = { name: "Ada", email: "ada@example.com", password: "correct-horse" };
export const bob = { name: "Bob", email: "bob@example.com", password: "battery-staple" };
