import { describe, it, expect } from "vitest";
import { MemoryKvStore } from "./store";

function clock(start = 1_000) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe("MemoryKvStore", () => {
  it("returns what was set until the TTL runs out", async () => {
    const c = clock();
    const store = new MemoryKvStore({ now: c.now });

    await store.set("k", { v: 1 }, 10);
    expect(await store.get("k")).toEqual({ v: 1 });

    c.advance(9_999);
    expect(await store.get("k")).toEqual({ v: 1 });

    c.advance(1);
    expect(await store.get("k")).toBeNull();
  });

  it("defaults to a one hour TTL", async () => {
    const c = clock();
    const store = new MemoryKvStore({ now: c.now });

    await store.set("k", "v");
    c.advance(60 * 60 * 1000 - 1);
    expect(await store.get("k")).toBe("v");
    c.advance(1);
    expect(await store.get("k")).toBeNull();
  });

  it("treats a TTL <= 0 as a delete", async () => {
    const store = new MemoryKvStore();
    await store.set("k", "v", 60);
    await store.set("k", "other", 0);
    expect(await store.get("k")).toBeNull();
  });

  it("ignores empty keys", async () => {
    const store = new MemoryKvStore();
    await store.set("", "v");
    expect(await store.get("")).toBeNull();
    expect(store.size).toBe(0);
  });

  it("evicts the oldest entries past the cap", async () => {
    const c = clock();
    const store = new MemoryKvStore({ now: c.now, maxEntries: 2, sweepEveryMs: 0 });

    await store.set("a", 1);
    await store.set("b", 2);
    await store.set("c", 3);

    expect(store.size).toBe(2);
    expect(await store.get("a")).toBeNull();
    expect(await store.get("b")).toBe(2);
    expect(await store.get("c")).toBe(3);
  });

  it("sweeps expired entries", async () => {
    const c = clock();
    const store = new MemoryKvStore({ now: c.now, sweepEveryMs: 0 });

    await store.set("short", 1, 1);
    await store.set("long", 2, 100);
    c.advance(2_000);

    expect(await store.get("long")).toBe(2);
    expect(store.size).toBe(1);
  });
});
