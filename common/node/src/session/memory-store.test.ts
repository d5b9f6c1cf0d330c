/**
 * Unit tests for the in-memory session store.
 */

import { describe, it, expect } from "vitest";
import { MemoryStore } from "./memory-store.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("MemoryStore", () => {
  it("should assign an id to a new record", async () => {
    const store = new MemoryStore();
    const id = await store.save({ data: { user: "alice" } });

    expect(id).toMatch(UUID);
    expect(await store.load(id)).toEqual({ id, data: { user: "alice" }, expiresAt: undefined });
  });

  it("should keep the id of an existing record", async () => {
    const store = new MemoryStore();
    const id = await store.save({ data: { n: 1 } });
    expect(await store.save({ id, data: { n: 2 } })).toBe(id);

    const record = await store.load(id);
    expect(record?.data).toEqual({ n: 2 });
    expect(store.size).toBe(1);
  });

  it("should return null for unknown ids", async () => {
    expect(await new MemoryStore().load("unknown")).toBeNull();
  });

  it("should copy data in and out", async () => {
    const store = new MemoryStore();
    const data = { cart: ["apple"] };
    const id = await store.save({ data });

    data.cart.push("pear");
    const first = await store.load(id);
    expect(first?.data).toEqual({ cart: ["apple"] });

    const loaded = first?.data.cart;
    if (Array.isArray(loaded)) loaded.push("plum");
    const second = await store.load(id);
    expect(second?.data).toEqual({ cart: ["apple"] });
  });

  it("should stop returning a record once it expires", async () => {
    let now = 0;
    const store = new MemoryStore({ clock: { now: () => now } });
    const id = await store.save({ data: {}, expiresAt: 100 });

    now = 99;
    expect(await store.load(id)).toEqual({ id, data: {}, expiresAt: 100 });
    now = 100;
    expect(await store.load(id)).toBeNull();
  });

  it("should delete records", async () => {
    const store = new MemoryStore();
    const id = await store.save({ data: { a: 1 } });

    await store.delete(id);
    expect(await store.load(id)).toBeNull();
    await expect(store.delete(id)).resolves.toBeUndefined();
  });

  it("should keep distinct sessions apart", async () => {
    const store = new MemoryStore();
    const [a, b] = await Promise.all([store.save({ data: { who: "a" } }), store.save({ data: { who: "b" } })]);

    expect(a).not.toBe(b);
    expect((await store.load(a))?.data).toEqual({ who: "a" });
    expect((await store.load(b))?.data).toEqual({ who: "b" });
  });

  it("should evict the oldest session when full", async () => {
    const store = new MemoryStore({ maxEntries: 1 });
    const first = await store.save({ data: {} });
    const second = await store.save({ data: {} });

    expect(await store.load(first)).toBeNull();
    expect(await store.load(second)).not.toBeNull();
  });

  it("should drop abandoned expired sessions on the next save", async () => {
    let now = 0;
    const store = new MemoryStore({ clock: { now: () => now } });
    for (let i = 0; i < 1000; i++) {
      await store.save({ data: { i }, expiresAt: 10 });
    }
    expect(store.size).toBe(1000);

    now = 100;
    const id = await store.save({ data: { fresh: true } });

    expect(store.size).toBe(1);
    expect((await store.load(id))?.data).toEqual({ fresh: true });
  });

  it("should keep live sessions when purging", async () => {
    let now = 0;
    const store = new MemoryStore({ clock: { now: () => now } });
    const stale = await store.save({ data: {}, expiresAt: 10 });
    const live = await store.save({ data: {}, expiresAt: 500 });

    now = 10;
    await store.save({ data: {} });

    expect(store.size).toBe(2);
    expect(await store.load(stale)).toBeNull();
    expect(await store.load(live)).not.toBeNull();
  });
});
