/**
 * Unit tests for the canonical request and its extensions.
 */

import { describe, it, expect } from "vitest";
import { ExtensionKey, Extensions, createRequest, requestPathname } from "./request.js";

describe("Extensions", () => {
  it("should store and read typed values per key", () => {
    const user = new ExtensionKey<{ name: string }>("user");
    const count = new ExtensionKey<number>("count");
    const ext = new Extensions();

    ext.set(user, { name: "alice" });
    ext.set(count, 3);

    expect(ext.get(user)).toEqual({ name: "alice" });
    expect(ext.get(count)).toBe(3);
    expect(ext.keys()).toEqual(["user", "count"]);
  });

  it("should keep values of distinct keys with the same name apart", () => {
    const a = new ExtensionKey<string>("dup");
    const b = new ExtensionKey<string>("dup");
    const ext = new Extensions();

    ext.set(a, "from-a");
    expect(ext.has(a)).toBe(true);
    expect(ext.has(b)).toBe(false);
    expect(ext.get(b)).toBeUndefined();
  });

  it("should keep values of distinct requests apart", () => {
    const key = new ExtensionKey<string>("k");
    const first = new Extensions();
    const second = new Extensions();

    first.set(key, "one");
    expect(second.get(key)).toBeUndefined();
  });

  it("should delete a value", () => {
    const key = new ExtensionKey<string>("k");
    const ext = new Extensions();
    ext.set(key, "v");

    expect(ext.delete(key)).toBe(true);
    expect(ext.has(key)).toBe(false);
    expect(ext.keys()).toEqual([]);
    expect(ext.delete(key)).toBe(false);
  });
});

describe("createRequest", () => {
  it("should fill defaults", async () => {
    const request = createRequest();
    expect(request.method).toBe("GET");
    expect(request.path).toBe("/");
    expect([...request.headers.keys()]).toEqual([]);
    expect(await request.body.intoText()).toBe("");
    expect(request.extensions.keys()).toEqual([]);
  });

  it("should take headers in any Headers init form", () => {
    const request = createRequest({ method: "POST", path: "/a", headers: [["X-Trace", "t1"]] });
    expect(request.method).toBe("POST");
    expect(request.headers.get("x-trace")).toBe("t1");
  });
});

describe("requestPathname", () => {
  it("should strip the query string", () => {
    expect(requestPathname(createRequest({ path: "/items?page=2" }))).toBe("/items");
  });

  it("should return a path without query unchanged", () => {
    expect(requestPathname(createRequest({ path: "/items" }))).toBe("/items");
  });
});
