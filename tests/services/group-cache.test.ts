/**
 * @fileoverview Tests for the group metadata cache.
 */

import { afterEach, describe, it, expect } from "vitest";
import { GroupCache } from "../../src/services/group-cache.js";

const chess = { id: 10, name: "Chess", members_count: 500 };

describe("GroupCache", () => {
  let cache: GroupCache | undefined;

  afterEach(() => {
    cache?.close();
    cache = undefined;
  });

  it("returns stored groups and counts hits and misses", () => {
    cache = new GroupCache(60);

    expect(cache.get(10)).toBeUndefined();
    expect(cache.set(chess)).toBe(true);
    expect(cache.get(10)).toEqual(chess);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, entries: 1 });
  });

  it("stores nothing when the TTL is 0", () => {
    cache = new GroupCache(0);

    expect(cache.set(chess)).toBe(false);
    expect(cache.get(10)).toBeUndefined();
    expect(cache.getStats()).toEqual({ hits: 0, misses: 1, entries: 0 });
  });

  it("drops inserts beyond maxKeys", () => {
    cache = new GroupCache(60, 1);

    expect(cache.set(chess)).toBe(true);
    expect(cache.set({ id: 11, name: "Go", members_count: 3 })).toBe(false);
    expect(cache.get(11)).toBeUndefined();
  });
});
