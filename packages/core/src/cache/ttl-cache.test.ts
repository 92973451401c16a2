import { describe, it, expect } from "vitest";
import { TtlCache } from "./ttl-cache.js";

function clock(start = 0) {
  const state = { now: start };
  return { state, now: () => state.now };
}

describe("TtlCache", () => {
  it("serves an entry until its TTL has elapsed", () => {
    const c = clock();
    const cache = new TtlCache<string>({ now: c.now });
    cache.set("a", "alpha", 100);

    c.state.now = 99;
    expect(cache.getValue("a")).toBe("alpha");

    c.state.now = 100;
    expect(cache.getValue("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("evicts the oldest 20% once maxEntries is exceeded", () => {
    const cache = new TtlCache<number>({ maxEntries: 5 });
    for (let i = 0; i < 6; i++) cache.set(`k${i}`, i, 1000);

    expect(cache.size).toBe(5);
    expect(cache.has("k0")).toBe(false);
    expect(cache.has("k5")).toBe(true);
  });

  it("treats a re-inserted key as the newest", () => {
    const cache = new TtlCache<number>({ maxEntries: 3 });
    cache.set("a", 1, 1000);
    cache.set("b", 2, 1000);
    cache.set("c", 3, 1000);
    cache.set("a", 10, 1000);
    cache.set("d", 4, 1000);

    expect(cache.has("b")).toBe(false);
    expect(cache.getValue("a")).toBe(10);
  });

  it("clears by substring pattern", () => {
    const cache = new TtlCache<number>();
    cache.set("seo_data:example.com:{}", 1, 1000);
    cache.set("seo_data:other.org:{}", 2, 1000);
    cache.set("client_data:example.com:{}", 3, 1000);

    expect(cache.clear("example.com")).toBe(2);
    expect(cache.size).toBe(1);
    expect(cache.clear()).toBe(1);
  });

  it("sweeps expired entries and skips them in values()", () => {
    const c = clock();
    const cache = new TtlCache<string>({ now: c.now });
    cache.set("short", "s", 10);
    cache.set("long", "l", 1000);

    c.state.now = 50;
    expect(cache.values()).toEqual(["l"]);

    cache.set("short", "s2", 10);
    c.state.now = 100;
    expect(cache.sweep()).toBe(1);
    expect(cache.size).toBe(1);
  });
});
