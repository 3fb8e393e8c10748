import { TtlLruCache } from "./ttlLruCache";

function cache(maxEntries: number, ttlMs = 1000) {
  let now = 0;
  const instance = new TtlLruCache<string, number>({ maxEntries, ttlMs, now: () => now });
  return { instance, advance: (ms: number) => (now += ms) };
}

describe("TtlLruCache", () => {
  it("returns what was stored until the entry expires", () => {
    const { instance, advance } = cache(4);
    expect(instance.get("a")).toBeUndefined();
    instance.set("a", 1);
    advance(999);
    expect(instance.get("a")).toBe(1);
    advance(1);
    expect(instance.get("a")).toBeUndefined();
    expect(instance.size).toBe(0);
  });

  it("does not extend the lifetime of an entry on a hit", () => {
    const { instance, advance } = cache(4);
    instance.set("a", 1);
    advance(600);
    instance.get("a");
    advance(600);
    expect(instance.get("a")).toBeUndefined();
  });

  it("evicts the least recently used entry", () => {
    const { instance } = cache(2);
    instance.set("a", 1);
    instance.set("b", 2);
    instance.get("a");
    instance.set("c", 3);
    expect(instance.get("b")).toBeUndefined();
    expect(instance.get("a")).toBe(1);
    expect(instance.get("c")).toBe(3);
  });

  it("overwrites an existing key without growing", () => {
    const { instance } = cache(2);
    instance.set("a", 1);
    instance.set("a", 2);
    instance.set("b", 3);
    expect(instance.size).toBe(2);
    expect(instance.get("a")).toBe(2);
  });

  it("supports delete and clear", () => {
    const { instance } = cache(3);
    instance.set("a", 1);
    instance.set("b", 2);
    expect(instance.delete("a")).toBe(true);
    expect(instance.delete("a")).toBe(false);
    instance.clear();
    expect(instance.size).toBe(0);
  });

  it("needs room for at least one entry", () => {
    expect(() => new TtlLruCache({ maxEntries: 0, ttlMs: 10 })).toThrow("maxEntries must be at least 1");
  });
});
