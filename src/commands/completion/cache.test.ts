import { describe, expect, it, vi } from "vitest";
import { CompletionCache } from "./cache";

describe("CompletionCache", () => {
  it("keys entries by node, position, type and truncated partial", () => {
    const cache = new CompletionCache({ partialKeyLength: 3 });

    expect(cache.key(7, 1, "actor", "StevenSon")).toBe("7:1:actor:ste");
  });

  it("computes once per key and hands the truncated partial to the producer", () => {
    const cache = new CompletionCache({ partialKeyLength: 2 });
    const compute = vi.fn((partial: string) => [`${partial}-one`, `${partial}-two`]);

    const first = cache.getOrCompute(1, 0, "actor", "Steve", compute);
    const second = cache.getOrCompute(1, 0, "actor", "stone", compute);

    expect(first).toEqual(["st-one", "st-two"]);
    expect(second).toBe(first);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(compute).toHaveBeenCalledWith("st");
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("drops entries after the ttl", async () => {
    const cache = new CompletionCache({ ttlMs: 20 });
    cache.set("k", ["a"]);
    expect(cache.get("k")).toEqual(["a"]);

    await new Promise((resolve) => setTimeout(resolve, 60));

    expect(cache.get("k")).toBeUndefined();
  });

  it("computes every time when the ttl is zero", async () => {
    const cache = new CompletionCache({ ttlMs: 0 });
    const compute = vi.fn(() => ["Steve"]);

    cache.getOrCompute(1, 0, "actor", "", compute);
    await new Promise((resolve) => setTimeout(resolve, 30));
    const second = cache.getOrCompute(1, 0, "actor", "", compute);

    expect(compute).toHaveBeenCalledTimes(2);
    expect(second).toEqual(["Steve"]);
    expect(Object.isFrozen(second)).toBe(true);
    expect(cache.size).toBe(0);
  });

  it("evicts the least recently used entry past the size bound", () => {
    const cache = new CompletionCache({ maxEntries: 2 });
    cache.set("a", ["1"]);
    cache.set("b", ["2"]);
    cache.get("a");
    cache.set("c", ["3"]);

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toEqual(["1"]);
    expect(cache.size).toBe(2);
  });

  it("clears everything on invalidate", () => {
    const cache = new CompletionCache();
    cache.set("a", ["1"]);

    cache.invalidate();

    expect(cache.size).toBe(0);
  });
});
