import { afterEach, describe, expect, it } from "vitest";
import { CooldownStore, cooldownKey } from "./cooldown-store";

describe("CooldownStore", () => {
  let now = 1_000;
  const stores: CooldownStore[] = [];

  function createStore(sweepIntervalMs = 0): CooldownStore {
    const store = new CooldownStore({ now: () => now, sweepIntervalMs });
    stores.push(store);
    return store;
  }

  afterEach(() => {
    for (const store of stores.splice(0)) {
      store.stop();
    }
    now = 1_000;
  });

  it("builds keys from the sender and the command path", () => {
    expect(cooldownKey("player:steve", ["eco", "give"])).toBe("player:steve:eco give");
  });

  it("starts a window on acquire and reports the time left", () => {
    const store = createStore();
    const key = cooldownKey("player:steve", ["tp"]);

    expect(store.tryAcquire(key, 5_000)).toEqual({ acquired: true });
    now += 1_500;
    expect(store.tryAcquire(key, 5_000)).toEqual({ acquired: false, remainingMs: 3_500 });
    expect(store.isActive(key)).toBe(true);

    now += 3_500;
    expect(store.remaining(key)).toBe(0);
    expect(store.tryAcquire(key, 5_000)).toEqual({ acquired: true });
  });

  it("does not track zero-length windows", () => {
    const store = createStore();

    expect(store.tryAcquire("a:tp", 0)).toEqual({ acquired: true });
    expect(store.size).toBe(0);
  });

  it("resets one key or every key of a sender", () => {
    const store = createStore();
    store.tryAcquire("player:steve:tp", 1_000);
    store.tryAcquire("player:steve:eco give", 1_000);
    store.tryAcquire("player:alex:tp", 1_000);

    expect(store.reset("player:alex:tp")).toBe(true);
    expect(store.reset("player:alex:tp")).toBe(false);
    expect(store.resetSender("player:steve")).toBe(2);
    expect(store.size).toBe(0);
  });

  it("sweeps expired windows only", () => {
    const store = createStore();
    store.tryAcquire("a:short", 100);
    store.tryAcquire("a:long", 10_000);

    now += 500;

    expect(store.sweep()).toBe(1);
    expect(store.size).toBe(1);
    expect(store.isActive("a:long")).toBe(true);
  });
});
