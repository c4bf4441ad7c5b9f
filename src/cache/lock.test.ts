import { describe, expect, it } from "vitest";
import { Lock } from "./lock.js";

describe("Lock", () => {
  it("returns the result of the guarded call", () => {
    const lock = new Lock();
    expect(lock.run(() => 42)).toBe(42);
  });

  it("rejects a nested acquire", () => {
    const lock = new Lock();
    expect(() => lock.run(() => lock.run(() => 1))).toThrow(
      "[lru2q]: re-entrant call, an eviction callback must not use its own cache"
    );
  });

  it("releases when the guarded call throws", () => {
    const lock = new Lock();
    expect(() =>
      lock.run(() => {
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(lock.run(() => "free")).toBe("free");
  });

  it("ignores a stale release", () => {
    const lock = new Lock();
    const first = lock.acquire();
    first();
    const second = lock.acquire();
    first();

    expect(() => lock.acquire()).toThrow(/re-entrant/);
    second();
    expect(() => lock.acquire()).not.toThrow();
  });
});
