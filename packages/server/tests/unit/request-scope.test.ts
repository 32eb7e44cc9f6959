import { describe, expect, it, vi } from "vitest";
import { RequestScope } from "../../src/context/RequestScope.js";

describe("RequestScope", () => {
  it("generates a fresh request id per scope", () => {
    const a = new RequestScope();
    const b = new RequestScope();
    expect(a.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(a.requestId).not.toBe(b.requestId);
  });

  it("runs deferred actions in order on drain", async () => {
    const order: string[] = [];
    const scope = new RequestScope("r1");
    scope.defer("first", async () => order.push("first"));
    scope.defer("second", async () => order.push("second"));
    expect(scope.pendingCount).toBe(2);

    await scope.drain();

    expect(order).toEqual(["first", "second"]);
    expect(scope.pendingCount).toBe(0);
  });

  it("keeps going after a failing action", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const scope = new RequestScope("r2");
    const after = vi.fn(async () => undefined);
    scope.defer("input cleanup", async () => {
      throw new Error("EBUSY");
    });
    scope.defer("output cleanup", after);

    await expect(scope.drain()).resolves.toBeUndefined();

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      "[Request r2] Deferred input cleanup failed: EBUSY",
    );
    errorSpy.mockRestore();
  });

  it("runs each action once however often it is drained", async () => {
    const scope = new RequestScope("r3");
    const action = vi.fn(async () => undefined);
    scope.defer("cleanup", action);

    await Promise.all([scope.drain(), scope.drain()]);
    await scope.drain();

    expect(action).toHaveBeenCalledTimes(1);
  });

  it("refuses new actions once drained", async () => {
    const scope = new RequestScope("r4");
    await scope.drain();
    expect(() => scope.defer("late", async () => undefined)).toThrow(
      "Request scope r4 is already drained",
    );
  });

  it("re-runs its actions when drained again after work ends", async () => {
    const scope = new RequestScope("r5");
    const action = vi.fn(async () => undefined);
    scope.defer("cleanup", action);

    await expect(scope.redrain()).resolves.toBe(false);
    expect(scope.isDrained).toBe(false);
    expect(action).not.toHaveBeenCalled();

    await scope.drain();
    expect(scope.isDrained).toBe(true);

    await expect(scope.redrain()).resolves.toBe(true);
    expect(action).toHaveBeenCalledTimes(2);
  });
});
