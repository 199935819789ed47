import { describe, expect, test } from "vitest";
import { KeyedMutex } from "../keyed-mutex.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  test("tasks on one key run one at a time, in order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.run("dev-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.run("dev-1", () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  test("different keys do not wait for each other", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.run("dev-1", async () => {
      await gate.promise;
      order.push("dev-1");
    });
    await mutex.run("dev-2", () => {
      order.push("dev-2");
    });

    expect(order).toEqual(["dev-2"]);
    gate.resolve();
    await blocked;
    expect(order).toEqual(["dev-2", "dev-1"]);
  });

  test("a rejected task does not block the next one", async () => {
    const mutex = new KeyedMutex();
    const failing = mutex.run("dev-1", () => {
      throw new Error("boom");
    });
    const next = mutex.run("dev-1", () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  test("idle keys are released", async () => {
    const mutex = new KeyedMutex();
    await mutex.run("dev-1", () => 1);
    // The cleanup link runs a couple of microtasks after the result settles
    await new Promise((resolve) => setImmediate(resolve));
    expect(mutex.activeKeys).toBe(0);
  });
});
