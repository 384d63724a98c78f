import { describe, it, expect } from "vitest";
import { WorkerPool } from "../pool.js";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("WorkerPool", () => {
  it("rejects a non-positive size", () => {
    expect(() => new WorkerPool(0)).toThrow("WorkerPool size must be a positive integer, got 0");
    expect(() => new WorkerPool(2.5)).toThrow(RangeError);
  });

  it("runs at most size tasks at once and queues the rest", async () => {
    const pool = new WorkerPool(2);
    const gates = [deferred<number>(), deferred<number>(), deferred<number>()];
    const results = gates.map((g) => pool.run(() => g.promise));

    await Promise.resolve();
    expect(pool.active).toBe(2);
    expect(pool.pending).toBe(1);

    gates[0].resolve(1);
    await results[0];
    await Promise.resolve();
    expect(pool.active).toBe(2);
    expect(pool.pending).toBe(0);

    gates[1].resolve(2);
    gates[2].resolve(3);
    expect(await Promise.all(results)).toEqual([1, 2, 3]);
    expect(pool.active).toBe(0);
  });

  it("starts queued tasks in FIFO order", async () => {
    const pool = new WorkerPool(1);
    const started: number[] = [];
    await Promise.all(
      [1, 2, 3, 4].map((n) =>
        pool.run(async () => {
          started.push(n);
          await new Promise((r) => setTimeout(r, 1));
        }),
      ),
    );
    expect(started).toEqual([1, 2, 3, 4]);
  });

  it("releases the slot when a task rejects", async () => {
    const pool = new WorkerPool(1);

    await expect(pool.run(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(pool.active).toBe(0);
    expect(await pool.run(async () => "next")).toBe("next");
  });
});
