import { describe, expect, it } from "vitest";
import { BoundedExecutor } from "../src/services/executor.service";
import { deferred, flush } from "./helpers";

describe("BoundedExecutor", () => {
  it("rejects a non-positive bound", () => {
    expect(() => new BoundedExecutor(0)).toThrow(RangeError);
    expect(() => new BoundedExecutor(1.5)).toThrow(RangeError);
  });

  it("runs at most maxConcurrency tasks and starts waiters in order", async () => {
    const executor = new BoundedExecutor(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];
    let running = 0;
    let peak = 0;

    const results = gates.map((gate, index) =>
      executor.run(async () => {
        running++;
        peak = Math.max(peak, running);
        started.push(index);
        await gate.promise;
        running--;
        return index;
      }),
    );

    await flush();
    expect(started).toEqual([0, 1]);
    expect(executor.activeCount).toBe(2);
    expect(executor.pendingCount).toBe(2);

    gates[1].release();
    await flush();
    expect(started).toEqual([0, 1, 2]);
    expect(executor.pendingCount).toBe(1);

    gates[0].release();
    gates[2].release();
    gates[3].release();

    await expect(Promise.all(results)).resolves.toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
    expect(executor.activeCount).toBe(0);
  });

  it("frees the slot when a task fails", async () => {
    const executor = new BoundedExecutor(1);

    await expect(
      executor.run(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(executor.run(async () => "ok")).resolves.toBe("ok");
    expect(executor.activeCount).toBe(0);
  });
});
