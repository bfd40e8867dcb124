import { describe, expect, it } from "vitest";
import { ResourceBudget } from "../src/execution/resourceBudget.js";
import { rejected } from "./helpers.js";

describe("ResourceBudget", () => {
  it("grants immediately while capacity remains", async () => {
    const budget = new ResourceBudget(4);
    const r1 = await budget.acquire({ cpus: 2, memoryMb: null });
    await budget.acquire({ cpus: 2, memoryMb: null });
    expect(budget.available.cpus).toBe(0);
    r1();
    r1();
    expect(budget.available.cpus).toBe(2);
  });

  it("queues requests in arrival order", async () => {
    const budget = new ResourceBudget(4);
    const first = await budget.acquire({ cpus: 3, memoryMb: null });

    const granted: string[] = [];
    const big = budget.acquire({ cpus: 4, memoryMb: null }).then((release) => {
      granted.push("big");
      return release;
    });
    const small = budget.acquire({ cpus: 1, memoryMb: null }).then((release) => {
      granted.push("small");
      return release;
    });
    expect(budget.waiting).toBe(2);

    first();
    const releaseBig = await big;
    expect(granted).toEqual(["big"]);
    releaseBig();
    await small;
    expect(granted).toEqual(["big", "small"]);
    expect(budget.waiting).toBe(0);
  });

  it("accounts memory alongside cpus", async () => {
    const budget = new ResourceBudget(8, 10000);
    await budget.acquire({ cpus: 1, memoryMb: 8000 });
    let granted = false;
    const pending = budget.acquire({ cpus: 1, memoryMb: 4000 }).then((release) => {
      granted = true;
      return release;
    });
    await Promise.resolve();
    expect(granted).toBe(false);
    expect(budget.available).toEqual({ cpus: 7, memoryMb: 2000 });
    expect(budget.waiting).toBe(1);
    void pending;
  });

  it("rejects requests larger than the whole budget", async () => {
    const budget = new ResourceBudget(2, 1000);
    const err = await rejected(budget.acquire({ cpus: 3, memoryMb: null }));
    expect(err).toHaveProperty("message", "request for 3 cpus exceeds budget of 2");
    const memErr = await rejected(budget.acquire({ cpus: 1, memoryMb: 2000 }));
    expect(memErr).toHaveProperty("message", "request for 2000 MB exceeds budget of 1000 MB");
  });
});
