import { describe, it, expect } from "vitest";
import { TaskQueue } from "../task-queue.js";

describe("TaskQueue", () => {
  it("runs work for one key in submission order", async () => {
    const q = new TaskQueue<string>();
    const seen: string[] = [];
    const slow = q.run("a", async () => {
      await new Promise((r) => setTimeout(r, 10));
      seen.push("first");
      return 1;
    });
    const fast = q.run("a", async () => {
      seen.push("second");
      return 2;
    });
    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(seen).toEqual(["first", "second"]);
  });

  it("keeps going after a rejected job", async () => {
    const q = new TaskQueue<string>();
    const bad = q.run("a", async () => { throw new Error("boom"); });
    const good = q.run("a", async () => "ok");
    await expect(bad).rejects.toThrow("boom");
    await expect(good).resolves.toBe("ok");
    expect(q.busy("a")).toBe(false);
  });

  it("tracks committed state and releases idle lanes", async () => {
    const q = new TaskQueue<string>();
    await q.run("a", async () => q.commit("a", "planning"));
    expect(q.committed("a")).toBe("planning");
    expect(q.size).toBe(1);
    q.release("a");
    expect(q.committed("a")).toBeUndefined();
    expect(q.size).toBe(0);
  });

  it("does not release a lane with queued work", async () => {
    const q = new TaskQueue<string>();
    const p = q.run("a", async () => "x");
    q.release("a");
    expect(q.size).toBe(1);
    await p;
  });
});
