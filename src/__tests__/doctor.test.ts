import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { findOrphanWorktrees, inspectTask } from "../doctor.js";
import { PROJECT, WORKTREE, makeHarness, makeTask, makeTempDir, removeTempDirs, seedResources } from "./helpers.js";

describe("inspectTask", () => {
  function deps(h: ReturnType<typeof makeHarness>) {
    return { project: PROJECT, worktrees: h.worktrees, sessions: h.sessions };
  }

  it("a running task with both resources is consistent", async () => {
    const h = makeHarness();
    seedResources(h);
    expect(await inspectTask(makeTask("running"), deps(h))).toEqual({
      worktree: true,
      window: true,
      expected: true,
      consistent: true,
    });
  });

  it("flags a worktree left without its window", async () => {
    const h = makeHarness();
    h.worktrees.worktrees.add(WORKTREE);
    expect(await inspectTask(makeTask("planning"), deps(h))).toMatchObject({ worktree: true, window: false, consistent: false });
  });

  it("backlog and done tasks should own nothing", async () => {
    const h = makeHarness();
    expect(await inspectTask(makeTask("backlog"), deps(h))).toMatchObject({ expected: false, consistent: true });
    seedResources(h);
    expect(await inspectTask(makeTask("done"), deps(h))).toMatchObject({ expected: false, consistent: false });
  });

  it("only queries, never changes anything", async () => {
    const h = makeHarness();
    await inspectTask(makeTask("review"), deps(h));
    expect(h.log.effects()).toEqual([]);
    expect(h.log.ops().sort()).toEqual(["windowExists", "worktreeExists"]);
  });
});

describe("findOrphanWorktrees", () => {
  afterEach(removeTempDirs);

  it("lists directories that belong to no known task", async () => {
    const root = await makeTempDir();
    const base = path.join(root, ".agtx", "worktrees");
    for (const d of ["abc-one", "def-two", "ghi-three"]) await fs.mkdir(path.join(base, d), { recursive: true });
    await fs.writeFile(path.join(base, "notes.txt"), "x");

    expect(await findOrphanWorktrees(root, ["def-two"])).toEqual([
      path.join(base, "abc-one"),
      path.join(base, "ghi-three"),
    ]);
  });

  it("returns nothing when no worktree was ever created", async () => {
    expect(await findOrphanWorktrees(await makeTempDir(), [])).toEqual([]);
  });
});
