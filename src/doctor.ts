import path from "node:path";
import fg from "fast-glob";
import type { SessionProvider, WorktreeProvider } from "./providers/types.js";
import { windowTargetFor, worktreesDir } from "./tasks.js";
import { TaskStatus, type Project, type Task } from "./types.js";
import { pathExists } from "./utils.js";

export type ResourceReport = {
  worktree: boolean;
  window: boolean;
  // whether the status says both should exist
  expected: boolean;
  consistent: boolean;
};

const WITH_RESOURCES: readonly TaskStatus[] = [TaskStatus.Planning, TaskStatus.Running, TaskStatus.Review];

/**
 * Reports what actually exists for a task. A failed multi-step edge shows
 * up here as `consistent: false`, e.g. a worktree without its window.
 */
export async function inspectTask(
  task: Task,
  deps: { project: Project; worktrees: WorktreeProvider; sessions: SessionProvider },
): Promise<ResourceReport> {
  const [worktree, window] = await Promise.all([
    deps.worktrees.worktreeExists(deps.project.root, task.slug),
    deps.sessions.windowExists(windowTargetFor(deps.project.sessionName, task.slug)),
  ]);
  const expected = WITH_RESOURCES.includes(task.status);
  return { worktree, window, expected, consistent: worktree === expected && window === expected };
}

/** Directories under .agtx/worktrees whose slug belongs to no known task. */
export async function findOrphanWorktrees(projectRoot: string, knownSlugs: Iterable<string>): Promise<string[]> {
  const base = worktreesDir(projectRoot);
  if (!(await pathExists(base))) return [];
  const known = new Set(knownSlugs);
  const dirs = await fg(["*"], { cwd: base, onlyDirectories: true, deep: 1, dot: true });
  return dirs
    .filter((d) => !known.has(d))
    .sort()
    .map((d) => path.join(base, d));
}
