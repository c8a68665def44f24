import path from "node:path";
import crypto from "node:crypto";
import { AGTX_DIRNAME, slugify } from "./utils.js";
import { TaskStatus, type Task } from "./types.js";

export const WINDOW_PREFIX = "task-";
export const BRANCH_PREFIX = "task/";

export type NewTask = {
  title: string;
  agent: string;
  projectId: string;
  description?: string;
  id?: string;
  now?: Date;
};

export function taskSlug(id: string, title: string) {
  const short = id.replace(/-/g, "").slice(0, 8);
  const s = slugify(title);
  return s ? `${short}-${s}` : short;
}

export function createTask(input: NewTask): Task {
  const id = input.id ?? crypto.randomUUID();
  const ts = (input.now ?? new Date()).toISOString();
  return {
    id,
    slug: taskSlug(id, input.title),
    title: input.title,
    description: input.description,
    agent: input.agent,
    projectId: input.projectId,
    status: TaskStatus.Backlog,
    createdAt: ts,
    updatedAt: ts,
  };
}

export function worktreesDir(projectRoot: string) {
  return path.join(projectRoot, AGTX_DIRNAME, "worktrees");
}

// <root>/.agtx/worktrees/<slug>
export function worktreePathFor(projectRoot: string, slug: string) {
  return path.join(worktreesDir(projectRoot), slug);
}

export function windowNameFor(slug: string) {
  return `${WINDOW_PREFIX}${slug}`;
}

export function windowTargetFor(sessionName: string, slug: string) {
  return `${sessionName}:${windowNameFor(slug)}`;
}

export function branchNameFor(slug: string) {
  return `${BRANCH_PREFIX}${slug}`;
}

/** Splits "session:window" into its parts; the window part may itself contain ':'. */
export function parseTarget(target: string): { session: string; window: string } {
  const i = target.indexOf(":");
  if (i < 0) return { session: target, window: "" };
  return { session: target.slice(0, i), window: target.slice(i + 1) };
}
