import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import { createAgentCommands } from "../agents.js";
import { DEFAULT_IMPLEMENT_PROMPT, DEFAULT_PLAN_PROMPT } from "../config.js";
import { TransitionOrchestrator } from "../orchestrator.js";
import { ProjectRegistry } from "../projects.js";
import { CallLog, RecordingSessionProvider, RecordingWorktreeProvider } from "../providers/recording.js";
import { createTask } from "../tasks.js";
import type { Task, TaskStatus } from "../types.js";
import type { CommandResult, CommandRunner } from "../utils.js";

export const PROJECT = { id: "proj", root: "/proj", sessionName: "proj" };

export const FIXED_NOW = new Date("2026-01-02T03:04:05.000Z");

export function makeHarness() {
  const log = new CallLog();
  const worktrees = new RecordingWorktreeProvider(log);
  const sessions = new RecordingSessionProvider(log);
  const orchestrator = new TransitionOrchestrator({
    worktrees,
    sessions,
    projects: new ProjectRegistry([PROJECT]),
    commands: createAgentCommands({
      agents: {},
      prompts: { plan: DEFAULT_PLAN_PROMPT, implement: DEFAULT_IMPLEMENT_PROMPT },
    }),
    now: () => FIXED_NOW,
  });
  return { log, worktrees, sessions, orchestrator };
}

// id "abc12345-..." + title "My Feature" -> slug "abc12345-my-feature"
export function makeTask(status: TaskStatus = "backlog", overrides: Partial<Task> = {}): Task {
  const t = createTask({
    id: "abc12345-0000-4000-8000-000000000000",
    title: "My Feature",
    agent: "claude",
    projectId: PROJECT.id,
    now: new Date("2026-01-01T00:00:00.000Z"),
  });
  return { ...t, status, ...overrides };
}

export const SLUG = "abc12345-my-feature";
export const WORKTREE = "/proj/.agtx/worktrees/abc12345-my-feature";
export const TARGET = "proj:task-abc12345-my-feature";

/** A task in `status` whose window and worktree exist in the recording providers. */
export function seedResources(h: ReturnType<typeof makeHarness>) {
  h.worktrees.worktrees.add(WORKTREE);
  h.sessions.windows.set(TARGET, { workingDir: WORKTREE, input: [] });
}

export function ok(stdout = ""): CommandResult {
  return { ok: true, code: 0, stdout, stderr: "" };
}

export function fail(stderr: string, code: number | null = 1): CommandResult {
  return { ok: false, code, stdout: "", stderr };
}

/** Fake CommandRunner whose results come from `script`. */
export function scriptedRunner(script: (file: string, args: string[]) => CommandResult) {
  return vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(
    async (file, args) => script(file, args),
  );
}

const tempDirs: string[] = [];

export async function makeTempDir(prefix = "agtx-test-") {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempDirs() {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((d) => fs.rm(d, { recursive: true, force: true })));
}
