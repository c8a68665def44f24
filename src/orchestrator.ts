import type { AgentCommands } from "./agents.js";
import {
  InjectionFailedError,
  InvalidTransitionError,
  ProjectNotFoundError,
  ResourceCreationFailedError,
  ResourceRemovalFailedError,
  isProviderError,
  type EdgeInfo,
} from "./errors.js";
import { nullLogger, type Logger } from "./log.js";
import type { ProjectResolver } from "./projects.js";
import type { SessionProvider, WorktreeProvider } from "./providers/types.js";
import { classifyEdge, statusLabel } from "./status.js";
import { TaskQueue } from "./task-queue.js";
import { windowNameFor, windowTargetFor, worktreePathFor } from "./tasks.js";
import { TaskStatus, type Project, type SideEffect, type Task } from "./types.js";

type EdgeKey = `${TaskStatus}->${TaskStatus}`;

/** Side effects bound to each legal edge, in execution order. */
export const EDGE_EFFECTS: Partial<Record<EdgeKey, readonly SideEffect[]>> = {
  "backlog->planning": ["create-worktree", "create-window", "send-plan"],
  "planning->running": ["send-implement"],
  // window and worktree stay open for review
  "running->review": [],
  "review->done": ["kill-window", "remove-worktree"],
  // resume reuses the existing window and worktree
  "review->running": [],
};

export const DELETE_EFFECTS: readonly SideEffect[] = ["kill-window", "remove-worktree"];

export function effectsFor(from: TaskStatus, to: TaskStatus): readonly SideEffect[] | undefined {
  if (!classifyEdge(from, to)) return undefined;
  return EDGE_EFFECTS[`${from}->${to}`];
}

// backlog tasks own no resources
export function deleteEffectsFor(status: TaskStatus): readonly SideEffect[] {
  return status === TaskStatus.Backlog ? [] : DELETE_EFFECTS;
}

export type OrchestratorOptions = {
  worktrees: WorktreeProvider;
  sessions: SessionProvider;
  projects: ProjectResolver;
  commands: AgentCommands;
  logger?: Logger;
  now?: () => Date;
};

type Committed = Pick<Task, "status" | "worktreePath">;

type StepContext = {
  task: Task;
  project: Project;
  edge: EdgeInfo;
  target: string;
  worktreePath?: string;
};

function withWorktree(task: Task, worktreePath: string | undefined): Task {
  const { worktreePath: _old, ...rest } = task;
  return worktreePath ? { ...rest, worktreePath } : rest;
}

/**
 * Moves tasks between statuses and fires the side effects bound to each
 * edge. At most one transition per task runs at a time; a failed step
 * leaves the status untouched and earlier steps are not rolled back.
 */
export class TransitionOrchestrator {
  private readonly worktrees: WorktreeProvider;
  private readonly sessions: SessionProvider;
  private readonly projects: ProjectResolver;
  private readonly commands: AgentCommands;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly queue = new TaskQueue<Committed>();

  constructor(opts: OrchestratorOptions) {
    this.worktrees = opts.worktrees;
    this.sessions = opts.sessions;
    this.projects = opts.projects;
    this.commands = opts.commands;
    this.logger = opts.logger ?? nullLogger;
    this.now = opts.now ?? (() => new Date());
  }

  /** True while a transition or delete for this task is running or queued. */
  isBusy(taskId: string) {
    return this.queue.busy(taskId);
  }

  requestTransition(task: Task, to: TaskStatus): Promise<Task> {
    return this.queue.run(task.id, async () => {
      const base = this.latest(task);
      const from = base.status;
      const effects = effectsFor(from, to);
      if (!effects) {
        const err = new InvalidTransitionError(task.id, from, to);
        this.logger.error(`${task.slug}: ${err.message}`);
        throw err;
      }
      const project = this.resolveProject(base);
      const ctx = this.context(base, project, { taskId: task.id, from, to });

      await this.runSteps(effects, ctx);

      const keep = to === TaskStatus.Done ? undefined : ctx.worktreePath ?? base.worktreePath;
      const next: Task = { ...withWorktree(base, keep), status: to, updatedAt: this.now().toISOString() };
      this.queue.commit(task.id, { status: next.status, worktreePath: next.worktreePath });
      this.logger.ok(`${task.slug}: ${statusLabel(from)} → ${statusLabel(to)}`);
      return next;
    });
  }

  async deleteTask(task: Task): Promise<void> {
    await this.queue.run(task.id, async () => {
      const base = this.latest(task);
      const effects = deleteEffectsFor(base.status);
      if (effects.length > 0) {
        const project = this.resolveProject(base);
        await this.runSteps(effects, this.context(base, project, { taskId: task.id, from: base.status, to: "deleted" }));
      }
      this.logger.ok(`${task.slug}: deleted`);
    });
    this.queue.release(task.id);
  }

  // The caller's copy may predate a transition that was queued ahead of it
  private latest(task: Task): Task {
    const c = this.queue.committed(task.id);
    if (!c) return task;
    return { ...withWorktree(task, c.worktreePath), status: c.status };
  }

  private resolveProject(task: Task): Project {
    const project = this.projects.get(task.projectId);
    if (!project) {
      const err = new ProjectNotFoundError(task.projectId);
      this.logger.error(`${task.slug}: ${err.message}`);
      throw err;
    }
    return project;
  }

  private context(task: Task, project: Project, edge: EdgeInfo): StepContext {
    return { task, project, edge, target: windowTargetFor(project.sessionName, task.slug) };
  }

  private async runSteps(steps: readonly SideEffect[], ctx: StepContext) {
    for (const step of steps) {
      this.logger.debug(`${ctx.task.slug}: ${step}`);
      try {
        await this.runStep(step, ctx);
      } catch (e) {
        this.logger.error(`${ctx.task.slug}: ${e instanceof Error ? e.message : String(e)}`);
        throw e;
      }
    }
  }

  private async runStep(step: SideEffect, ctx: StepContext): Promise<void> {
    const { task, project, edge, target } = ctx;
    switch (step) {
      case "create-worktree":
        try {
          ctx.worktreePath = await this.worktrees.createWorktree(project.root, task.slug);
        } catch (e) {
          throw new ResourceCreationFailedError(edge, step, "worktree", e);
        }
        return;
      case "create-window": {
        const cwd = ctx.worktreePath ?? task.worktreePath ?? worktreePathFor(project.root, task.slug);
        try {
          await this.sessions.createWindow(project.sessionName, windowNameFor(task.slug), cwd);
        } catch (e) {
          throw new ResourceCreationFailedError(edge, step, "window", e);
        }
        return;
      }
      case "send-plan":
      case "send-implement": {
        const text = step === "send-plan" ? this.commands.plan(task) : this.commands.implement(task);
        try {
          await this.sessions.sendKeys(target, text);
        } catch (e) {
          throw new InjectionFailedError(edge, step, target, e);
        }
        return;
      }
      case "kill-window":
        try {
          await this.sessions.killWindow(target);
        } catch (e) {
          if (isProviderError(e, "not-found")) return;
          throw new ResourceRemovalFailedError(edge, step, "window", e);
        }
        return;
      case "remove-worktree": {
        const wt = task.worktreePath ?? worktreePathFor(project.root, task.slug);
        try {
          await this.worktrees.removeWorktree(project.root, wt);
        } catch (e) {
          if (isProviderError(e, "not-found")) {
            this.logger.debug(`${task.slug}: worktree already gone (${wt})`);
            return;
          }
          throw new ResourceRemovalFailedError(edge, step, "worktree", e);
        }
        return;
      }
    }
  }
}
