import { ProviderError, type ProviderErrorKind } from "../errors.js";
import { worktreePathFor } from "../tasks.js";
import type { SessionProvider, WorktreeProvider } from "./types.js";

export type RecordedCall =
  | { op: "createWorktree"; projectRoot: string; slug: string }
  | { op: "removeWorktree"; projectRoot: string; worktreePath: string }
  | { op: "worktreeExists"; projectRoot: string; slug: string }
  | { op: "createWindow"; session: string; windowName: string; workingDir: string }
  | { op: "killWindow"; target: string }
  | { op: "sendKeys"; target: string; text: string }
  | { op: "windowExists"; target: string };

export type RecordedOp = RecordedCall["op"];

/** Shared, ordered call log so worktree and session calls can be asserted together. */
export class CallLog {
  readonly calls: RecordedCall[] = [];

  push(call: RecordedCall) { this.calls.push(call); }

  ops(): RecordedOp[] { return this.calls.map((c) => c.op); }

  /** Calls that change something; queries are left out. */
  effects(): RecordedCall[] {
    return this.calls.filter((c) => c.op !== "worktreeExists" && c.op !== "windowExists");
  }

  count(op: RecordedOp) { return this.calls.filter((c) => c.op === op).length; }

  clear() { this.calls.length = 0; }
}

type Failure = { kind: ProviderErrorKind; message: string; times: number };

class FailurePlan<Op extends string> {
  private readonly plans = new Map<Op, Failure>();

  set(op: Op, kind: ProviderErrorKind, message: string, times: number) {
    this.plans.set(op, { kind, message, times });
  }

  check(op: Op) {
    const f = this.plans.get(op);
    if (!f) return;
    if (f.times !== Infinity && --f.times <= 0) this.plans.delete(op);
    throw new ProviderError(f.kind, f.message);
  }
}

type WorktreeOp = "createWorktree" | "removeWorktree";
type SessionOp = "createWindow" | "killWindow" | "sendKeys";

/**
 * In-memory worktree provider. Keeps the set of live worktree paths and
 * behaves like the git adapter: create is a no-op for an existing
 * worktree, removing an unknown path throws "not-found".
 */
export class RecordingWorktreeProvider implements WorktreeProvider {
  readonly log: CallLog;
  readonly worktrees = new Set<string>();
  private readonly failures = new FailurePlan<WorktreeOp>();

  constructor(log: CallLog = new CallLog()) {
    this.log = log;
  }

  failNext(op: WorktreeOp, kind: ProviderErrorKind = "failed", opts: { message?: string; times?: number } = {}) {
    this.failures.set(op, kind, opts.message ?? `${op} failed`, opts.times ?? 1);
    return this;
  }

  async createWorktree(projectRoot: string, slug: string): Promise<string> {
    this.log.push({ op: "createWorktree", projectRoot, slug });
    this.failures.check("createWorktree");
    const p = worktreePathFor(projectRoot, slug);
    this.worktrees.add(p);
    return p;
  }

  async removeWorktree(projectRoot: string, worktreePath: string): Promise<void> {
    this.log.push({ op: "removeWorktree", projectRoot, worktreePath });
    this.failures.check("removeWorktree");
    if (!this.worktrees.delete(worktreePath)) {
      throw new ProviderError("not-found", `not a worktree: ${worktreePath}`);
    }
  }

  async worktreeExists(projectRoot: string, slug: string): Promise<boolean> {
    this.log.push({ op: "worktreeExists", projectRoot, slug });
    return this.worktrees.has(worktreePathFor(projectRoot, slug));
  }
}

/** In-memory session provider tracking live windows by "session:window". */
export class RecordingSessionProvider implements SessionProvider {
  readonly log: CallLog;
  readonly windows = new Map<string, { workingDir: string; input: string[] }>();
  private readonly failures = new FailurePlan<SessionOp>();

  constructor(log: CallLog = new CallLog()) {
    this.log = log;
  }

  failNext(op: SessionOp, kind: ProviderErrorKind = "failed", opts: { message?: string; times?: number } = {}) {
    this.failures.set(op, kind, opts.message ?? `${op} failed`, opts.times ?? 1);
    return this;
  }

  async createWindow(session: string, windowName: string, workingDir: string): Promise<void> {
    this.log.push({ op: "createWindow", session, windowName, workingDir });
    this.failures.check("createWindow");
    const target = `${session}:${windowName}`;
    if (!this.windows.has(target)) this.windows.set(target, { workingDir, input: [] });
  }

  async killWindow(target: string): Promise<void> {
    this.log.push({ op: "killWindow", target });
    this.failures.check("killWindow");
    this.windows.delete(target);
  }

  async sendKeys(target: string, text: string): Promise<void> {
    this.log.push({ op: "sendKeys", target, text });
    this.failures.check("sendKeys");
    const w = this.windows.get(target);
    if (!w) throw new ProviderError("not-found", `can't find window: ${target}`);
    w.input.push(text);
  }

  async windowExists(target: string): Promise<boolean> {
    this.log.push({ op: "windowExists", target });
    return this.windows.has(target);
  }
}
