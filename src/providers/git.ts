import path from "node:path";
import { ProviderError } from "../errors.js";
import { nullLogger, type Logger } from "../log.js";
import { branchNameFor, worktreePathFor, worktreesDir } from "../tasks.js";
import { commandLine, createExecRunner, ensureDir, type CommandResult, type CommandRunner } from "../utils.js";
import type { WorktreeInfo, WorktreeProvider } from "./types.js";

export type GitWorktreeOptions = {
  run?: CommandRunner;
  // base for new task branches; HEAD when unset
  baseBranch?: string;
  // pass --force to `git worktree remove`
  force?: boolean;
  mkdir?: (dir: string) => Promise<void>;
  logger?: Logger;
};

const CONFLICT = /already exists|already checked out|already used by worktree|is already registered/i;
const NOT_A_WORKTREE = /is not a working tree|not a working tree|No such file or directory/i;
const BLOCKED = /locked|contains modified or untracked files|use --force/i;

type PorcelainEntry = { path: string; branch?: string };

export function parseWorktreePorcelain(out: string): PorcelainEntry[] {
  const entries: PorcelainEntry[] = [];
  let cur: PorcelainEntry | null = null;
  for (const line of out.split("\n")) {
    if (line.startsWith("worktree ")) {
      cur = { path: line.slice("worktree ".length).trim() };
      entries.push(cur);
    } else if (cur && line.startsWith("branch ")) {
      cur.branch = line.slice("branch ".length).trim().replace(/^refs\/heads\//, "");
    }
  }
  return entries;
}

export class GitWorktreeProvider implements WorktreeProvider {
  private readonly run: CommandRunner;
  private readonly baseBranch: string | undefined;
  private readonly force: boolean;
  private readonly mkdir: (dir: string) => Promise<void>;
  private readonly logger: Logger;

  constructor(opts: GitWorktreeOptions = {}) {
    this.run = opts.run ?? createExecRunner();
    this.baseBranch = opts.baseBranch;
    this.force = opts.force ?? true;
    this.mkdir = opts.mkdir ?? ensureDir;
    this.logger = opts.logger ?? nullLogger;
  }

  private git(projectRoot: string, args: string[]): Promise<CommandResult> {
    this.logger.debug(commandLine("git", args));
    return this.run("git", args, { cwd: projectRoot });
  }

  async listWorktrees(projectRoot: string): Promise<WorktreeInfo[]> {
    const res = await this.git(projectRoot, ["worktree", "list", "--porcelain"]);
    if (!res.ok) throw new ProviderError("failed", `git worktree list failed: ${res.stderr.trim()}`);
    const base = path.resolve(worktreesDir(projectRoot));
    return parseWorktreePorcelain(res.stdout)
      .filter((e) => path.dirname(path.resolve(e.path)) === base)
      .map((e) => ({ path: e.path, slug: path.basename(e.path), branch: e.branch }));
  }

  async worktreeExists(projectRoot: string, slug: string): Promise<boolean> {
    const want = path.resolve(worktreePathFor(projectRoot, slug));
    try {
      const res = await this.git(projectRoot, ["worktree", "list", "--porcelain"]);
      if (!res.ok) return false;
      return parseWorktreePorcelain(res.stdout).some((e) => path.resolve(e.path) === want);
    } catch {
      return false;
    }
  }

  private async branchExists(projectRoot: string, branch: string) {
    const res = await this.git(projectRoot, ["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`]);
    return res.ok;
  }

  async createWorktree(projectRoot: string, slug: string): Promise<string> {
    const dir = worktreePathFor(projectRoot, slug);
    if (await this.worktreeExists(projectRoot, slug)) {
      this.logger.debug(`worktree already present: ${dir}`);
      return dir;
    }
    try {
      await this.mkdir(worktreesDir(projectRoot));
    } catch (e) {
      throw new ProviderError("failed", `cannot create ${worktreesDir(projectRoot)}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }

    const branch = branchNameFor(slug);
    // A branch left over from an earlier attempt is checked out as-is
    const args = (await this.branchExists(projectRoot, branch))
      ? ["worktree", "add", dir, branch]
      : ["worktree", "add", "-b", branch, dir, this.baseBranch ?? "HEAD"];
    const res = await this.git(projectRoot, args);
    if (!res.ok) {
      const msg = res.stderr.trim();
      throw new ProviderError(CONFLICT.test(msg) ? "conflict" : "failed", `git worktree add failed for ${slug}: ${msg}`);
    }
    return dir;
  }

  async removeWorktree(projectRoot: string, worktreePath: string): Promise<void> {
    const args = ["worktree", "remove", ...(this.force ? ["--force"] : []), worktreePath];
    const res = await this.git(projectRoot, args);
    if (!res.ok) {
      const msg = res.stderr.trim();
      if (NOT_A_WORKTREE.test(msg)) throw new ProviderError("not-found", `not a worktree: ${worktreePath}`);
      throw new ProviderError(BLOCKED.test(msg) ? "blocked" : "failed", `git worktree remove failed: ${msg}`);
    }
    const prune = await this.git(projectRoot, ["worktree", "prune"]);
    if (!prune.ok) this.logger.warn(`git worktree prune failed: ${prune.stderr.trim()}`);
  }
}
