/**
 * Capabilities the orchestrator drives. Adapters throw `ProviderError`
 * (see errors.ts) so the orchestrator can tell "already gone" apart from a
 * real failure.
 */

export interface WorktreeProvider {
  /** Returns the worktree path. Re-running for an existing worktree returns the same path. */
  createWorktree(projectRoot: string, slug: string): Promise<string>;
  /** Throws kind "not-found" when the path is not a registered worktree. */
  removeWorktree(projectRoot: string, worktreePath: string): Promise<void>;
  /** Never throws; lookup failures read as false. */
  worktreeExists(projectRoot: string, slug: string): Promise<boolean>;
}

export interface SessionProvider {
  createWindow(session: string, windowName: string, workingDir: string): Promise<void>;
  /** A missing target is success. */
  killWindow(target: string): Promise<void>;
  /** Sends the text literally, then Enter. Throws kind "not-found" for a missing target. */
  sendKeys(target: string, literalInput: string): Promise<void>;
  windowExists(target: string): Promise<boolean>;
}

export type WorktreeInfo = {
  path: string;
  slug: string;
  branch?: string;
};
