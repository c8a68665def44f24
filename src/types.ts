export const TaskStatus = {
  Backlog: "backlog",
  Planning: "planning",
  Running: "running",
  Review: "review",
  Done: "done",
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

export type EdgeKind = "forward" | "resume";

export type Task = {
  readonly id: string;
  readonly slug: string;
  readonly title: string;
  readonly description?: string;
  readonly agent: string;
  readonly projectId: string;
  readonly status: TaskStatus;
  // Set once the worktree is created on backlog -> planning
  readonly worktreePath?: string;
  readonly createdAt: string;
  readonly updatedAt: string;
};

export type Project = {
  id: string;
  root: string;
  sessionName: string;
};

export type SideEffect =
  | "create-worktree"
  | "create-window"
  | "send-plan"
  | "send-implement"
  | "kill-window"
  | "remove-worktree";

export type ResourceKind = "worktree" | "window";
