import { TaskStatus, type EdgeKind } from "./types.js";

const ORDER: readonly TaskStatus[] = [
  TaskStatus.Backlog,
  TaskStatus.Planning,
  TaskStatus.Running,
  TaskStatus.Review,
  TaskStatus.Done,
];

const LABELS: Record<TaskStatus, string> = {
  backlog: "Backlog",
  planning: "Planning",
  running: "Running",
  review: "Review",
  done: "Done",
};

/** Workflow order, left to right. */
export function columns(): readonly TaskStatus[] {
  return ORDER;
}

export function statusIndex(status: TaskStatus): number {
  return ORDER.indexOf(status);
}

export function isStatus(value: unknown): value is TaskStatus {
  return typeof value === "string" && Object.hasOwn(LABELS, value);
}

export function statusLabel(status: TaskStatus): string {
  return LABELS[status];
}

/** Next status in forward order; undefined for done. */
export function successor(status: TaskStatus): TaskStatus | undefined {
  return ORDER[statusIndex(status) + 1];
}

export function isValidForward(from: TaskStatus, to: TaskStatus): boolean {
  return successor(from) === to;
}

// review -> running is the only backward edge
export function isValidResume(from: TaskStatus, to: TaskStatus): boolean {
  return from === TaskStatus.Review && to === TaskStatus.Running;
}

export function classifyEdge(from: TaskStatus, to: TaskStatus): EdgeKind | undefined {
  if (isValidForward(from, to)) return "forward";
  if (isValidResume(from, to)) return "resume";
  return undefined;
}
