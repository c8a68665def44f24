import { statusLabel } from "./status.js";
import type { ResourceKind, SideEffect, TaskStatus } from "./types.js";

export type ErrorKind =
  | "invalid-transition"
  | "resource-creation-failed"
  | "resource-removal-failed"
  | "injection-failed"
  | "project-not-found"
  | "config";

export abstract class AgtxError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type EdgeInfo = { taskId: string; from: TaskStatus; to: TaskStatus | "deleted" };

function describeEdge(e: EdgeInfo) {
  const to = e.to === "deleted" ? "deleted" : statusLabel(e.to);
  return `${statusLabel(e.from)} -> ${to}`;
}

function causeMessage(cause: unknown) {
  return cause instanceof Error ? cause.message : String(cause);
}

export class InvalidTransitionError extends AgtxError {
  readonly kind = "invalid-transition";
  readonly taskId: string;
  readonly from: TaskStatus;
  readonly to: TaskStatus;

  constructor(taskId: string, from: TaskStatus, to: TaskStatus) {
    super(`Invalid transition for task ${taskId}: ${statusLabel(from)} -> ${statusLabel(to)}`);
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

/** Base for failures of a single side effect inside an edge. */
export abstract class SideEffectError extends AgtxError {
  readonly taskId: string;
  readonly from: TaskStatus;
  readonly to: TaskStatus | "deleted";
  readonly step: SideEffect;

  constructor(edge: EdgeInfo, step: SideEffect, what: string, cause: unknown) {
    super(`${what} (${describeEdge(edge)}, step ${step}): ${causeMessage(cause)}`, { cause });
    this.taskId = edge.taskId;
    this.from = edge.from;
    this.to = edge.to;
    this.step = step;
  }
}

export class ResourceCreationFailedError extends SideEffectError {
  readonly kind = "resource-creation-failed";
  readonly resource: ResourceKind;

  constructor(edge: EdgeInfo, step: SideEffect, resource: ResourceKind, cause: unknown) {
    super(edge, step, `Failed to create ${resource} for task ${edge.taskId}`, cause);
    this.resource = resource;
  }
}

export class ResourceRemovalFailedError extends SideEffectError {
  readonly kind = "resource-removal-failed";
  readonly resource: ResourceKind;

  constructor(edge: EdgeInfo, step: SideEffect, resource: ResourceKind, cause: unknown) {
    super(edge, step, `Failed to remove ${resource} for task ${edge.taskId}`, cause);
    this.resource = resource;
  }
}

export class InjectionFailedError extends SideEffectError {
  readonly kind = "injection-failed";
  readonly target: string;

  constructor(edge: EdgeInfo, step: SideEffect, target: string, cause: unknown) {
    super(edge, step, `Failed to send input to ${target}`, cause);
    this.target = target;
  }
}

export class ProjectNotFoundError extends AgtxError {
  readonly kind = "project-not-found";
  readonly projectId: string;

  constructor(projectId: string) {
    super(`Project not found: ${projectId}`);
    this.projectId = projectId;
  }
}

export class ConfigError extends AgtxError {
  readonly kind = "config";
  readonly filePath: string;

  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`Invalid config in ${filePath}: ${detail}`, options);
    this.filePath = filePath;
  }
}

export type TransitionError =
  | InvalidTransitionError
  | ResourceCreationFailedError
  | ResourceRemovalFailedError
  | InjectionFailedError
  | ProjectNotFoundError;

export function isAgtxError(e: unknown): e is AgtxError {
  return e instanceof AgtxError;
}

// ---------- provider-level ----------

export type ProviderErrorKind = "not-found" | "conflict" | "blocked" | "unavailable" | "failed";

/** Thrown by worktree and session adapters. */
export class ProviderError extends Error {
  readonly providerKind: ProviderErrorKind;

  constructor(providerKind: ProviderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProviderError";
    this.providerKind = providerKind;
  }
}

export function isProviderError(e: unknown, kind?: ProviderErrorKind): e is ProviderError {
  return e instanceof ProviderError && (kind == null || e.providerKind === kind);
}
