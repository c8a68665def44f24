import path from "node:path";
import type { Project } from "./types.js";

export interface ProjectResolver {
  get(projectId: string): Project | undefined;
}

/** tmux session names cannot contain '.' or ':' */
export function sanitizeSessionName(name: string) {
  return name.replace(/[.:]+/g, "-");
}

export function projectFromRoot(root: string, opts: { id?: string; sessionName?: string } = {}): Project {
  const resolved = path.resolve(root);
  const base = path.basename(resolved);
  return {
    id: opts.id ?? base,
    root: resolved,
    sessionName: sanitizeSessionName(opts.sessionName ?? base),
  };
}

export class ProjectRegistry implements ProjectResolver {
  private readonly projects = new Map<string, Project>();

  constructor(projects: Project[] = []) {
    for (const p of projects) this.register(p);
  }

  register(project: Project) {
    this.projects.set(project.id, project);
    return this;
  }

  get(projectId: string) {
    return this.projects.get(projectId);
  }

  list() {
    return Array.from(this.projects.values());
  }
}
