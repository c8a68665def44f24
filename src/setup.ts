import { createAgentCommands } from "./agents.js";
import { loadConfig, type AgtxConfig } from "./config.js";
import type { HomeEnv } from "./home.js";
import { createLogger, type Logger } from "./log.js";
import { TransitionOrchestrator } from "./orchestrator.js";
import { ProjectRegistry, projectFromRoot } from "./projects.js";
import { GitWorktreeProvider } from "./providers/git.js";
import { TmuxSessionProvider } from "./providers/tmux.js";
import { createTask, type NewTask } from "./tasks.js";
import type { Project, Task } from "./types.js";
import { createExecRunner, type CommandRunner } from "./utils.js";

/** Task input within a set-up project; `agent` falls back to `defaultAgent`. */
export type TaskInput = Omit<NewTask, "agent" | "projectId"> & { agent?: string };

export type Agtx = {
  config: AgtxConfig;
  project: Project;
  projects: ProjectRegistry;
  worktrees: GitWorktreeProvider;
  sessions: TmuxSessionProvider;
  orchestrator: TransitionOrchestrator;
  logger: Logger;
  createTask(input: TaskInput): Task;
};

export type SetupOptions = HomeEnv & {
  projectId?: string;
  logger?: Logger;
  run?: CommandRunner;
};

/** Wires config, git and tmux adapters and the orchestrator for one project root. */
export async function createAgtx(projectRoot: string, opts: SetupOptions = {}): Promise<Agtx> {
  const config = await loadConfig(projectRoot, opts);
  const logger = opts.logger ?? createLogger();
  const run = opts.run ?? createExecRunner({ timeoutMs: config.commandTimeoutMs });
  const project = projectFromRoot(projectRoot, { id: opts.projectId, sessionName: config.sessionName });
  const projects = new ProjectRegistry([project]);
  const worktrees = new GitWorktreeProvider({ run, baseBranch: config.baseBranch, force: config.worktree.force, logger });
  const sessions = new TmuxSessionProvider({ run, logger });
  const orchestrator = new TransitionOrchestrator({
    worktrees,
    sessions,
    projects,
    commands: createAgentCommands(config),
    logger,
  });
  return {
    config,
    project,
    projects,
    worktrees,
    sessions,
    orchestrator,
    logger,
    createTask: (input) => createTask({ ...input, agent: input.agent ?? config.defaultAgent, projectId: project.id }),
  };
}
