import { shellQuote } from "./utils.js";
import type { AgtxConfig } from "./config.js";
import type { Task } from "./types.js";

export const BUILTIN_AGENTS: Readonly<Record<string, string>> = {
  claude: "claude --dangerously-skip-permissions",
  codex: "codex --full-auto",
  gemini: "gemini --yolo",
  opencode: "opencode",
};

function lookup(rec: Readonly<Record<string, string>>, key: string) {
  return Object.hasOwn(rec, key) ? rec[key] : undefined;
}

/** Command prefix for an agent; unknown names are used as the command itself. */
export function agentCommand(agent: string, agents: Record<string, string> = {}) {
  return lookup(agents, agent) ?? lookup(BUILTIN_AGENTS, agent) ?? agent;
}

export function buildAgentCommand(agent: string, prompt: string, agents: Record<string, string> = {}) {
  return `${agentCommand(agent, agents)} ${shellQuote(prompt)}`;
}

export function renderPrompt(template: string, task: Pick<Task, "id" | "slug" | "title" | "description">) {
  const vars: Record<string, string> = {
    id: task.id,
    slug: task.slug,
    title: task.title,
    description: task.description ?? "",
  };
  return template.replace(/\{(id|slug|title|description)\}/g, (_, k: string) => vars[k] ?? "").trimEnd();
}

/** What gets injected into a task's window on planning and running. */
export type AgentCommands = {
  plan(task: Task): string;
  implement(task: Task): string;
};

export function createAgentCommands(
  config: Pick<AgtxConfig, "agents" | "prompts">,
): AgentCommands {
  return {
    plan: (task) => buildAgentCommand(task.agent, renderPrompt(config.prompts.plan, task), config.agents),
    implement: (task) => renderPrompt(config.prompts.implement, task),
  };
}
