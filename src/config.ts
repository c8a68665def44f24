import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { globalConfigPath, type HomeEnv } from "./home.js";
import { AGTX_DIRNAME } from "./utils.js";

export const DEFAULT_PLAN_PROMPT = "Plan the following task. Do not write code yet.\n\nTask: {title}\n\n{description}";
export const DEFAULT_IMPLEMENT_PROMPT = "Please implement the plan";

const ConfigSchema = z.object({
  sessionName: z.string().min(1).optional(),
  baseBranch: z.string().min(1).optional(),
  defaultAgent: z.string().min(1).default("claude"),
  agents: z.record(z.string().min(1)).default({}),
  prompts: z.object({
    plan: z.string().min(1).default(DEFAULT_PLAN_PROMPT),
    implement: z.string().min(1).default(DEFAULT_IMPLEMENT_PROMPT),
  }).default({}),
  worktree: z.object({
    force: z.boolean().default(true),
  }).default({}),
  commandTimeoutMs: z.number().int().positive().optional(),
});

export type AgtxConfig = z.infer<typeof ConfigSchema>;

// one layer on its own: every key optional
const LayerSchema = ConfigSchema.partial();

type RawConfig = Record<string, unknown>;

export function projectConfigPath(projectRoot: string) {
  return path.join(projectRoot, AGTX_DIRNAME, "config.yml");
}

function isRecord(v: unknown): v is RawConfig {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

async function readOptionalYaml(filePath: string): Promise<RawConfig | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw error;
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(filePath, e instanceof Error ? e.message : String(e), { cause: e });
  }
  if (parsed == null) return {};
  if (!isRecord(parsed)) throw new ConfigError(filePath, "top level must be a mapping");
  return parsed;
}

// agents/prompts/worktree merge per key; everything else is replaced
function mergeRaw(base: RawConfig, over: RawConfig): RawConfig {
  const out: RawConfig = { ...base };
  for (const [k, v] of Object.entries(over)) {
    const prev = out[k];
    out[k] = isRecord(prev) && isRecord(v) ? { ...prev, ...v } : v;
  }
  return out;
}

function envOverrides(env: NodeJS.ProcessEnv): RawConfig {
  const out: RawConfig = {};
  if (env.AGTX_SESSION) out.sessionName = env.AGTX_SESSION;
  if (env.AGTX_BASE_BRANCH) out.baseBranch = env.AGTX_BASE_BRANCH;
  if (env.AGTX_AGENT) out.defaultAgent = env.AGTX_AGENT;
  if (env.AGTX_COMMAND_TIMEOUT_MS) out.commandTimeoutMs = Number(env.AGTX_COMMAND_TIMEOUT_MS);
  return out;
}

function formatIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseConfig(raw: unknown, source = "<config>"): AgtxConfig {
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) throw new ConfigError(source, formatIssues(parsed.error));
  return parsed.data;
}

function checkLayer(raw: RawConfig, source: string): RawConfig {
  const parsed = LayerSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(source, formatIssues(parsed.error));
  return raw;
}

/**
 * Loads the global config, then the project's `.agtx/config.yml`, then
 * AGTX_* environment overrides. Missing files are skipped. Each layer is
 * validated on its own, so a ConfigError names the file (or `<env>`) at fault.
 */
export async function loadConfig(projectRoot: string, opts: HomeEnv = {}): Promise<AgtxConfig> {
  const env = opts.env ?? process.env;
  const globalPath = globalConfigPath(opts);
  const localPath = projectConfigPath(projectRoot);
  const globalRaw = await readOptionalYaml(globalPath);
  const localRaw = globalPath === localPath ? null : await readOptionalYaml(localPath);

  let merged: RawConfig = {};
  if (globalRaw) merged = mergeRaw(merged, checkLayer(globalRaw, globalPath));
  if (localRaw) merged = mergeRaw(merged, checkLayer(localRaw, localPath));
  merged = mergeRaw(merged, checkLayer(envOverrides(env), "<env>"));
  return parseConfig(merged);
}
