import fs from "node:fs/promises";
import { execFile } from "node:child_process";

export const AGTX_DIRNAME = ".agtx";

export async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true });
}

export async function pathExists(p: string) {
  try { await fs.access(p); return true; } catch { return false; }
}

export function slugify(s: string) {
  return s.toLowerCase().trim().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "");
}

// POSIX single-quote: ' -> '\''
export function shellQuote(s: string) {
  return `'${s.replace(/'/g, `'\\''`)}'`;
}

// ---------- process helpers ----------

export type CommandResult = {
  ok: boolean;
  code: number | null;
  stdout: string;
  stderr: string;
};

/** Runs an external command; resolves with its result instead of rejecting on exit code. */
export type CommandRunner = (
  file: string,
  args: string[],
  opts?: { cwd?: string },
) => Promise<CommandResult>;

function exitCodeOf(error: { code?: unknown }): number | null {
  return typeof error.code === "number" ? error.code : null;
}

export function createExecRunner(opts: { timeoutMs?: number } = {}): CommandRunner {
  return (file, args, runOpts) =>
    new Promise((resolve) => {
      execFile(
        file,
        args,
        { cwd: runOpts?.cwd, encoding: "utf8", timeout: opts.timeoutMs ?? 0, windowsHide: true },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ ok: true, code: 0, stdout, stderr });
            return;
          }
          // spawn failures (ENOENT) and timeouts carry no exit code
          const detail = stderr || error.message;
          resolve({ ok: false, code: exitCodeOf(error), stdout, stderr: detail });
        },
      );
    });
}

export function commandLine(file: string, args: string[]) {
  return [file, ...args].join(" ");
}
