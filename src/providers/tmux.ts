import { ProviderError } from "../errors.js";
import { nullLogger, type Logger } from "../log.js";
import { parseTarget } from "../tasks.js";
import { commandLine, createExecRunner, type CommandResult, type CommandRunner } from "../utils.js";
import type { SessionProvider } from "./types.js";

export type TmuxOptions = {
  run?: CommandRunner;
  // tmux binary, e.g. a wrapper script
  bin?: string;
  logger?: Logger;
};

const MISSING_TARGET = /can't find (window|session|pane)|no such (window|session)|session not found|window not found/i;
const NO_SERVER = /no server running|error connecting to|failed to connect to server/i;
const NO_BINARY = /ENOENT/;
const DUPLICATE_SESSION = /duplicate session/i;

// "=" prefix: exact session match, so "proj" never resolves to "proj2"
function exactTarget(target: string) {
  const { session, window } = parseTarget(target);
  return `=${session}:${window}`;
}

export class TmuxSessionProvider implements SessionProvider {
  private readonly run: CommandRunner;
  private readonly bin: string;
  private readonly logger: Logger;

  constructor(opts: TmuxOptions = {}) {
    this.run = opts.run ?? createExecRunner();
    this.bin = opts.bin ?? "tmux";
    this.logger = opts.logger ?? nullLogger;
  }

  private tmux(args: string[]): Promise<CommandResult> {
    this.logger.debug(commandLine(this.bin, args));
    return this.run(this.bin, args);
  }

  private async hasSession(session: string) {
    const res = await this.tmux(["has-session", "-t", `=${session}`]);
    return res.ok;
  }

  async windowExists(target: string): Promise<boolean> {
    const { session, window } = parseTarget(target);
    try {
      const res = await this.tmux(["list-windows", "-t", `=${session}`, "-F", "#{window_name}"]);
      if (!res.ok) return false;
      return res.stdout.split("\n").map((s) => s.trim()).includes(window);
    } catch {
      return false;
    }
  }

  async createWindow(session: string, windowName: string, workingDir: string): Promise<void> {
    const createFailed = (res: CommandResult) => {
      const msg = res.stderr.trim();
      const unavailable = NO_SERVER.test(msg) || NO_BINARY.test(msg);
      return new ProviderError(unavailable ? "unavailable" : "failed", `tmux could not create ${session}:${windowName}: ${msg}`);
    };
    if (!(await this.hasSession(session))) {
      const started = await this.tmux(["new-session", "-d", "-s", session, "-n", windowName, "-c", workingDir]);
      if (started.ok) return;
      // another task of the project started the session first
      if (!DUPLICATE_SESSION.test(started.stderr)) throw createFailed(started);
      this.logger.debug(`session appeared meanwhile: ${session}`);
    }
    if (await this.windowExists(`${session}:${windowName}`)) {
      this.logger.debug(`window already present: ${session}:${windowName}`);
      return;
    }
    const res = await this.tmux(["new-window", "-d", "-t", `=${session}:`, "-n", windowName, "-c", workingDir]);
    if (!res.ok) throw createFailed(res);
  }

  async killWindow(target: string): Promise<void> {
    const res = await this.tmux(["kill-window", "-t", exactTarget(target)]);
    if (res.ok) return;
    const msg = res.stderr.trim();
    if (MISSING_TARGET.test(msg) || NO_SERVER.test(msg)) {
      this.logger.debug(`window already gone: ${target}`);
      return;
    }
    throw new ProviderError(NO_BINARY.test(msg) ? "unavailable" : "failed", `tmux kill-window ${target} failed: ${msg}`);
  }

  async sendKeys(target: string, literalInput: string): Promise<void> {
    const fail = (msg: string) => {
      const kind = MISSING_TARGET.test(msg) || NO_SERVER.test(msg) ? "not-found" : NO_BINARY.test(msg) ? "unavailable" : "failed";
      return new ProviderError(kind, `tmux send-keys to ${target} failed: ${msg}`);
    };
    const pane = exactTarget(target);
    // "--" ends option parsing, so input starting with "-" is sent as text
    const text = await this.tmux(["send-keys", "-t", pane, "-l", "--", literalInput]);
    if (!text.ok) throw fail(text.stderr.trim());
    const enter = await this.tmux(["send-keys", "-t", pane, "Enter"]);
    if (!enter.ok) throw fail(enter.stderr.trim());
  }
}
