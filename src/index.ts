export * from "./types.js";
export * from "./status.js";
export * from "./errors.js";
export * from "./tasks.js";
export * from "./agents.js";
export * from "./config.js";
export * from "./home.js";
export * from "./log.js";
export * from "./projects.js";
export * from "./task-queue.js";
export * from "./orchestrator.js";
export * from "./doctor.js";
export * from "./setup.js";
export type { SessionProvider, WorktreeProvider, WorktreeInfo } from "./providers/types.js";
export { GitWorktreeProvider, parseWorktreePorcelain, type GitWorktreeOptions } from "./providers/git.js";
export { TmuxSessionProvider, type TmuxOptions } from "./providers/tmux.js";
export { CallLog, RecordingSessionProvider, RecordingWorktreeProvider, type RecordedCall, type RecordedOp } from "./providers/recording.js";
export { AGTX_DIRNAME, createExecRunner, shellQuote, slugify, type CommandResult, type CommandRunner } from "./utils.js";
