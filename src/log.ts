export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  ok(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
};

export type LoggerOptions = {
  // suppress everything except errors (like --silent)
  silent?: boolean;
  verbose?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const out = opts.out ?? ((line: string) => console.log(line));
  const err = opts.err ?? ((line: string) => console.error(line));
  const quiet = Boolean(opts.silent);
  return {
    debug(msg) { if (opts.verbose && !quiet) out(`  ${msg}`); },
    info(msg) { if (!quiet) out(msg); },
    ok(msg) { if (!quiet) out(`✔ ${msg}`); },
    warn(msg) { if (!quiet) err(`! ${msg}`); },
    error(msg) { err(`✖ ${msg}`); },
  };
}

const noop = () => {};

export const nullLogger: Logger = { debug: noop, info: noop, ok: noop, warn: noop, error: noop };
