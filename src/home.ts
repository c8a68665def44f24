import os from "node:os";
import path from "node:path";

export type HomeEnv = {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homedir?: string;
};

/** Directory holding the global config.yml. */
export function resolveDefaultHome(opts: HomeEnv = {}) {
  const env = opts.env ?? process.env;
  const platform = opts.platform ?? process.platform;
  const home = opts.homedir ?? os.homedir();
  const explicit = (env.AGTX_HOME || "").trim();
  if (explicit) return path.resolve(explicit);
  if (platform === "win32") {
    const appdata = env.APPDATA || path.join(home, "AppData", "Roaming");
    return path.join(appdata, "agtx");
  }
  if (platform === "darwin") {
    return path.join(home, "Library", "Application Support", "agtx");
  }
  const xdg = env.XDG_CONFIG_HOME || path.join(home, ".config");
  return path.join(xdg, "agtx");
}

export function globalConfigPath(opts: HomeEnv = {}) {
  return path.join(resolveDefaultHome(opts), "config.yml");
}
