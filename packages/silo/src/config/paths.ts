import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";

/** Name of every silo configuration file */
export const CONFIG_FILENAME = "silo.jsonc";

/** Directory under the XDG config home that holds the global file */
export const CONFIG_DIRNAME = "silo";

/**
 * Per-user directories: the home directory and the XDG base directories.
 * Enough for the default layer and the global file.
 */
export interface UserPaths {
  homeDir: string;
  /** $XDG_CONFIG_HOME, or ~/.config */
  xdgConfigHome: string;
  /** $XDG_DATA_HOME, or ~/.local/share */
  xdgDataHome: string;
}

/**
 * Filesystem locations resolution depends on. Passed explicitly so tests and
 * embedders never touch the real home directory.
 */
export interface ConfigPaths extends UserPaths {
  /** Directory whose ancestors are searched for local silo.jsonc files */
  cwd: string;
}

/**
 * Builds {@link UserPaths} from the process environment. Never looks at the
 * working directory.
 */
export function resolveUserPaths(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<UserPaths> = {},
): UserPaths {
  const homeDir = overrides.homeDir ?? homedir();
  const xdgConfigHome = env.XDG_CONFIG_HOME ? env.XDG_CONFIG_HOME : join(homeDir, ".config");
  const xdgDataHome = env.XDG_DATA_HOME ? env.XDG_DATA_HOME : join(homeDir, ".local", "share");
  return {
    homeDir,
    xdgConfigHome: overrides.xdgConfigHome ?? xdgConfigHome,
    xdgDataHome: overrides.xdgDataHome ?? xdgDataHome,
  };
}

/**
 * Builds {@link ConfigPaths} from the process environment.
 *
 * @throws Error if no cwd override is given and the working directory no longer exists
 */
export function resolveConfigPaths(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ConfigPaths> = {},
): ConfigPaths {
  return {
    ...resolveUserPaths(env, overrides),
    cwd: overrides.cwd ?? process.cwd(),
  };
}

/**
 * Returns $XDG_CONFIG_HOME/silo/silo.jsonc.
 */
export function globalConfigPath(paths: UserPaths): string {
  return join(paths.xdgConfigHome, CONFIG_DIRNAME, CONFIG_FILENAME);
}

/**
 * Returns the candidate silo.jsonc of every directory from the filesystem root
 * down to the working directory, in that order.
 */
export function localConfigPaths(paths: ConfigPaths): string[] {
  const candidates: string[] = [];
  let dir = resolve(paths.cwd);
  for (;;) {
    candidates.unshift(join(dir, CONFIG_FILENAME));
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return candidates;
}

/**
 * A configuration file silo would read, and whether it is there.
 */
export interface ConfigPathStatus {
  path: string;
  exists: boolean;
}

/**
 * Lists every configuration file location in precedence order (global first,
 * then local files from the root down).
 */
export function listConfigPaths(paths: ConfigPaths): ConfigPathStatus[] {
  const global = globalConfigPath(paths);
  const locals = localConfigPaths(paths).filter((path) => path !== global);
  return [global, ...locals].map((path) => ({ path, exists: existsSync(path) }));
}

/**
 * Expands tilde (~) to the home directory. Only a leading tilde is expanded.
 *
 * @example
 * expandTildePath("~/.claude", "/home/ada") // "/home/ada/.claude"
 * expandTildePath("/var/log", "/home/ada")  // "/var/log"
 */
export function expandTildePath(path: string, homeDir: string = homedir()): string {
  if (path === "~") return homeDir;
  if (!path.startsWith("~/")) return path;
  return join(homeDir, path.slice(2));
}

/**
 * Abbreviates the home directory prefix of a path to "~".
 */
export function tildePath(path: string, homeDir: string = homedir()): string {
  if (homeDir === "" || !path.startsWith(homeDir)) return path;
  const rest = path.slice(homeDir.length);
  if (rest !== "" && !rest.startsWith("/")) return path;
  return `~${rest}`;
}
