/**
 * Launch view of a resolved configuration: which repository overlays apply
 * to the current checkout and what the container finally receives.
 *
 * Consumers of this module read values only, never provenance.
 */

import type { Config, RepoConfig } from "./types.js";

/**
 * A repository overlay whose key matched one of the checkout's remotes.
 */
export interface RepoMatch {
  name: string;
  config: RepoConfig;
}

/**
 * Settings for one container launch.
 */
export interface LaunchSettings {
  /** Tool to run, undefined when neither the caller nor the config picks one */
  tool: string | undefined;
  mountsRO: string[];
  mountsRW: string[];
  env: string[];
  preRunHooks: string[];
  postBuildHooks: string[];
  /** Read-only then read-write mounts, each path once */
  mountPaths: string[];
  /** Names of the repository overlays that applied, least specific first */
  repos: string[];
}

export interface LaunchOptions {
  /** Tool chosen explicitly (command line); wins over every config value */
  tool?: string;
  /** Remote URLs of the git checkout being launched in */
  remoteUrls?: readonly string[];
}

function stripGitSuffix(value: string): string {
  return value.endsWith(".git") ? value.slice(0, -".git".length) : value;
}

/**
 * True when a repository key matches a git remote URL.
 *
 * Both sides lose a trailing ".git"; SSH remotes (git@host:org/repo) are
 * compared as host/org/repo. The key matches when it is a substring, so
 * "github.com/acme" covers every repository of that organisation.
 */
export function repoUrlMatches(url: string, pattern: string): boolean {
  let normalized = stripGitSuffix(url);
  if (normalized.startsWith("git@")) {
    normalized = normalized.slice("git@".length).replace(":", "/");
  }
  return normalized.includes(stripGitSuffix(pattern));
}

/**
 * Returns the repository overlays matching any of the remotes, shortest key
 * first so more specific overlays are applied last.
 */
export function matchingRepos(config: Config, remoteUrls: readonly string[]): RepoMatch[] {
  const matches: RepoMatch[] = [];
  for (const [name, repoConfig] of Object.entries(config.repos)) {
    if (remoteUrls.some((url) => repoUrlMatches(url, name))) {
      matches.push({ name, config: repoConfig });
    }
  }
  // Array#sort is stable, so equal lengths keep config order
  return matches.sort((a, b) => a.name.length - b.name.length);
}

function union(...lists: (readonly string[])[]): string[] {
  return [...new Set(lists.flat())];
}

/**
 * Combines the top level, the selected tool's overlay and the matching
 * repository overlays into the values handed to the container.
 *
 * Mounts and env are unions (tool, then repositories, then top level). Hooks
 * run top level first, then tool, then repositories, duplicates included.
 */
export function launchSettings(config: Config, options: LaunchOptions = {}): LaunchSettings {
  const repos = matchingRepos(config, options.remoteUrls ?? []);

  // The most specific repository that picks a tool wins over the top level
  const repoTool = repos.filter((repo) => repo.config.tool !== "").at(-1)?.config.tool;
  const tool = options.tool || repoTool || config.tool || undefined;

  const toolConfig = tool && Object.hasOwn(config.tools, tool) ? config.tools[tool] : undefined;
  const overlays = [...(toolConfig ? [toolConfig] : []), ...repos.map((repo) => repo.config)];

  const mountsRO = union(...overlays.map((o) => o.mountsRO), config.mountsRO);
  const mountsRW = union(...overlays.map((o) => o.mountsRW), config.mountsRW);

  return {
    tool,
    mountsRO,
    mountsRW,
    env: union(...overlays.map((o) => o.env), config.env),
    preRunHooks: [config.preRunHooks, ...overlays.map((o) => o.preRunHooks)].flat(),
    postBuildHooks: [config.postBuildHooks, ...overlays.map((o) => o.postBuildHooks)].flat(),
    mountPaths: union(mountsRO, mountsRW),
    repos: repos.map((repo) => repo.name),
  };
}
