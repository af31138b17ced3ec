import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { Command } from "commander";
import { CONFIG_FILENAME, globalConfigPath } from "silo";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./utils.js";

/**
 * Options for the init command.
 */
export interface InitCommandOptions {
  global?: boolean;
  local?: boolean;
}

/**
 * Starter configuration. Every setting is commented out so the file changes
 * nothing until edited.
 */
export const STARTER_CONFIG = `{
  // Backend to use: "docker", "container" or "ssh" (default: "docker")
  // "backend": "docker",
  // Default tool to run: "claude", "opencode" or "copilot"
  // "tool": "claude",
  // Read-only directories or files to mount into the container
  // "mounts_ro": [],
  // Read-write directories or files to mount into the container
  // "mounts_rw": [],
  // Environment variables: names without '=' pass through from the host,
  // names with '=' are set explicitly (e.g. "FOO=bar")
  // "env": [],
  // Shell commands run inside the container after the image is built
  // "post_build_hooks": [],
  // Shell commands run inside the container before the tool starts
  // "pre_run_hooks": [],
  // Tool-specific configuration, merged with the settings above at launch
  // Example: "tools": { "claude": { "env": ["CLAUDE_SPECIFIC_VAR"] } }
  // "tools": {},
  // Repository-specific configuration, applied when a git remote URL contains the key
  // Example: "repos": { "github.com/myorg": { "env": ["ORG_API_KEY"] } }
  // "repos": {}
}
`;

/**
 * Executes the init command - writes a starter silo.jsonc.
 *
 * @throws Error if neither or both of --global and --local are given, or the file exists
 */
export async function executeInit(options: InitCommandOptions, env: CLIEnvironment): Promise<void> {
  if (options.global === options.local) {
    throw new Error("Specify exactly one of --global or --local");
  }

  const configPath = options.global
    ? globalConfigPath(env.paths)
    : join(env.paths.cwd, CONFIG_FILENAME);

  if (existsSync(configPath)) {
    throw new Error(`Configuration already exists at ${configPath}`);
  }

  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, STARTER_CONFIG, "utf-8");

  env.stderr.write(`Created ${configPath}\n`);
}

/**
 * Registers the init subcommand.
 */
export function registerInitCommand(parent: Command, env: CLIEnvironment): void {
  parent
    .command(COMMANDS.init)
    .description("Create a starter silo.jsonc")
    .option(OPTION_FLAGS.global, OPTION_DESCRIPTIONS.global)
    .option(OPTION_FLAGS.local, OPTION_DESCRIPTIONS.local)
    .action((options: InitCommandOptions) => executeAction(() => executeInit(options, env), env));
}
