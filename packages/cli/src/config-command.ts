import type { Command } from "commander";
import { defaultConfig, listConfigPaths, loadAllWithSources } from "silo";
import { COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { registerInitCommand } from "./init-command.js";
import { renderDefaultConfig, renderResolvedConfig } from "./render.js";
import { executeAction } from "./utils.js";

/**
 * Prints the merged configuration with the origin of every value.
 */
export async function executeConfigShow(env: CLIEnvironment): Promise<void> {
  const logger = env.createLogger("config");
  const resolved = loadAllWithSources({ paths: env.paths, logger });
  env.stdout.write(renderResolvedConfig(resolved, { color: env.isTTY, homeDir: env.paths.homeDir }));
}

/**
 * Prints the compiled-in configuration.
 */
export async function executeConfigDefault(env: CLIEnvironment): Promise<void> {
  env.stdout.write(renderDefaultConfig(defaultConfig({ paths: env.paths })));
}

/**
 * Prints the configuration files that exist, in precedence order.
 */
export async function executeConfigPaths(env: CLIEnvironment): Promise<void> {
  for (const status of listConfigPaths(env.paths)) {
    if (status.exists) {
      env.stdout.write(`${status.path}\n`);
    }
  }
}

/**
 * Registers the config command and its subcommands.
 */
export function registerConfigCommand(program: Command, env: CLIEnvironment): void {
  const config = program
    .command(COMMANDS.config)
    .description("Inspect the layered configuration (default < global < local files)");

  config
    .command(COMMANDS.show, { isDefault: true })
    .description("Show the merged configuration with the source of every value")
    .action(() => executeAction(() => executeConfigShow(env), env));

  config
    .command(COMMANDS.default)
    .description("Show the compiled-in default configuration")
    .action(() => executeAction(() => executeConfigDefault(env), env));

  config
    .command(COMMANDS.paths)
    .description("List the configuration files in use, lowest precedence first")
    .action(() => executeAction(() => executeConfigPaths(env), env));

  registerInitCommand(config, env);
}
