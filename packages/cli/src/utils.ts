import chalk from "chalk";
import type { CLIEnvironment } from "./environment.js";

/**
 * Runs a command action, printing any error to stderr and setting exit code 1.
 * Configuration errors already carry the offending file in their message.
 */
export async function executeAction(
  action: () => Promise<void>,
  env: CLIEnvironment,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    env.stderr.write(`${chalk.red.bold("Error:")} ${message}\n`);
    env.setExitCode(1);
  }
}
