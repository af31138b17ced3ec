import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { registerConfigCommand } from "./config-command.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  type CLILogLevel,
  LOG_LEVELS,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";

/**
 * Reads the CLI version from the package manifest next to src/ and dist/.
 */
function readVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8"),
  );
  if (typeof manifest === "object" && manifest !== null && "version" in manifest) {
    return String(manifest.version);
  }
  return "0.0.0";
}

function isLogLevel(value: string): value is CLILogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parses and validates the log level option value.
 */
function parseLogLevel(value: string): CLILogLevel {
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return normalized;
}

/**
 * Global CLI options that apply to all commands.
 */
interface GlobalOptions {
  logLevel?: string;
}

/**
 * Creates and configures the CLI program.
 *
 * @param env - CLI environment configuration for I/O and dependencies
 * @returns Configured Commander program ready for parsing
 */
export function createProgram(env: CLIEnvironment): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(readVersion())
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevel)
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerConfigCommand(program, env);

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the appropriate command.
 */
export async function runCLI(options: RunCLIOptions = {}): Promise<void> {
  const envOverrides = options.env ?? {};
  const argv = envOverrides.argv ?? process.argv;

  // First pass: read global options only; the real program validates them
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false); // Don't intercept --help

  preParser.parse(argv);
  const globalOpts = preParser.opts<GlobalOptions>();

  // Priority: CLI flags > SILO_LOG_LEVEL > defaults
  const loggerConfig: CLILoggerConfig = { logLevel: globalOpts.logLevel };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...envOverrides,
  };

  const program = createProgram(env);
  await program.parseAsync(argv);
}
