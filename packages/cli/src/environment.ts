import type { ConfigPaths, ILogObj, Logger, LoggerOptions } from "silo";
import { createLogger, parseLogLevel, resolveConfigPaths } from "silo";

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: string;
}

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
  /** Where configuration files are looked up */
  paths: ConfigPaths;
  /** Whether stdout is a TTY (enables colored output) */
  isTTY: boolean;
}

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > environment variables > defaults
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name };

    // CLI --log-level takes priority over SILO_LOG_LEVEL env var
    const minLevel = parseLogLevel(config?.logLevel);
    if (minLevel !== undefined) {
      options.minLevel = minLevel;
    }

    return createLogger(options);
  };
}

/**
 * Creates the default CLI environment using Node.js process globals.
 *
 * @param loggerConfig - Optional logger configuration from CLI options
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdout: process.stdout,
    stderr: process.stderr,
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig),
    paths: resolveConfigPaths(),
    isTTY: Boolean(process.stdout.isTTY),
  };
}
