/** CLI program name */
export const CLI_NAME = "silo";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION = "Inspect and initialize the layered configuration of silo sandboxes.";

/** Available CLI commands */
export const COMMANDS = {
  config: "config",
  show: "show",
  default: "default",
  paths: "paths",
  init: "init",
} as const;

/** Valid log level names */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type CLILogLevel = (typeof LOG_LEVELS)[number];

/** Command-line option flags */
export const OPTION_FLAGS = {
  logLevel: "--log-level <level>",
  global: "-g, --global",
  local: "-l, --local",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  global: "Create the user-wide file under the XDG config directory.",
  local: "Create silo.jsonc in the current directory.",
} as const;
