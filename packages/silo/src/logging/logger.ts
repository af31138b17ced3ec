import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/**
 * Parses a level given by name ("debug") or number ("2"). Numbers are
 * clamped to 0..6.
 */
export function parseLogLevel(value?: string): number | undefined {
  if (!value) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();

  if (normalized === "") {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' writes formatted lines to stderr, 'json' emits log
   * objects, 'hidden' prints nothing (file transport still applies)
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   */
  name?: string;

  /**
   * When true, truncate SILO_LOG_FILE instead of appending.
   * @default false
   */
  logReset?: boolean;
}

function parseEnvBoolean(value?: string): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

const LOG_TEMPLATE = "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}} {{logLevelName}} [{{name}}] ";

// One stream per log file path, shared by every logger
const logFileStreams = new Map<string, WriteStream>();

function openLogFile(path: string, reset: boolean): WriteStream | undefined {
  const existing = logFileStreams.get(path);
  if (existing) return existing;
  try {
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: reset ? "w" : "a" });
    stream.on("error", (error) => {
      process.stderr.write(`[silo] Log file write error: ${error.message}\n`);
      logFileStreams.delete(path);
    });
    logFileStreams.set(path, stream);
    return stream;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[silo] Failed to initialize SILO_LOG_FILE output: ${message}\n`);
    return undefined;
  }
}

/**
 * Closes every open log file stream. For tests only.
 * @internal
 */
export function _resetFileLoggingState(): void {
  for (const stream of logFileStreams.values()) {
    stream.end();
  }
  logFileStreams.clear();
}

function formatArg(arg: unknown): string {
  return typeof arg === "string" ? arg : JSON.stringify(arg);
}

/**
 * Create a new logger instance.
 *
 * Priority for every setting: options > environment (SILO_LOG_LEVEL,
 * SILO_LOG_RESET) > default. When SILO_LOG_FILE is set, each log object is
 * also appended to that file as one JSON line.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "config", minLevel: 2 });
 *
 * // Silent logger for tests
 * const logger = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const envMinLevel = parseLogLevel(process.env.SILO_LOG_LEVEL);
  const envLogFile = process.env.SILO_LOG_FILE?.trim() ?? "";
  const envLogReset = parseEnvBoolean(process.env.SILO_LOG_RESET);

  const minLevel = options.minLevel ?? envMinLevel ?? 4;
  const type = options.type ?? "pretty";
  const name = options.name ?? "silo";
  const logReset = options.logReset ?? envLogReset ?? false;

  const logger = new Logger<ILogObj>({
    name,
    minLevel,
    type,
    hideLogPositionForProduction: type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    // Pretty lines go to stderr; stdout carries rendered configuration
    overwrite:
      type === "pretty"
        ? {
            transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
              const parts = [...logArgs.map(formatArg), ...logErrors];
              process.stderr.write(`${logMetaMarkup}${parts.join(" ")}\n`);
            },
          }
        : undefined,
  });

  if (envLogFile) {
    const stream = openLogFile(envLogFile, logReset);
    if (stream) {
      logger.attachTransport((logObj) => {
        stream.write(`${JSON.stringify(logObj)}\n`);
      });
    }
  }

  return logger;
}

/**
 * Default logger used when callers do not inject one.
 */
export const defaultLogger = createLogger();

export type { ILogObj, Logger } from "tslog";
