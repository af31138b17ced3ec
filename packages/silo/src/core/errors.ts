/**
 * Configuration errors.
 *
 * Every error raised while loading configuration is a {@link ConfigError}; the
 * message is prefixed with the offending file so the CLI can print it as-is.
 */

/**
 * Base configuration error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    options?: ErrorOptions,
  ) {
    super(path ? `${path}: ${message}` : message, options);
    this.name = "ConfigError";
  }
}

/**
 * A configuration file exists but could not be read (permissions, a directory
 * in place of the file, ...). Distinct from a missing file, which is skipped.
 */
export class ConfigReadError extends ConfigError {
  constructor(path: string, cause: unknown) {
    super(`failed to read config file: ${describeError(cause)}`, path, { cause });
    this.name = "ConfigReadError";
  }
}

/**
 * A position inside a configuration file, 1-based.
 */
export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * A configuration file is not valid JSON with comments.
 */
export class ConfigParseError extends ConfigError {
  public readonly line: number;
  public readonly column: number;

  constructor(
    message: string,
    path: string,
    position: SourcePosition,
    /** jsonc-parser error code name, e.g. "CommaExpected" */
    public readonly code?: string,
  ) {
    super(`${message} at line ${position.line}, column ${position.column}`, path);
    this.name = "ConfigParseError";
    this.line = position.line;
    this.column = position.column;
  }
}

/**
 * A recognized field has the wrong shape.
 *
 * Validators throw it without a file or position; the layer reader rethrows it
 * with both once it knows where the value sits.
 */
export class ConfigFieldError extends ConfigError {
  constructor(
    public readonly detail: string,
    /** Location of the value in the document, e.g. ["tools", "claude", "env", 0] */
    public readonly fieldPath: readonly (string | number)[],
    path?: string,
    public readonly position?: SourcePosition,
  ) {
    super(
      position ? `${detail} (line ${position.line}, column ${position.column})` : detail,
      path,
    );
    this.name = "ConfigFieldError";
  }

  /** Dotted form of {@link fieldPath}, e.g. "tools.claude.env[0]" */
  get field(): string {
    return formatFieldPath(this.fieldPath);
  }

  withLocation(path: string, position?: SourcePosition): ConfigFieldError {
    return new ConfigFieldError(this.detail, this.fieldPath, path, position);
  }
}

/**
 * Formats a JSON path the way it is written in messages.
 */
export function formatFieldPath(fieldPath: readonly (string | number)[]): string {
  let out = "";
  for (const segment of fieldPath) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out === "" ? segment : `.${segment}`;
    }
  }
  return out;
}

/**
 * True for the errno Node reports when a path does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
