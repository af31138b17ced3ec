/**
 * Layer reader: finds configuration files and turns each one into a
 * {@link Layer}.
 *
 * Files are JSON with comments. A missing file contributes nothing; a file
 * that cannot be read, parsed or validated aborts the whole resolution.
 */

import { readFileSync } from "node:fs";
import {
  findNodeAtLocation,
  getNodeValue,
  type Node,
  type ParseError,
  parseTree,
  printParseErrorCode,
} from "jsonc-parser";
import type { ILogObj, Logger } from "tslog";
import {
  ConfigFieldError,
  ConfigParseError,
  ConfigReadError,
  isNotFoundError,
  type SourcePosition,
} from "../core/errors.js";
import { globalConfigPath, localConfigPaths, type UserPaths } from "./paths.js";
import type { Layer, LayerKind } from "./types.js";
import { validateLayerFields, warnUnknownKey } from "./validate.js";

const PARSE_OPTIONS = {
  disallowComments: false,
  allowTrailingComma: false,
  allowEmptyContent: false,
} as const;

const PARSE_ERROR_MESSAGES: Record<string, string> = {
  InvalidSymbol: "invalid symbol",
  InvalidNumberFormat: "invalid number",
  PropertyNameExpected: "property name expected",
  ValueExpected: "value expected",
  ColonExpected: "colon expected",
  CommaExpected: "comma expected",
  CloseBraceExpected: "closing brace expected",
  CloseBracketExpected: "closing bracket expected",
  EndOfFileExpected: "end of file expected",
  InvalidCommentToken: "invalid comment",
  UnexpectedEndOfComment: "unterminated comment",
  UnexpectedEndOfString: "unterminated string",
  UnexpectedEndOfNumber: "unterminated number",
  InvalidUnicode: "invalid unicode escape",
  InvalidEscapeCharacter: "invalid escape character",
  InvalidCharacter: "invalid character",
};

/**
 * Converts a character offset into a 1-based line and column.
 */
export function positionAt(text: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: end - lineStart + 1 };
}

function parseDocument(text: string, origin: string): Node {
  const errors: ParseError[] = [];
  const tree = parseTree(text, errors, PARSE_OPTIONS);
  const [first] = errors;
  if (first) {
    const code = printParseErrorCode(first.error);
    const message = PARSE_ERROR_MESSAGES[code] ?? code;
    throw new ConfigParseError(`invalid JSON: ${message}`, origin, positionAt(text, first.offset), code);
  }
  if (!tree) {
    throw new ConfigParseError("invalid JSON: value expected", origin, { line: 1, column: 1 });
  }
  return tree;
}

/**
 * Parses and validates the text of one configuration file.
 *
 * @param text - File contents
 * @param origin - File path, used in errors and provenance
 * @param kind - Precedence class of the file
 * @param logger - Receives warnings for unknown keys
 * @throws ConfigParseError on syntax errors
 * @throws ConfigFieldError when a recognized key has the wrong shape
 */
export function parseLayer(
  text: string,
  origin: string,
  kind: LayerKind,
  logger: Logger<ILogObj>,
): Layer {
  // Editors on some platforms prepend a byte order mark
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const tree = parseDocument(source, origin);

  try {
    const fields = validateLayerFields(getNodeValue(tree), warnUnknownKey(logger, origin));
    return Object.freeze({ kind, origin, fields });
  } catch (error) {
    if (error instanceof ConfigFieldError) {
      const node = findNodeAtLocation(tree, [...error.fieldPath]);
      const position = node ? positionAt(source, node.offset) : undefined;
      throw error.withLocation(origin, position);
    }
    throw error;
  }
}

/**
 * Reads one configuration file.
 *
 * @returns The layer, or undefined when the file does not exist
 * @throws ConfigReadError if the file exists but cannot be read
 */
export function readLayerFile(
  path: string,
  kind: LayerKind,
  logger: Logger<ILogObj>,
): Layer | undefined {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) {
      logger.trace(`No config file at ${path}`);
      return undefined;
    }
    throw new ConfigReadError(path, error);
  }

  const layer = parseLayer(text, path, kind, logger);
  logger.debug(`Loaded ${kind} config layer from ${path}`);
  return layer;
}

/**
 * Reads every file-backed layer in ascending precedence: the global file,
 * then local files from the filesystem root down to the working directory.
 * The compiled-in default layer is not included. Without a working directory
 * only the global file is read.
 */
export function readFileLayers(
  paths: UserPaths & { cwd?: string },
  logger: Logger<ILogObj>,
): Layer[] {
  const layers: Layer[] = [];

  const globalPath = globalConfigPath(paths);
  const global = readLayerFile(globalPath, "global", logger);
  if (global) layers.push(global);

  const { cwd } = paths;
  const localPaths = cwd === undefined ? [] : localConfigPaths({ ...paths, cwd });
  for (const path of localPaths) {
    // Working inside the global config directory must not read that file twice
    if (path === globalPath) continue;
    const local = readLayerFile(path, "local", logger);
    if (local) layers.push(local);
  }

  return layers;
}
