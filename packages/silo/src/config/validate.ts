/**
 * Shape validation for parsed configuration files.
 *
 * Follows the section/key validator pattern: each helper checks one value and
 * throws a {@link ConfigFieldError} naming the exact location on failure.
 */

import type { ILogObj, Logger } from "tslog";
import { ConfigFieldError, formatFieldPath } from "../core/errors.js";
import {
  BACKENDS,
  type Backend,
  createOverlayRecord,
  isBackend,
  type LayerFields,
  type ListFieldName,
  type ListFieldsInput,
  type RepoOverlayInput,
} from "./types.js";

type FieldPath = readonly (string | number)[];

type MutableListFields = { -readonly [K in ListFieldName]?: string[] };

type MutableLayerFields = { -readonly [K in keyof LayerFields]: LayerFields[K] };

/**
 * File keys of the list fields, shared by the top level and the overlays.
 */
export const LIST_FIELD_KEYS: Readonly<Record<string, ListFieldName>> = {
  mounts_ro: "mountsRO",
  mounts_rw: "mountsRW",
  env: "env",
  pre_run_hooks: "preRunHooks",
  post_build_hooks: "postBuildHooks",
};

/** Keys accepted and ignored everywhere (editor schema hints) */
const SILENT_KEYS = new Set(["$schema"]);

/**
 * Receives keys that are not part of the format.
 */
export type UnknownKeyHandler = (fieldPath: string) => void;

/**
 * Reports unknown keys as warnings, so typos are visible without breaking
 * files written for newer versions.
 */
export function warnUnknownKey(logger: Logger<ILogObj>, origin: string): UnknownKeyHandler {
  return (fieldPath) => logger.warn(`${origin}: ignoring unknown key "${fieldPath}"`);
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateString(value: unknown, path: FieldPath): string {
  if (typeof value !== "string") {
    throw new ConfigFieldError(`${formatFieldPath(path)} must be a string`, path);
  }
  return value;
}

function validateStringArray(value: unknown, path: FieldPath): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigFieldError(`${formatFieldPath(path)} must be an array of strings`, path);
  }
  const result: string[] = [];
  for (let i = 0; i < value.length; i++) {
    result.push(validateString(value[i], [...path, i]));
  }
  return result;
}

/**
 * `tool` accepts a string or null; null and "" both mean "not set".
 */
function validateTool(value: unknown, path: FieldPath): string | undefined {
  if (value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigFieldError(`${formatFieldPath(path)} must be a string or null`, path);
  }
  return value === "" ? undefined : value;
}

/**
 * `backend` is a closed set; "" means "not set".
 */
function validateBackend(value: unknown, path: FieldPath): Backend | undefined {
  const str = validateString(value, path);
  if (str === "") return undefined;
  if (!isBackend(str)) {
    throw new ConfigFieldError(
      `${formatFieldPath(path)} must be one of: ${BACKENDS.join(", ")} (got "${str}")`,
      path,
    );
  }
  return str;
}

/**
 * Reads the list keys of a table into a fresh object. Other keys are left to
 * the caller.
 */
function validateListFields(raw: Record<string, unknown>, path: FieldPath): ListFieldsInput {
  const result: MutableListFields = {};
  for (const [key, field] of Object.entries(LIST_FIELD_KEYS)) {
    if (key in raw) {
      result[field] = validateStringArray(raw[key], [...path, key]);
    }
  }
  return result;
}

function validateOverlay(
  value: unknown,
  path: FieldPath,
  allowTool: boolean,
  onUnknownKey: UnknownKeyHandler,
): RepoOverlayInput {
  if (!isTable(value)) {
    throw new ConfigFieldError(`${formatFieldPath(path)} must be an object`, path);
  }

  for (const key of Object.keys(value)) {
    const known = Object.hasOwn(LIST_FIELD_KEYS, key) || (allowTool && key === "tool");
    if (!known && !SILENT_KEYS.has(key)) {
      onUnknownKey(formatFieldPath([...path, key]));
    }
  }

  const lists = validateListFields(value, path);
  if (allowTool && "tool" in value) {
    const tool = validateTool(value.tool, [...path, "tool"]);
    return tool === undefined ? lists : { ...lists, tool };
  }
  return lists;
}

function validateOverlayMap(
  value: unknown,
  section: "tools" | "repos",
  onUnknownKey: UnknownKeyHandler,
): Record<string, RepoOverlayInput> {
  if (!isTable(value)) {
    throw new ConfigFieldError(`${section} must be an object`, [section]);
  }
  const result = createOverlayRecord<RepoOverlayInput>();
  for (const [name, overlay] of Object.entries(value)) {
    result[name] = validateOverlay(overlay, [section, name], section === "repos", onUnknownKey);
  }
  return result;
}

/**
 * Validates the parsed top-level value of a configuration file.
 *
 * @param raw - Value produced by the JSONC parser
 * @param onUnknownKey - Called with the dotted path of every unrecognized key
 * @throws ConfigFieldError if a recognized key has the wrong shape
 */
export function validateLayerFields(
  raw: unknown,
  onUnknownKey: UnknownKeyHandler = () => {},
): LayerFields {
  if (!isTable(raw)) {
    throw new ConfigFieldError("configuration must be a JSON object", []);
  }

  const recognized = new Set([...Object.keys(LIST_FIELD_KEYS), "backend", "tool", "tools", "repos"]);
  for (const key of Object.keys(raw)) {
    if (!recognized.has(key) && !SILENT_KEYS.has(key)) {
      onUnknownKey(key);
    }
  }

  const result: MutableLayerFields = { ...validateListFields(raw, []) };

  if ("backend" in raw) {
    const backend = validateBackend(raw.backend, ["backend"]);
    if (backend !== undefined) result.backend = backend;
  }
  if ("tool" in raw) {
    const tool = validateTool(raw.tool, ["tool"]);
    if (tool !== undefined) result.tool = tool;
  }
  if ("tools" in raw) {
    result.tools = validateOverlayMap(raw.tools, "tools", onUnknownKey);
  }
  if ("repos" in raw) {
    result.repos = validateOverlayMap(raw.repos, "repos", onUnknownKey);
  }

  return result;
}
