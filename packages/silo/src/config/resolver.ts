/**
 * Resolution facade.
 *
 * Folds the ordered layers (default < global file < local files) into one
 * effective {@link Config} and a {@link Provenance} of the same shape.
 */

import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";
import { defaultLayer } from "./defaults.js";
import { readFileLayers } from "./layer-reader.js";
import { resolveListFields } from "./list.js";
import { resolveRepoOverlays, resolveToolOverlays } from "./overlay.js";
import { type ConfigPaths, resolveUserPaths, type UserPaths } from "./paths.js";
import { resolveScalar } from "./scalar.js";
import { type Config, DEFAULT_BACKEND, type Layer, type ResolvedConfig } from "./types.js";

/**
 * Dependencies of a resolution. Everything defaults to the running process.
 */
export interface ResolverOptions {
  /** Locations to search; defaults to the process environment and working directory */
  paths?: ConfigPaths;
  /** Receives debug output and unknown-key warnings */
  logger?: Logger<ILogObj>;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Folds layers into a configuration and its provenance. Pure: no I/O.
 *
 * @param layers - Layers in ascending precedence
 */
export function resolveLayers(layers: readonly Layer[]): ResolvedConfig {
  const backend = resolveScalar(layers, (fields) => fields.backend, DEFAULT_BACKEND);
  const tool = resolveScalar(layers, (fields) => fields.tool, "");
  const lists = resolveListFields(layers);
  const tools = resolveToolOverlays(layers);
  const repos = resolveRepoOverlays(layers);

  return deepFreeze({
    config: {
      backend: backend.value,
      tool: tool.value,
      ...lists.fields,
      tools: tools.configs,
      repos: repos.configs,
    },
    provenance: {
      backend: backend.origin,
      tool: tool.origin,
      ...lists.provenance,
      tools: tools.provenance,
      repos: repos.provenance,
    },
  });
}

/**
 * Paths of the running process. A working directory that has been removed
 * leaves only the default layer and the global file.
 */
function processPaths(logger: Logger<ILogObj>): UserPaths & { cwd?: string } {
  const paths = resolveUserPaths();
  let cwd: string;
  try {
    cwd = process.cwd();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Cannot determine the working directory (${reason}); skipping local config files`);
    return paths;
  }
  return { ...paths, cwd };
}

/**
 * Reads every layer and returns the merged configuration with provenance.
 *
 * @throws ConfigReadError if an existing file cannot be read
 * @throws ConfigParseError if a file is not valid JSON with comments
 * @throws ConfigFieldError if a recognized field has the wrong shape
 */
export function loadAllWithSources(options: ResolverOptions = {}): ResolvedConfig {
  const logger = options.logger ?? defaultLogger;
  const paths = options.paths ?? processPaths(logger);

  const layers = [defaultLayer(paths), ...readFileLayers(paths, logger)];
  logger.debug(`Resolving configuration from ${layers.length} layer(s)`);
  return resolveLayers(layers);
}

/**
 * Like {@link loadAllWithSources}, without the provenance.
 */
export function loadAll(options: ResolverOptions = {}): Config {
  return loadAllWithSources(options).config;
}

/**
 * The compiled-in baseline. Reads no files, ignores the working directory and
 * cannot fail.
 */
export function defaultConfig(options: { paths?: UserPaths } = {}): Config {
  const paths = options.paths ?? resolveUserPaths();
  return resolveLayers([defaultLayer(paths)]).config;
}
