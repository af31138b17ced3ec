/**
 * Configuration model for silo.
 *
 * Two parallel trees come out of a resolution: the effective {@link Config}
 * that launches containers, and a {@link Provenance} of the same shape that
 * records which layer contributed every scalar and every list entry.
 */

/**
 * Container backends silo knows how to drive.
 */
export const BACKENDS = ["docker", "container", "ssh"] as const;

export type Backend = (typeof BACKENDS)[number];

/** Backend used when no layer picks one */
export const DEFAULT_BACKEND: Backend = "docker";

/**
 * Origin of a value: the literal {@link DEFAULT_ORIGIN} for the compiled-in
 * layer, otherwise the absolute path of the file that set it.
 */
export type Origin = string;

/** Origin of the compiled-in default layer */
export const DEFAULT_ORIGIN = "default";

/**
 * List fields shared by the top level and by every tool/repo overlay.
 */
export interface ListFields {
  /** Host paths mounted read-only */
  readonly mountsRO: readonly string[];
  /** Host paths mounted read-write */
  readonly mountsRW: readonly string[];
  /** Environment variables: NAME passes through from the host, NAME=VALUE sets it */
  readonly env: readonly string[];
  /** Shell commands run inside the container before the tool starts */
  readonly preRunHooks: readonly string[];
  /** Shell commands run once after the image is built */
  readonly postBuildHooks: readonly string[];
}

export type ListFieldName = keyof ListFields;

/**
 * How a list field merges across layers.
 * - "set": union, first occurrence wins, duplicates dropped
 * - "sequence": concatenation, duplicates kept
 */
export type ListMode = "set" | "sequence";

export const LIST_FIELD_MODES: Readonly<Record<ListFieldName, ListMode>> = {
  mountsRO: "set",
  mountsRW: "set",
  env: "set",
  preRunHooks: "sequence",
  postBuildHooks: "sequence",
};

export const LIST_FIELD_NAMES: readonly ListFieldName[] = [
  "mountsRO",
  "mountsRW",
  "env",
  "preRunHooks",
  "postBuildHooks",
];

export type ToolConfig = ListFields;

export interface RepoConfig extends ListFields {
  /** Tool to run in this repository, "" when the overlay does not pick one */
  readonly tool: string;
}

/**
 * Fully resolved configuration.
 */
export interface Config extends ListFields {
  readonly backend: Backend;
  /** Default tool to run, "" when unset */
  readonly tool: string;
  readonly tools: Readonly<Record<string, ToolConfig>>;
  readonly repos: Readonly<Record<string, RepoConfig>>;
}

/**
 * A list entry paired with the origin of the layer that introduced it.
 */
export interface SourcedValue {
  readonly value: string;
  readonly origin: Origin;
}

/**
 * Provenance of a list field, parallel to the resolved list (same length,
 * same order).
 */
export type ListProvenance = readonly SourcedValue[];

export type ListFieldsProvenance = {
  readonly [K in ListFieldName]: ListProvenance;
};

export type ToolProvenance = ListFieldsProvenance;

export interface RepoProvenance extends ListFieldsProvenance {
  readonly tool: Origin;
}

export interface Provenance extends ListFieldsProvenance {
  readonly backend: Origin;
  readonly tool: Origin;
  readonly tools: Readonly<Record<string, ToolProvenance>>;
  readonly repos: Readonly<Record<string, RepoProvenance>>;
}

/**
 * Config paired with its provenance.
 */
export interface ResolvedConfig {
  readonly config: Config;
  readonly provenance: Provenance;
}

/**
 * Overlay section as written in a single layer. Missing lists mean the layer
 * does not contribute to them.
 */
export type ListFieldsInput = {
  readonly [K in ListFieldName]?: readonly string[];
};

export type ToolOverlayInput = ListFieldsInput;

export interface RepoOverlayInput extends ListFieldsInput {
  readonly tool?: string;
}

/**
 * Validated contents of one configuration source.
 */
export interface LayerFields extends ListFieldsInput {
  readonly backend?: Backend;
  readonly tool?: string;
  readonly tools?: Readonly<Record<string, ToolOverlayInput>>;
  readonly repos?: Readonly<Record<string, RepoOverlayInput>>;
}

/**
 * Where a layer came from.
 * - "default": compiled into silo
 * - "global": the user-wide file under the XDG config directory
 * - "local": a silo.jsonc between the filesystem root and the working directory
 */
export type LayerKind = "default" | "global" | "local";

export interface Layer {
  readonly kind: LayerKind;
  readonly origin: Origin;
  readonly fields: LayerFields;
}

/**
 * Returns the origin recorded for a list entry, or undefined when the value is
 * not in the list. Repeated hook strings share the origin of their first
 * occurrence.
 */
export function originOf(sources: ListProvenance, value: string): Origin | undefined {
  return sources.find((entry) => entry.value === value)?.origin;
}

/**
 * An empty map keyed by overlay name. It has no prototype, so a name such as
 * "__proto__" is stored as an ordinary entry.
 */
export function createOverlayRecord<T>(): Record<string, T> {
  return Object.create(null);
}

export function isBackend(value: string): value is Backend {
  return BACKENDS.some((backend) => backend === value);
}
