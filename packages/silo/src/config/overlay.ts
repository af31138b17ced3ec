/**
 * Nested overlay resolution for the `tools` and `repos` sections.
 *
 * Each overlay name gets its own stack built only from the layers that define
 * that name; the top-level lists never leak into an overlay.
 */

import { resolveListFields } from "./list.js";
import { resolveScalar, type StackEntry } from "./scalar.js";
import {
  createOverlayRecord,
  type Layer,
  type ListFieldsInput,
  type RepoConfig,
  type RepoOverlayInput,
  type RepoProvenance,
  type ToolConfig,
  type ToolOverlayInput,
  type ToolProvenance,
} from "./types.js";

/**
 * Groups the overlay sections of every layer by name. Names keep the order in
 * which they first appear; each stack stays in layer precedence order.
 */
export function collectOverlayStacks<O extends ListFieldsInput>(
  layers: readonly Layer[],
  pick: (layer: Layer) => Readonly<Record<string, O>> | undefined,
): Map<string, StackEntry<O>[]> {
  const stacks = new Map<string, StackEntry<O>[]>();
  for (const layer of layers) {
    const section = pick(layer);
    if (!section) continue;
    for (const [name, fields] of Object.entries(section)) {
      const stack = stacks.get(name);
      const entry = { origin: layer.origin, fields };
      if (stack) {
        stack.push(entry);
      } else {
        stacks.set(name, [entry]);
      }
    }
  }
  return stacks;
}

export interface ResolvedOverlays<C, P> {
  readonly configs: Record<string, C>;
  readonly provenance: Record<string, P>;
}

/**
 * Resolves every `tools.<name>` overlay.
 */
export function resolveToolOverlays(
  layers: readonly Layer[],
): ResolvedOverlays<ToolConfig, ToolProvenance> {
  const configs = createOverlayRecord<ToolConfig>();
  const provenance = createOverlayRecord<ToolProvenance>();

  const stacks = collectOverlayStacks<ToolOverlayInput>(layers, (layer) => layer.fields.tools);
  for (const [name, stack] of stacks) {
    const lists = resolveListFields(stack);
    configs[name] = lists.fields;
    provenance[name] = lists.provenance;
  }

  return { configs, provenance };
}

/**
 * Resolves every `repos.<name>` overlay, including its own `tool` scalar.
 *
 * A repository that never picks a tool resolves to "" from "default"; falling
 * back to the top-level tool is the launcher's decision, not the resolver's.
 */
export function resolveRepoOverlays(
  layers: readonly Layer[],
): ResolvedOverlays<RepoConfig, RepoProvenance> {
  const configs = createOverlayRecord<RepoConfig>();
  const provenance = createOverlayRecord<RepoProvenance>();

  const stacks = collectOverlayStacks<RepoOverlayInput>(layers, (layer) => layer.fields.repos);
  for (const [name, stack] of stacks) {
    const lists = resolveListFields(stack);
    const tool = resolveScalar(stack, (fields) => fields.tool, "");
    configs[name] = { ...lists.fields, tool: tool.value };
    provenance[name] = { ...lists.provenance, tool: tool.origin };
  }

  return { configs, provenance };
}
