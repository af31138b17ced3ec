import type { StackEntry } from "./scalar.js";
import {
  LIST_FIELD_MODES,
  LIST_FIELD_NAMES,
  type ListFieldName,
  type ListFields,
  type ListFieldsInput,
  type ListFieldsProvenance,
  type ListMode,
  type Origin,
  type SourcedValue,
} from "./types.js";

export interface AccumulatedList {
  readonly values: string[];
  /** Parallel to values */
  readonly sources: SourcedValue[];
}

/**
 * Merges one list field across a stack of entries, lowest precedence first.
 *
 * In "set" mode a value is kept once, where it first appears. In "sequence"
 * mode every occurrence is kept in order. Either way a value is attributed to
 * the entry that introduced it first, so a hook repeated by a later layer
 * still reports the earlier origin.
 */
export function accumulateList<F>(
  stack: readonly StackEntry<F>[],
  pick: (fields: F) => readonly string[] | undefined,
  mode: ListMode,
): AccumulatedList {
  const values: string[] = [];
  const sources: SourcedValue[] = [];
  const firstOrigin = new Map<string, Origin>();

  for (const entry of stack) {
    for (const value of pick(entry.fields) ?? []) {
      const seenAt = firstOrigin.get(value);
      if (seenAt !== undefined && mode === "set") continue;

      const origin = seenAt ?? entry.origin;
      if (seenAt === undefined) firstOrigin.set(value, origin);
      values.push(value);
      sources.push({ value, origin });
    }
  }

  return { values, sources };
}

export interface ResolvedListFields {
  readonly fields: ListFields;
  readonly provenance: ListFieldsProvenance;
}

/**
 * Accumulates all five list fields of a stack.
 */
export function resolveListFields<F extends ListFieldsInput>(
  stack: readonly StackEntry<F>[],
): ResolvedListFields {
  const fields: Record<ListFieldName, string[]> = {
    mountsRO: [],
    mountsRW: [],
    env: [],
    preRunHooks: [],
    postBuildHooks: [],
  };
  const provenance: Record<ListFieldName, SourcedValue[]> = {
    mountsRO: [],
    mountsRW: [],
    env: [],
    preRunHooks: [],
    postBuildHooks: [],
  };

  for (const name of LIST_FIELD_NAMES) {
    const { values, sources } = accumulateList(stack, (f) => f[name], LIST_FIELD_MODES[name]);
    fields[name] = values;
    provenance[name] = sources;
  }

  return { fields, provenance };
}
