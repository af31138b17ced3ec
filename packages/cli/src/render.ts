import { Chalk } from "chalk";
import {
  type Config,
  type ListFieldName,
  type ListFields,
  type ListFieldsProvenance,
  type Provenance,
  type ResolvedConfig,
  tildePath,
} from "silo";

/**
 * Options for rendering a configuration document.
 */
export interface RenderOptions {
  /** Color keys, strings and comments (only meaningful on a terminal) */
  color?: boolean;
  /** Home directory abbreviated to "~" in origin comments */
  homeDir?: string;
}

/** One output line; the comment goes after any separator comma */
interface Line {
  text: string;
  comment?: string;
}

interface Styles {
  key: (name: string) => string;
  string: (value: string) => string;
  comment: (origin: string) => string;
}

type ListKeys = readonly (readonly [key: string, field: ListFieldName])[];

const TOP_LEVEL_LISTS: ListKeys = [
  ["mounts_ro", "mountsRO"],
  ["mounts_rw", "mountsRW"],
  ["env", "env"],
  ["post_build_hooks", "postBuildHooks"],
  ["pre_run_hooks", "preRunHooks"],
];

const OVERLAY_LISTS: ListKeys = [
  ["mounts_ro", "mountsRO"],
  ["mounts_rw", "mountsRW"],
  ["env", "env"],
  ["pre_run_hooks", "preRunHooks"],
  ["post_build_hooks", "postBuildHooks"],
];

function createStyles(options: RenderOptions): Styles {
  const paint = new Chalk({ level: options.color ? 1 : 0 });
  return {
    key: (name) => paint.cyan(JSON.stringify(name)),
    string: (value) => paint.green(JSON.stringify(value)),
    comment: (origin) => paint.gray(`// ${tildePath(origin, options.homeDir)}`),
  };
}

/**
 * Wraps members in brackets, one per line, separated by commas.
 */
function block(open: string, close: string, members: Line[][]): Line[] {
  if (members.length === 0) {
    return [{ text: `${open}${close}` }];
  }
  const lines: Line[] = [{ text: open }];
  members.forEach((member, i) => {
    const separator = i < members.length - 1 ? "," : "";
    member.forEach((line, j) => {
      const end = j === member.length - 1 ? separator : "";
      lines.push({ text: `  ${line.text}${end}`, comment: line.comment });
    });
  });
  lines.push({ text: close });
  return lines;
}

function property(styles: Styles, key: string, value: Line[]): Line[] {
  return value.map((line, i) => (i === 0 ? { ...line, text: `${styles.key(key)}: ${line.text}` } : line));
}

function scalar(styles: Styles, value: string, origin: string | undefined): Line[] {
  return [
    {
      text: value === "" ? "null" : styles.string(value),
      comment: origin === undefined ? undefined : styles.comment(origin),
    },
  ];
}

function listMembers(
  styles: Styles,
  keys: ListKeys,
  fields: ListFields,
  provenance: ListFieldsProvenance | undefined,
): Line[][] {
  return keys.map(([key, field]) => {
    const sources = provenance?.[field];
    const items = fields[field].map((value, i): Line[] => {
      const origin = sources?.[i]?.origin;
      return [
        { text: styles.string(value), comment: origin === undefined ? undefined : styles.comment(origin) },
      ];
    });
    return property(styles, key, block("[", "]", items));
  });
}

function overlayMap<C extends ListFields, P extends ListFieldsProvenance>(
  styles: Styles,
  configs: Readonly<Record<string, C>>,
  provenance: Readonly<Record<string, P>> | undefined,
  scalars: (config: C, provenance: P | undefined) => Line[][],
): Line[] {
  const names = Object.keys(configs).sort();
  const members = names.flatMap((name) => {
    const config = configs[name];
    if (!config) return [];
    const sources = provenance?.[name];
    const value = block("{", "}", [
      ...scalars(config, sources),
      ...listMembers(styles, OVERLAY_LISTS, config, sources),
    ]);
    return [property(styles, name, value)];
  });
  return block("{", "}", members);
}

function renderConfig(config: Config, provenance: Provenance | undefined, styles: Styles): string {
  const document = block("{", "}", [
    property(styles, "backend", scalar(styles, config.backend, provenance?.backend)),
    property(styles, "tool", scalar(styles, config.tool, provenance?.tool)),
    ...listMembers(styles, TOP_LEVEL_LISTS, config, provenance),
    property(styles, "tools", overlayMap(styles, config.tools, provenance?.tools, () => [])),
    property(
      styles,
      "repos",
      overlayMap(styles, config.repos, provenance?.repos, (repo, sources) => [
        property(styles, "tool", scalar(styles, repo.tool, sources?.tool)),
      ]),
    ),
  ]);

  return document
    .map((line) => (line.comment === undefined ? line.text : `${line.text} ${line.comment}`))
    .join("\n")
    .concat("\n");
}

/**
 * Renders a resolved configuration as JSON with comments. Every scalar and
 * list element is followed by a `// <origin>` comment; overlay names are
 * sorted and an unset tool is written as null.
 */
export function renderResolvedConfig(resolved: ResolvedConfig, options: RenderOptions = {}): string {
  return renderConfig(resolved.config, resolved.provenance, createStyles(options));
}

/**
 * Renders a configuration as plain JSON, without origins or colors.
 */
export function renderDefaultConfig(config: Config): string {
  return renderConfig(config, undefined, createStyles({}));
}
