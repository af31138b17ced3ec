// Resolution facade
export {
  defaultConfig,
  loadAll,
  loadAllWithSources,
  type ResolverOptions,
  resolveLayers,
} from "./config/resolver.js";

// Layers
export { defaultLayer } from "./config/defaults.js";
export { parseLayer, positionAt, readFileLayers, readLayerFile } from "./config/layer-reader.js";
export {
  type UnknownKeyHandler,
  validateLayerFields,
  warnUnknownKey,
} from "./config/validate.js";

// Building blocks
export { type AccumulatedList, accumulateList, resolveListFields } from "./config/list.js";
export {
  collectOverlayStacks,
  type ResolvedOverlays,
  resolveRepoOverlays,
  resolveToolOverlays,
} from "./config/overlay.js";
export { type ResolvedScalar, resolveScalar, type StackEntry } from "./config/scalar.js";

// Paths
export {
  CONFIG_DIRNAME,
  CONFIG_FILENAME,
  type ConfigPaths,
  type ConfigPathStatus,
  expandTildePath,
  globalConfigPath,
  listConfigPaths,
  localConfigPaths,
  resolveConfigPaths,
  resolveUserPaths,
  tildePath,
  type UserPaths,
} from "./config/paths.js";

// Launch view
export {
  type LaunchOptions,
  type LaunchSettings,
  launchSettings,
  matchingRepos,
  type RepoMatch,
  repoUrlMatches,
} from "./config/launch.js";

// Model
export {
  BACKENDS,
  type Backend,
  type Config,
  createOverlayRecord,
  DEFAULT_BACKEND,
  DEFAULT_ORIGIN,
  isBackend,
  LIST_FIELD_MODES,
  LIST_FIELD_NAMES,
  type Layer,
  type LayerFields,
  type LayerKind,
  type ListFieldName,
  type ListFields,
  type ListFieldsInput,
  type ListFieldsProvenance,
  type ListMode,
  type ListProvenance,
  type Origin,
  originOf,
  type Provenance,
  type RepoConfig,
  type RepoOverlayInput,
  type RepoProvenance,
  type ResolvedConfig,
  type SourcedValue,
  type ToolConfig,
  type ToolOverlayInput,
  type ToolProvenance,
} from "./config/types.js";

// Errors
export {
  ConfigError,
  ConfigFieldError,
  ConfigParseError,
  ConfigReadError,
  formatFieldPath,
  isNotFoundError,
  type SourcePosition,
} from "./core/errors.js";

// Logging
export {
  createLogger,
  defaultLogger,
  type ILogObj,
  type Logger,
  type LoggerOptions,
  parseLogLevel,
} from "./logging/logger.js";
