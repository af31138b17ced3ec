import { join } from "node:path";
import { tildePath, type UserPaths } from "./paths.js";
import { DEFAULT_BACKEND, DEFAULT_ORIGIN, type Layer } from "./types.js";

/**
 * The compiled-in configuration, expressed as the lowest layer.
 *
 * Tool state directories are written with "~" so the defaults read the same
 * on every machine; the launcher expands them.
 */
export function defaultLayer(paths: UserPaths): Layer {
  const home = (path: string) => tildePath(path, paths.homeDir);

  return {
    kind: "default",
    origin: DEFAULT_ORIGIN,
    fields: {
      backend: DEFAULT_BACKEND,
      mountsRO: [],
      mountsRW: [],
      env: [],
      preRunHooks: [],
      postBuildHooks: [],
      tools: {
        claude: {
          mountsRW: ["~/.claude.json", "~/.claude"],
        },
        opencode: {
          mountsRW: [
            home(join(paths.xdgConfigHome, "opencode")),
            home(join(paths.xdgDataHome, "opencode")),
          ],
        },
        copilot: {
          mountsRW: [home(join(paths.xdgConfigHome, ".copilot"))],
          env: ["COPILOT_GITHUB_TOKEN"],
        },
      },
    },
  };
}
