import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigFieldError, ConfigParseError, ConfigReadError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { parseLayer, positionAt, readFileLayers, readLayerFile } from "./layer-reader.js";
import { type ConfigPaths, globalConfigPath } from "./paths.js";

const logger = createLogger({ type: "hidden", minLevel: 0 });

function parseError(text: string): ConfigParseError {
  try {
    parseLayer(text, "/p/silo.jsonc", "local", logger);
  } catch (error) {
    if (error instanceof ConfigParseError) return error;
    throw error;
  }
  throw new Error("expected a ConfigParseError");
}

function fieldError(text: string): ConfigFieldError {
  try {
    parseLayer(text, "/p/silo.jsonc", "local", logger);
  } catch (error) {
    if (error instanceof ConfigFieldError) return error;
    throw error;
  }
  throw new Error("expected a ConfigFieldError");
}

describe("positionAt", () => {
  it("should count lines and columns from 1", () => {
    const text = "{\n  \"a\": 1\n}";

    expect(positionAt(text, 0)).toEqual({ line: 1, column: 1 });
    expect(positionAt(text, 4)).toEqual({ line: 2, column: 3 });
    expect(positionAt(text, 11)).toEqual({ line: 3, column: 1 });
  });
});

describe("parseLayer", () => {
  it("should accept line and block comments", () => {
    const layer = parseLayer(
      [
        "// silo configuration",
        "{",
        '  "backend": "container", // local engine',
        "  /* shared caches */",
        '  "mounts_ro": ["/cache"]',
        "}",
      ].join("\n"),
      "/p/silo.jsonc",
      "global",
      logger,
    );

    expect(layer).toEqual({
      kind: "global",
      origin: "/p/silo.jsonc",
      fields: { backend: "container", mountsRO: ["/cache"] },
    });
  });

  it("should return a frozen layer", () => {
    const layer = parseLayer("{}", "/p/silo.jsonc", "local", logger);

    expect(Object.isFrozen(layer)).toBe(true);
  });

  it("should skip a byte order mark", () => {
    const layer = parseLayer('\uFEFF{"backend": "ssh"}', "/p/silo.jsonc", "local", logger);

    expect(layer.fields.backend).toBe("ssh");
  });

  describe("syntax errors", () => {
    it("should reject a trailing comma with its position", () => {
      const error = parseError('{\n  "backend": "ssh",\n}\n');

      expect(error.code).toBe("PropertyNameExpected");
      expect(error.line).toBe(3);
      expect(error.column).toBe(1);
      expect(error.message).toBe(
        "/p/silo.jsonc: invalid JSON: property name expected at line 3, column 1",
      );
    });

    it("should report a missing comma at the next property", () => {
      const error = parseError('{\n  "backend": "ssh"\n  "tool": "claude"\n}\n');

      expect(error.code).toBe("CommaExpected");
      expect(error.line).toBe(3);
      expect(error.column).toBe(3);
    });

    it("should reject an empty file", () => {
      const error = parseError("");

      expect(error.code).toBe("ValueExpected");
      expect(error.message).toBe("/p/silo.jsonc: invalid JSON: value expected at line 1, column 1");
    });
  });

  describe("field errors", () => {
    it("should locate a bad list element", () => {
      const error = fieldError('{\n  "env": ["A", 1]\n}\n');

      expect(error.field).toBe("env[1]");
      expect(error.path).toBe("/p/silo.jsonc");
      expect(error.position).toEqual({ line: 2, column: 16 });
      expect(error.message).toBe("/p/silo.jsonc: env[1] must be a string (line 2, column 16)");
    });

    it("should locate an unknown backend", () => {
      const error = fieldError('{ "backend": "podman" }');

      expect(error.position).toEqual({ line: 1, column: 14 });
    });

    it("should point at the document for a non-object root", () => {
      const error = fieldError("[]");

      expect(error.message).toBe(
        "/p/silo.jsonc: configuration must be a JSON object (line 1, column 1)",
      );
    });
  });

  it("should keep an overlay named __proto__", () => {
    const layer = parseLayer(
      '{ "tools": { "__proto__": { "env": ["X"] } } }',
      "/p/silo.jsonc",
      "local",
      logger,
    );

    expect(Object.keys(layer.fields.tools ?? {})).toEqual(["__proto__"]);
    expect(layer.fields.tools?.["__proto__"]).toEqual({ env: ["X"] });
  });

  it("should warn about unknown keys", () => {
    const warnings: unknown[] = [];
    const capturing = createLogger({ type: "hidden", minLevel: 0 });
    capturing.attachTransport((logObj) => {
      if (logObj._meta.logLevelName === "WARN") warnings.push(logObj[0]);
    });

    parseLayer('{ "mount_ro": ["/a"] }', "/p/silo.jsonc", "local", capturing);

    expect(warnings).toEqual(['/p/silo.jsonc: ignoring unknown key "mount_ro"']);
  });
});

describe("reading files", () => {
  let dir: string;
  let paths: ConfigPaths;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "silo-reader-"));
    paths = {
      homeDir: join(dir, "home"),
      xdgConfigHome: join(dir, "home", ".config"),
      xdgDataHome: join(dir, "home", ".local", "share"),
      cwd: join(dir, "work", "app"),
    };
    mkdirSync(paths.cwd, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("readLayerFile", () => {
    it("should return undefined for a missing file", () => {
      expect(readLayerFile(join(dir, "missing.jsonc"), "local", logger)).toBeUndefined();
    });

    it("should fail when the path cannot be read", () => {
      const path = join(dir, "silo.jsonc");
      mkdirSync(path);

      expect(() => readLayerFile(path, "local", logger)).toThrow(ConfigReadError);
    });

    it("should use the file path as origin", () => {
      const path = join(dir, "silo.jsonc");
      writeFileSync(path, '{ "tool": "claude" }');

      expect(readLayerFile(path, "local", logger)).toEqual({
        kind: "local",
        origin: path,
        fields: { tool: "claude" },
      });
    });
  });

  describe("readFileLayers", () => {
    it("should return nothing when no file exists", () => {
      expect(readFileLayers(paths, logger)).toEqual([]);
    });

    it("should order the global file before local files from the root down", () => {
      mkdirSync(join(paths.xdgConfigHome, "silo"), { recursive: true });
      writeFileSync(globalConfigPath(paths), '{ "tool": "claude" }');
      writeFileSync(join(dir, "work", "silo.jsonc"), '{ "tool": "opencode" }');
      writeFileSync(join(paths.cwd, "silo.jsonc"), '{ "tool": "copilot" }');

      const layers = readFileLayers(paths, logger);

      expect(layers.map((layer) => [layer.kind, layer.origin, layer.fields.tool])).toEqual([
        ["global", globalConfigPath(paths), "claude"],
        ["local", join(dir, "work", "silo.jsonc"), "opencode"],
        ["local", join(paths.cwd, "silo.jsonc"), "copilot"],
      ]);
    });

    it("should read the global file once when working inside its directory", () => {
      mkdirSync(join(paths.xdgConfigHome, "silo"), { recursive: true });
      writeFileSync(globalConfigPath(paths), '{ "tool": "claude" }');

      const layers = readFileLayers({ ...paths, cwd: join(paths.xdgConfigHome, "silo") }, logger);

      expect(layers.map((layer) => layer.kind)).toEqual(["global"]);
    });

    it("should read only the global file without a working directory", () => {
      mkdirSync(join(paths.xdgConfigHome, "silo"), { recursive: true });
      writeFileSync(globalConfigPath(paths), '{ "tool": "claude" }');
      writeFileSync(join(paths.cwd, "silo.jsonc"), '{ "tool": "copilot" }');
      const { homeDir, xdgConfigHome, xdgDataHome } = paths;

      const layers = readFileLayers({ homeDir, xdgConfigHome, xdgDataHome }, logger);

      expect(layers.map((layer) => layer.origin)).toEqual([globalConfigPath(paths)]);
    });

    it("should abort on the first malformed file", () => {
      writeFileSync(join(paths.cwd, "silo.jsonc"), "{ not json }");

      expect(() => readFileLayers(paths, logger)).toThrow(ConfigParseError);
    });
  });
});
