import { Writable } from "node:stream";
import { ConfigError, createLogger, resolveConfigPaths } from "silo";
import { describe, expect, it } from "vitest";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./utils.js";

function createEnv() {
  let stderr = "";
  const codes: number[] = [];
  const env: CLIEnvironment = {
    argv: ["node", "silo"],
    stdout: new Writable({ write: (_chunk, _encoding, callback) => callback() }),
    stderr: new Writable({
      write(chunk, _encoding, callback) {
        stderr += chunk.toString();
        callback();
      },
    }),
    setExitCode: (code) => codes.push(code),
    createLogger: (name) => createLogger({ type: "hidden", name }),
    paths: resolveConfigPaths({}, { homeDir: "/home/ada", cwd: "/" }),
    isTTY: false,
  };
  return { env, stderr: () => stderr, codes };
}

describe("executeAction", () => {
  it("should leave the exit code alone on success", async () => {
    const { env, codes } = createEnv();

    await executeAction(async () => {}, env);

    expect(codes).toEqual([]);
  });

  it("should print the error message and exit with 1", async () => {
    const { env, stderr, codes } = createEnv();

    await executeAction(async () => {
      throw new ConfigError("backend must be a string", "/p/silo.jsonc");
    }, env);

    expect(stderr()).toContain("/p/silo.jsonc: backend must be a string\n");
    expect(codes).toEqual([1]);
  });
});
