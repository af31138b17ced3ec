#!/usr/bin/env node
import { runCLI } from "./program.js";

runCLI().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = 1;
});
