#!/usr/bin/env node
/**
 * decigraph CLI.
 *
 * Usage:
 *   npm run cli -- validate
 *   npm run cli -- cascade DEC-003 --reverse
 *   npm run cli -- frontier --top 5 --json
 *
 * Paths come from DECIGRAPH_ROOT (default: the working directory) and the
 * DECIGRAPH_*_DIR overrides; see .env.example.
 */

import "dotenv/config";

import { createCliContext, runCli } from "../src/cli/commands.js";
import { getConfig } from "../src/config/index.js";
import { log } from "../src/utils/telemetry.js";
import { SERVICE_VERSION } from "../src/version.js";

// Telemetry lines go to stderr; keep them out of the way unless asked for
log.level = process.env.LOG_LEVEL ?? "warn";

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  if (args[0] === "--version") {
    console.log(SERVICE_VERSION);
    return 0;
  }

  const ctx = await createCliContext(getConfig(), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  });
  return runCli(args, ctx);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Error:", err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  },
);
