#!/usr/bin/env node

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import dotenv from "dotenv";

const args = process.argv.slice(2);
const arg = args[0];

// Handle --version / --help before anything else
if (arg === "--version" || arg === "-v") {
  const pkgPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "package.json");
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  const version = typeof pkg === "object" && pkg !== null && "version" in pkg ? String(pkg.version) : "unknown";
  console.log(`note-polisher ${version}`);
  process.exit(0);
}

if (arg === "--help" || arg === "-h") {
  const { USAGE } = await import("./commands/watch.js");
  console.log(USAGE);
  console.log("\nWatches the file and rewrites it with an AI-polished version whenever you pause editing.");
  console.log("\nEnvironment:");
  console.log("  ANTHROPIC_API_KEY                 API credential (checked at the first request)");
  console.log("  NOTE_POLISHER_MODEL               haiku | sonnet | opus (default: haiku)");
  console.log("  NOTE_POLISHER_DEBOUNCE_MS         quiet period before an edit counts as settled (default: 1500)");
  console.log("  NOTE_POLISHER_TIMEOUT_MS          per-request timeout (default: 60000)");
  console.log("  NOTE_POLISHER_MAX_ATTEMPTS        attempts for transient failures (default: 3)");
  console.log("  NOTE_POLISHER_BACKOFF_MS          first retry delay, doubled each retry (default: 1000)");
  console.log("  NOTE_POLISHER_MIN_CHANGED_LINES   added lines needed to trigger (default: 1)");
  console.log("  NOTE_POLISHER_VERBOSE             1 to enable debug logging");
  process.exit(0);
}

dotenv.config();

const { run } = await import("./commands/watch.js");
process.exitCode = await run(args);
