import {
  ConfigError,
  InvalidPathError,
  createClaudeEngine,
  createTimestampedLogger,
  loadConfig,
  log,
  setLogger,
  type Engine,
  type PolisherConfig,
} from "../core/index.js";
import { EnhancementClient, EnhancementLoop, resolveWatchTarget, type WatchTarget } from "../watcher/index.js";

export const USAGE = "Usage: note-polisher <path/to/notes.md>";

/**
 * Watch one file until shutdown or until it disappears.
 * Returns the process exit code.
 */
export async function run(args: string[], engine: Engine = createClaudeEngine()): Promise<number> {
  let target: WatchTarget;
  try {
    target = resolveWatchTarget(args);
  } catch (err) {
    if (!(err instanceof InvalidPathError)) throw err;
    console.error(`Error: ${err.message}`);
    console.error(USAGE);
    return 1;
  }

  let config: PolisherConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`Error: ${err.message}`);
    return 1;
  }

  setLogger(createTimestampedLogger({ minLevel: config.verbose ? "debug" : "info" }));

  const client = new EnhancementClient({ engine, config });
  const loop = new EnhancementLoop({
    target,
    client,
    debounceMs: config.debounceMs,
    minChangedLines: config.minChangedLines,
    retryPolicy: {
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.backoffMs,
      maxDelayMs: config.maxBackoffMs,
    },
  });

  const onSignal = (signal: NodeJS.Signals) => {
    log.info("cli", `received ${signal}, shutting down`);
    void loop.stop("shutdown");
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const exit = await loop.run();
    log.info("cli", `exiting (${exit.reason})`);
    return 0;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}
