export type {
  WatchTarget,
  EditEvent,
  EditEventKind,
  EnhancementResult,
  SkipReason,
  LoopExit,
  LoopExitReason,
} from "./types.js";
export { resolveWatchTarget, normalizePathInput, type ResolveOptions } from "./path-resolver.js";
export { ChangeDetector, DEFAULT_DEBOUNCE_MS, type DetectorState, type ChangeDetectorHandlers } from "./change-detector.js";
export { SelfWriteGuard } from "./self-write-guard.js";
export { AtomicWriter, type AtomicWriterOps } from "./atomic-writer.js";
export { FileWatcher, createFileWatcher, type TargetWatcher, type TargetWatcherFactory } from "./file-watcher.js";
export { EnhancementClient, type EnhancementClientOptions } from "./enhancement-client.js";
export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY, type RetryPolicy, type SleepFn } from "./retry.js";
export { EnhancementLoop, type EnhancementLoopOptions } from "./enhancement-loop.js";
export { TypedEmitter, type LoopEvents } from "./events.js";
