import type { FailureKind } from "../core/errors.js";

export interface WatchTarget {
  readonly absolutePath: string;
  readonly parentDirectory: string;
}

export type EditEventKind = "created" | "modified" | "deleted" | "moved";

export interface EditEvent {
  /** Epoch milliseconds when the event was observed. */
  timestamp: number;
  kind: EditEventKind;
}

export type EnhancementResult =
  | { status: "enhanced"; enhancedText: string }
  | { status: "skipped"; reason: "empty-input" }
  | { status: "failed"; failure: FailureKind; message: string; retryable: boolean };

export type SkipReason = "self-write" | "unchanged" | "below-threshold" | "empty-input" | "already-enhanced" | "superseded" | "stopped";

export type LoopExitReason = "shutdown" | "target-lost";

export interface LoopExit {
  reason: LoopExitReason;
}
