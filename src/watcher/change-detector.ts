import type { EditEvent } from "./types.js";

export type DetectorState = "idle" | "pending-debounce" | "stopped";

export interface ChangeDetectorHandlers {
  onSettled: () => void;
  onTargetLost: (event: EditEvent) => void;
}

export const DEFAULT_DEBOUNCE_MS = 1500;

/**
 * Coalesces raw edit events into one "settled" signal per burst.
 * Editors typically emit several write/rename events for a single save.
 */
export class ChangeDetector {
  private state: DetectorState = "idle";
  private debounceTimer: NodeJS.Timeout | null = null;
  private pendingEvents = 0;
  private readonly debounceMs: number;
  private readonly handlers: ChangeDetectorHandlers;

  constructor(debounceMs: number, handlers: ChangeDetectorHandlers) {
    this.debounceMs = debounceMs;
    this.handlers = handlers;
  }

  push(event: EditEvent): void {
    if (this.state === "stopped") return;

    if (event.kind === "deleted" || event.kind === "moved") {
      this.cancelTimer();
      this.state = "stopped";
      this.handlers.onTargetLost(event);
      return;
    }

    this.state = "pending-debounce";
    this.pendingEvents++;
    this.cancelTimer();
    this.debounceTimer = setTimeout(() => this.settle(), this.debounceMs);
  }

  getState(): DetectorState {
    return this.state;
  }

  /** Events absorbed into the current debounce window. */
  getPendingEventCount(): number {
    return this.pendingEvents;
  }

  stop(): void {
    this.cancelTimer();
    this.pendingEvents = 0;
    this.state = "stopped";
  }

  private settle(): void {
    this.debounceTimer = null;
    this.pendingEvents = 0;
    this.state = "idle";
    this.handlers.onSettled();
  }

  private cancelTimer(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }
}
