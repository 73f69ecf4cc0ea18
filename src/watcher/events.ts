import { EventEmitter } from "events";
import type { FailureKind } from "../core/errors.js";
import type { EditEventKind, LoopExitReason, SkipReason } from "./types.js";

export interface LoopEvents {
  "watch:started": [payload: { path: string }];
  "edit:detected": [payload: { path: string }];
  "cycle:skipped": [payload: { reason: SkipReason }];
  "enhancement:applied": [payload: { path: string; fingerprint: string }];
  "enhancement:failed": [payload: { failure: FailureKind | "write"; message: string }];
  "cycle:failed": [payload: { message: string }];
  "target:lost": [payload: { path: string; kind: EditEventKind | "missing" }];
  "loop:stopped": [payload: { reason: LoopExitReason }];
}

export class TypedEmitter extends EventEmitter {
  emit<K extends keyof LoopEvents>(event: K, ...args: LoopEvents[K]): boolean {
    return super.emit(event, ...args);
  }
  on<K extends keyof LoopEvents>(event: K, listener: (...args: LoopEvents[K]) => void): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }
  once<K extends keyof LoopEvents>(event: K, listener: (...args: LoopEvents[K]) => void): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }
}
