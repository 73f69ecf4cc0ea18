import fs from "fs";
import { log } from "../core/logger.js";
import { WriteError } from "../core/errors.js";
import { countAddedLines, takeSnapshot, type ContentSnapshot } from "../core/fingerprint.js";
import { AtomicWriter } from "./atomic-writer.js";
import { ChangeDetector, DEFAULT_DEBOUNCE_MS } from "./change-detector.js";
import type { EnhancementClient } from "./enhancement-client.js";
import { TypedEmitter } from "./events.js";
import { createFileWatcher, type TargetWatcher, type TargetWatcherFactory } from "./file-watcher.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy, type SleepFn } from "./retry.js";
import { SelfWriteGuard } from "./self-write-guard.js";
import type { EditEvent, EditEventKind, LoopExit, LoopExitReason, SkipReason, WatchTarget } from "./types.js";

export interface EnhancementLoopOptions {
  target: WatchTarget;
  client: Pick<EnhancementClient, "enhance">;
  writer?: Pick<AtomicWriter, "write"> | undefined;
  guard?: SelfWriteGuard | undefined;
  debounceMs?: number | undefined;
  /** Minimum added non-blank lines before an edit is worth a remote call. */
  minChangedLines?: number | undefined;
  retryPolicy?: RetryPolicy | undefined;
  sleep?: SleepFn | undefined;
  createWatcher?: TargetWatcherFactory | undefined;
}

/**
 * Owns one watched file: turns settled edits into at most one remote call at
 * a time and writes results back without clobbering newer user edits.
 */
export class EnhancementLoop {
  readonly events = new TypedEmitter();
  readonly finished: Promise<LoopExit>;

  private readonly target: WatchTarget;
  private readonly client: Pick<EnhancementClient, "enhance">;
  private readonly writer: Pick<AtomicWriter, "write">;
  private readonly guard: SelfWriteGuard;
  private readonly debounceMs: number;
  private readonly minChangedLines: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: SleepFn | undefined;
  private readonly createWatcher: TargetWatcherFactory;
  private readonly shutdown = new AbortController();
  private readonly resolveFinished: (exit: LoopExit) => void;

  private detector: ChangeDetector | null = null;
  private watcher: TargetWatcher | null = null;
  private baseline: ContentSnapshot | null = null;
  private inFlight = false;
  private recheckPending = false;
  private started = false;
  private stopped = false;
  private cycle: Promise<void> = Promise.resolve();
  private stopping: Promise<LoopExit> | null = null;

  constructor(options: EnhancementLoopOptions) {
    this.target = options.target;
    this.client = options.client;
    this.writer = options.writer ?? new AtomicWriter();
    this.guard = options.guard ?? new SelfWriteGuard();
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.minChangedLines = options.minChangedLines ?? 1;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
    this.createWatcher = options.createWatcher ?? createFileWatcher;

    let resolveFinished: (exit: LoopExit) => void = () => {};
    this.finished = new Promise<LoopExit>((resolve) => {
      resolveFinished = resolve;
    });
    this.resolveFinished = resolveFinished;
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    this.baseline = await this.readSnapshot();

    this.detector = new ChangeDetector(this.debounceMs, {
      onSettled: () => this.handleSettled(),
      onTargetLost: (event) => this.handleTargetLost(event.kind),
    });
    this.watcher = this.createWatcher(this.target, (event) => this.handleEditEvent(event));
    await this.watcher.start();

    log.info("watch", `watching ${this.target.absolutePath} (debounce ${this.debounceMs}ms)`);
    this.events.emit("watch:started", { path: this.target.absolutePath });
  }

  /** Start and wait until the loop ends. */
  async run(): Promise<LoopExit> {
    await this.start();
    return this.finished;
  }

  stop(reason: LoopExitReason = "shutdown"): Promise<LoopExit> {
    if (!this.stopping) {
      this.stopping = this.shutdownNow(reason);
    }
    return this.stopping;
  }

  /** Resolves once no enhancement cycle is running. */
  whenIdle(): Promise<void> {
    return this.cycle;
  }

  isInFlight(): boolean {
    return this.inFlight;
  }

  getGuard(): SelfWriteGuard {
    return this.guard;
  }

  handleEditEvent(event: EditEvent): void {
    if (this.stopped || !this.detector) return;
    log.debug("watch", `event: ${event.kind}`);
    this.detector.push(event);
  }

  handleSettled(): void {
    if (this.stopped) return;
    if (this.inFlight) {
      // Re-read the file once the current call completes; intermediate states are dropped.
      this.recheckPending = true;
      log.debug("loop", "edit settled during an in-flight call, re-checking afterwards");
      return;
    }
    this.cycle = this.drain();
  }

  private async drain(): Promise<void> {
    this.inFlight = true;
    try {
      do {
        this.recheckPending = false;
        await this.runCycle();
      } while (this.recheckPending && !this.stopped);
    } finally {
      this.inFlight = false;
    }
  }

  private async runCycle(): Promise<void> {
    try {
      await this.processLatest();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error("loop", `enhancement cycle failed: ${message}`);
      this.events.emit("cycle:failed", { message });
    }
  }

  private async processLatest(): Promise<void> {
    const snapshot = await this.readSnapshot();
    if (!snapshot) {
      this.handleTargetLost("missing");
      return;
    }

    if (this.guard.consume(snapshot.fingerprint)) {
      this.baseline = snapshot;
      this.skip("self-write");
      return;
    }
    if (this.baseline && this.baseline.fingerprint === snapshot.fingerprint) {
      this.skip("unchanged");
      return;
    }
    if (this.baseline && this.minChangedLines > 0) {
      const added = countAddedLines(this.baseline.rawText, snapshot.rawText);
      if (added < this.minChangedLines) {
        log.info("loop", `ignored change (${added} added lines < ${this.minChangedLines})`);
        this.baseline = snapshot;
        this.skip("below-threshold");
        return;
      }
    }

    log.info("loop", "edit detected, requesting enhancement");
    this.events.emit("edit:detected", { path: this.target.absolutePath });

    const signal = this.shutdown.signal;
    const result = await withRetry(
      () => this.client.enhance(snapshot.rawText, signal),
      this.retryPolicy,
      { sleep: this.sleep, signal },
    );

    if (this.stopped) {
      this.skip("stopped");
      return;
    }

    if (result.status === "skipped") {
      this.baseline = snapshot;
      this.skip(result.reason);
      return;
    }
    if (result.status === "failed") {
      if (result.failure === "cancelled") {
        this.skip("stopped");
        return;
      }
      log.error("loop", `enhancement failed (${result.failure}): ${result.message}; file left unchanged`);
      this.events.emit("enhancement:failed", { failure: result.failure, message: result.message });
      return;
    }

    const enhancedText = result.enhancedText;
    if (enhancedText === snapshot.rawText) {
      this.baseline = snapshot;
      this.skip("already-enhanced");
      return;
    }

    // The user may have kept typing while the call was out; their newer text wins.
    const current = await this.readSnapshot();
    if (!current) {
      this.handleTargetLost("missing");
      return;
    }
    if (current.fingerprint !== snapshot.fingerprint) {
      log.info("loop", "file changed while enhancing, discarding stale response");
      this.recheckPending = true;
      this.skip("superseded");
      return;
    }
    if (this.stopped) {
      this.skip("stopped");
      return;
    }

    try {
      await this.writer.write(this.target.absolutePath, enhancedText);
    } catch (err) {
      if (!(err instanceof WriteError)) throw err;
      log.error("loop", `enhancement failed (write): ${err.message}; file left unchanged`);
      this.events.emit("enhancement:failed", { failure: "write", message: err.message });
      return;
    }

    const written = takeSnapshot(enhancedText);
    this.guard.recordSelfWrite(written.fingerprint);
    this.baseline = written;

    log.info("loop", `enhancement applied to ${this.target.absolutePath}`);
    this.events.emit("enhancement:applied", {
      path: this.target.absolutePath,
      fingerprint: written.fingerprint,
    });
  }

  private skip(reason: SkipReason): void {
    log.debug("loop", `cycle skipped: ${reason}`);
    this.events.emit("cycle:skipped", { reason });
  }

  private handleTargetLost(kind: EditEventKind | "missing"): void {
    if (this.stopped) return;
    log.warn("watch", `target lost (${kind}): ${this.target.absolutePath}, stopping`);
    this.events.emit("target:lost", { path: this.target.absolutePath, kind });
    void this.stop("target-lost");
  }

  private async readSnapshot(): Promise<ContentSnapshot | null> {
    try {
      return takeSnapshot(await fs.promises.readFile(this.target.absolutePath, "utf-8"));
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
  }

  private async shutdownNow(reason: LoopExitReason): Promise<LoopExit> {
    this.stopped = true;
    this.shutdown.abort();
    this.detector?.stop();

    try {
      await this.watcher?.stop();
    } catch (err) {
      log.warn("watch", "error while closing watcher:", err);
    }
    await this.cycle;

    const exit: LoopExit = { reason };
    log.info("loop", `stopped (${reason})`);
    this.events.emit("loop:stopped", { reason });
    this.resolveFinished(exit);
    return exit;
  }
}
