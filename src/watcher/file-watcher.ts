import chokidar, { type FSWatcher } from "chokidar";
import path from "path";
import { log } from "../core/logger.js";
import type { EditEvent, EditEventKind, WatchTarget } from "./types.js";

export type EditEventCallback = (event: EditEvent) => void;

/** Anything that can feed edit events for a target into the detector. */
export interface TargetWatcher {
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
}

export type TargetWatcherFactory = (target: WatchTarget, onEvent: EditEventCallback) => TargetWatcher;

/**
 * Watches the target's parent directory and forwards events for the target
 * file only. No debouncing here - that's the ChangeDetector's job.
 */
export class FileWatcher implements TargetWatcher {
  private watcher: FSWatcher | null = null;
  private readonly target: WatchTarget;
  private readonly onEvent: EditEventCallback;

  constructor(target: WatchTarget, onEvent: EditEventCallback) {
    this.target = target;
    this.onEvent = onEvent;
  }

  async start(): Promise<void> {
    if (this.watcher) return;

    const { absolutePath, parentDirectory } = this.target;
    const watcher = chokidar.watch(parentDirectory, {
      depth: 0,
      persistent: true,
      ignoreInitial: true,
      ignored: (candidate: string) => {
        const resolved = path.resolve(candidate);
        return resolved !== parentDirectory && resolved !== absolutePath;
      },
    });
    this.watcher = watcher;

    const forward = (kind: EditEventKind) => (filePath: string) => {
      if (path.resolve(filePath) !== absolutePath) return;
      this.onEvent({ timestamp: Date.now(), kind });
    };

    watcher.on("add", forward("created"));
    watcher.on("change", forward("modified"));
    watcher.on("unlink", forward("deleted"));
    watcher.on("unlinkDir", (dirPath: string) => {
      if (path.resolve(dirPath) === parentDirectory) {
        this.onEvent({ timestamp: Date.now(), kind: "moved" });
      }
    });
    watcher.on("error", (err: unknown) => {
      log.error("watcher", "filesystem watcher error:", err);
    });

    await new Promise<void>((resolve) => {
      watcher.once("ready", () => resolve());
    });
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
    }
  }

  isRunning(): boolean {
    return this.watcher !== null;
  }
}

export const createFileWatcher: TargetWatcherFactory = (target, onEvent) => new FileWatcher(target, onEvent);
